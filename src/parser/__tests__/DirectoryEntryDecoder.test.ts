/**
 * DirectoryEntryDecoder Tests
 */

import { DirectoryEntryDecoder } from '../DirectoryEntryDecoder';
import { BootSectorParser } from '../BootSectorParser';
import { ClusterRangeError, FormatError } from '../../errors/Fat32Error';
import {
  ATTR,
  DEFAULT_LAYOUT,
  longNameEntry,
  shortEntry,
  volumeLabelEntry
} from '../../__fixtures__/Fat32ImageBuilder';

describe('DirectoryEntryDecoder', () => {
  let decoder: DirectoryEntryDecoder;

  beforeEach(() => {
    // 64 sectors of one sector each: clusters up to 64 are in range
    decoder = new DirectoryEntryDecoder(BootSectorParser.deriveGeometry(DEFAULT_LAYOUT));
  });

  describe('End of directory', () => {
    test('should signal the end for a zero type tag whatever the other bytes hold', () => {
      const raw = Buffer.alloc(32, 0xff);
      raw[11] = 0x00;

      expect(decoder.decode(raw)).toEqual({ kind: 'end' });
    });

    test('should reject records shorter than 32 bytes', () => {
      expect(() => decoder.decode(Buffer.alloc(31), 640)).toThrow(FormatError);
    });
  });

  describe('File entries', () => {
    test('should decode a file with its content cluster and size', () => {
      const raw = shortEntry({ name: 'A.TXT', attr: ATTR.ARCHIVE, cluster: 4, size: 5 });

      expect(decoder.decode(raw)).toEqual({
        kind: 'entry',
        entry: {
          typeTag: 0x20,
          name: 'A.TXT',
          deleted: false,
          entryType: 'other',
          contentCluster: 4,
          filesize: 5
        }
      });
    });

    test('should leave the size undefined for files without content', () => {
      const raw = shortEntry({ name: 'EMPTY.TXT', attr: ATTR.ARCHIVE, cluster: 0, size: 99 });
      const result = decoder.decode(raw);

      expect(result).toEqual({
        kind: 'entry',
        entry: expect.objectContaining({ entryType: 'other', contentCluster: 0, filesize: null })
      });
    });

    test('should combine the high and low cluster words', () => {
      const wide = new DirectoryEntryDecoder(
        BootSectorParser.deriveGeometry({ ...DEFAULT_LAYOUT, totalSectors: 200000 })
      );
      const raw = shortEntry({ name: 'BIG.BIN', attr: ATTR.ARCHIVE, size: 77 });
      raw.writeUInt16LE(0x0001, 20);
      raw.writeUInt16LE(0x0002, 26);

      const result = wide.decode(raw);

      expect(result).toEqual({
        kind: 'entry',
        entry: expect.objectContaining({ contentCluster: 65538, filesize: 77 })
      });
    });

    test('should flag deleted entries', () => {
      const raw = shortEntry({ name: 'GONE.TXT', attr: ATTR.ARCHIVE, cluster: 7, size: 3, deleted: true });

      expect(decoder.decode(raw)).toEqual({
        kind: 'entry',
        entry: expect.objectContaining({ name: '_ONE.TXT', deleted: true })
      });
    });
  });

  describe('Other entry classes', () => {
    test('should decode directories with a content cluster and no size', () => {
      const result = decoder.decode(shortEntry({ name: 'SUB', attr: ATTR.DIRECTORY, cluster: 3, size: 1234 }));

      expect(result).toEqual({
        kind: 'entry',
        entry: { typeTag: 0x10, name: 'SUB', deleted: false, entryType: 'dir', contentCluster: 3 }
      });
    });

    test('should decode volume labels without a content cluster', () => {
      const result = decoder.decode(volumeLabelEntry('EVIDENCE'));

      expect(result).toEqual({
        kind: 'entry',
        entry: { typeTag: 0x08, name: 'EVIDENCE', deleted: false, entryType: 'vol' }
      });
    });

    test('should decode long-name fragments without reading the cluster words', () => {
      // Characters occupy the cluster-high slot, which would be far out of range as a cluster
      const result = decoder.decode(longNameEntry('abcdefghijklm', 1));

      expect(result).toEqual({
        kind: 'entry',
        entry: { typeTag: 0x0f, name: 'abcdefghijklm', deleted: false, entryType: 'lfn' }
      });
    });
  });

  describe('Cluster bounds', () => {
    test('should accept the last cluster of the volume', () => {
      const result = decoder.decode(shortEntry({ name: 'END.BIN', attr: ATTR.ARCHIVE, cluster: 64, size: 1 }));

      expect(result).toEqual({ kind: 'entry', entry: expect.objectContaining({ contentCluster: 64 }) });
    });

    test('should reject a content cluster past the volume', () => {
      const raw = shortEntry({ name: 'BAD.BIN', attr: ATTR.ARCHIVE, cluster: 65, size: 1 });
      expect.assertions(4);

      try {
        decoder.decode(raw, 20512);
      } catch (error) {
        expect(error).toBeInstanceOf(ClusterRangeError);
        expect((error as ClusterRangeError).cluster).toBe(65);
        expect((error as ClusterRangeError).stage).toBe('directory-entry');
        expect((error as ClusterRangeError).offset).toBe(20512);
      }
    });

    test('should range-check directory clusters too', () => {
      const raw = shortEntry({ name: 'FAR', attr: ATTR.DIRECTORY, cluster: 1000 });

      expect(() => decoder.decode(raw)).toThrow(ClusterRangeError);
    });
  });
});
