/**
 * Entry classification and display name tests
 */

import { classifyEntryType, decodeDisplayName } from '../entryNames';
import { ATTR, longNameEntry, shortEntry, volumeLabelEntry } from '../../__fixtures__/Fat32ImageBuilder';

describe('classifyEntryType', () => {
  test.each([
    [0x00, 'empty'],
    [0x0f, 'lfn'],
    [0x08, 'vol'],
    [0x28, 'vol'],
    [0x10, 'dir'],
    [0x12, 'dir'],
    [0x20, 'other'],
    [0x01, 'other']
  ])('should classify tag %p as %s', (tag, expected) => {
    expect(classifyEntryType(tag)).toBe(expected);
  });
});

describe('decodeDisplayName', () => {
  test('should join base name and extension', () => {
    expect(decodeDisplayName(shortEntry({ name: 'A.TXT', attr: ATTR.ARCHIVE }))).toBe('A.TXT');
    expect(decodeDisplayName(shortEntry({ name: 'REPORT.DOC', attr: ATTR.ARCHIVE }))).toBe('REPORT.DOC');
  });

  test('should omit the dot when there is no extension', () => {
    expect(decodeDisplayName(shortEntry({ name: 'SUB', attr: ATTR.DIRECTORY }))).toBe('SUB');
  });

  test('should decode the dot entries', () => {
    expect(decodeDisplayName(shortEntry({ name: '.', attr: ATTR.DIRECTORY }))).toBe('.');
    expect(decodeDisplayName(shortEntry({ name: '..', attr: ATTR.DIRECTORY }))).toBe('..');
  });

  test('should mark the overwritten first character of deleted entries', () => {
    expect(decodeDisplayName(shortEntry({ name: 'DELETED.TXT', attr: ATTR.ARCHIVE, deleted: true }))).toBe('_ELETED.TXT');
  });

  test('should decode the 0x05 escape as 0xE5', () => {
    const entry = shortEntry({ name: 'XYZ.BIN', attr: ATTR.ARCHIVE });
    entry[0] = 0x05;

    expect(decodeDisplayName(entry)).toBe('\u00e5YZ.BIN');
  });

  test('should keep volume labels as a single 11-character field', () => {
    expect(decodeDisplayName(volumeLabelEntry('EVIDENCE 01'))).toBe('EVIDENCE 01');
    expect(decodeDisplayName(volumeLabelEntry('USB'))).toBe('USB');
  });

  test('should decode long file name fragments', () => {
    expect(decodeDisplayName(longNameEntry('notes.md', 1))).toBe('notes.md');
    expect(decodeDisplayName(longNameEntry('thirteen char', 2, false))).toBe('thirteen char');
  });
});
