/**
 * DirectoryEntryDecoder Class
 * Turns one 32-byte directory record into a classified entry, or signals the
 * end of the directory
 */

import { ClusterRangeError, FormatError } from '../errors/Fat32Error';
import { Geometry } from '../types/geometry';
import { DecodeResult, DecodedEntry } from '../types/entries';
import { classifyEntryType, decodeDisplayName, DELETED_MARKER } from './entryNames';

export const DIRECTORY_ENTRY_SIZE = 32;

const TYPE_TAG_OFFSET = 11;
const CLUSTER_HIGH_OFFSET = 20;
const CLUSTER_LOW_OFFSET = 26;
const FILESIZE_OFFSET = 28;

export class DirectoryEntryDecoder {
  private readonly maxCluster: number;

  constructor(geometry: Geometry) {
    this.maxCluster = geometry.totalSectors / geometry.sectorsPerCluster;
  }

  /**
   * Decode a record. `imageOffset` is only used to locate errors.
   */
  public decode(raw: Uint8Array, imageOffset?: number): DecodeResult {
    if (raw.length < DIRECTORY_ENTRY_SIZE) {
      throw new FormatError(
        'directory-entry',
        `Directory record is ${raw.length} bytes, expected ${DIRECTORY_ENTRY_SIZE}`,
        imageOffset
      );
    }

    const record = Buffer.from(raw.buffer, raw.byteOffset, DIRECTORY_ENTRY_SIZE);
    const typeTag = record[TYPE_TAG_OFFSET];
    const entryType = classifyEntryType(typeTag);
    if (entryType === 'empty') {
      return { kind: 'end' };
    }

    const base = {
      typeTag,
      name: decodeDisplayName(record),
      deleted: record[0] === DELETED_MARKER
    };

    return { kind: 'entry', entry: this.toEntry(entryType, base, record, imageOffset) };
  }

  private toEntry(
    entryType: DecodedEntry['entryType'],
    base: Pick<DecodedEntry, 'typeTag' | 'name' | 'deleted'>,
    record: Buffer,
    imageOffset: number | undefined
  ): DecodedEntry {
    switch (entryType) {
      case 'vol':
        return { ...base, entryType: 'vol' };
      case 'lfn':
        return { ...base, entryType: 'lfn' };
      case 'dir':
        return { ...base, entryType: 'dir', contentCluster: this.contentCluster(record, imageOffset) };
      case 'other': {
        const contentCluster = this.contentCluster(record, imageOffset);
        return {
          ...base,
          entryType: 'other',
          contentCluster,
          filesize: contentCluster !== 0 ? record.readUInt32LE(FILESIZE_OFFSET) : null
        };
      }
    }
  }

  /**
   * First cluster of the entry's content, from the split high/low words
   */
  public contentCluster(record: Buffer, imageOffset?: number): number {
    const high = record.readUInt16LE(CLUSTER_HIGH_OFFSET);
    const low = record.readUInt16LE(CLUSTER_LOW_OFFSET);
    const cluster = high * 0x10000 + low;

    if (cluster > this.maxCluster) {
      throw new ClusterRangeError(
        'directory-entry',
        cluster,
        `Content cluster ${cluster} exceeds the volume's cluster count (${this.maxCluster})`,
        imageOffset
      );
    }
    return cluster;
  }
}
