/**
 * Record Formatter
 * Structured key/value documents for geometry and directory entries
 */

import { Geometry } from '../types/geometry';
import { EntryRecord } from '../types/entries';
import { InspectionResult } from '../session/Fat32Session';

export interface GeometryDocument {
  bytes_per_sector: number;
  sectors_per_cluster: number;
  reserved_sectors: number;
  number_of_fats: number;
  total_sectors: number;
  sectors_per_fat: number;
  root_dir_first_cluster: number;
  bytes_per_cluster: number;
  fat0_sector_start: number;
  fat0_sector_end: number;
  data_start: number;
  data_end: number;
}

export interface EntryDocument {
  parent: string;
  dir_cluster: number;
  entry_num: number;
  dir_sectors: number[];
  entry_type: EntryRecord['entryType'];
  name: string;
  deleted: boolean;
  content_cluster?: number;
  filesize?: number;
  content_sectors?: number[];
  content?: string;
  slack?: string | null;
}

export function geometryDocument(geometry: Geometry): GeometryDocument {
  return {
    bytes_per_sector: geometry.bytesPerSector,
    sectors_per_cluster: geometry.sectorsPerCluster,
    reserved_sectors: geometry.reservedSectors,
    number_of_fats: geometry.numberOfFats,
    total_sectors: geometry.totalSectors,
    sectors_per_fat: geometry.sectorsPerFat,
    root_dir_first_cluster: geometry.rootDirFirstCluster,
    bytes_per_cluster: geometry.bytesPerCluster,
    fat0_sector_start: geometry.fat0SectorStart,
    fat0_sector_end: geometry.fat0SectorEnd,
    data_start: geometry.dataStart,
    data_end: geometry.dataEnd
  };
}

export function entryDocument(record: EntryRecord): EntryDocument {
  const document: EntryDocument = {
    parent: record.parent,
    dir_cluster: record.dirCluster,
    entry_num: record.entryNum,
    dir_sectors: record.dirSectors,
    entry_type: record.entryType,
    name: record.name,
    deleted: record.deleted
  };

  if (record.entryType === 'dir') {
    document.content_cluster = record.contentCluster;
  } else if (record.entryType === 'other') {
    document.content_cluster = record.contentCluster;
    if (record.content) {
      document.filesize = record.content.filesize;
      document.content_sectors = record.content.contentSectors;
      document.content = formatBytes(record.content.preview);
      document.slack = record.content.slack === null ? null : formatBytes(record.content.slack);
    }
  }

  return document;
}

/**
 * Render raw bytes as text: printable ASCII as-is, common control
 * characters as backslash escapes, everything else as \xNN.
 */
export function formatBytes(bytes: Uint8Array): string {
  let out = '';
  for (const byte of bytes) {
    switch (byte) {
      case 0x5c:
        out += '\\\\';
        break;
      case 0x09:
        out += '\\t';
        break;
      case 0x0a:
        out += '\\n';
        break;
      case 0x0d:
        out += '\\r';
        break;
      default:
        out += byte >= 0x20 && byte < 0x7f
          ? String.fromCharCode(byte)
          : `\\x${byte.toString(16).padStart(2, '0')}`;
    }
  }
  return out;
}

/**
 * Geometry document followed by one single-line record per entry
 */
export function formatInspection(result: InspectionResult, indent: number = 4): string[] {
  return [
    JSON.stringify(geometryDocument(result.geometry), null, indent),
    ...result.entries.map(record => JSON.stringify(entryDocument(record)))
  ];
}
