/**
 * Directory Entry Types
 * Classified 32-byte directory records and the annotated records produced by
 * the directory walk
 */

export type EntryType = 'vol' | 'lfn' | 'dir' | 'other';

/** Result of classifying a type-tag byte; `empty` marks end-of-directory. */
export type EntryClass = EntryType | 'empty';

interface DecodedEntryBase {
  typeTag: number;
  name: string;
  deleted: boolean;
}

export interface DecodedVolumeEntry extends DecodedEntryBase {
  entryType: 'vol';
}

export interface DecodedLongNameEntry extends DecodedEntryBase {
  entryType: 'lfn';
}

export interface DecodedDirectoryEntry extends DecodedEntryBase {
  entryType: 'dir';
  contentCluster: number;
}

export interface DecodedFileEntry extends DecodedEntryBase {
  entryType: 'other';
  contentCluster: number;
  /** Only decoded when the entry points at a cluster. */
  filesize: number | null;
}

export type DecodedEntry =
  | DecodedVolumeEntry
  | DecodedLongNameEntry
  | DecodedDirectoryEntry
  | DecodedFileEntry;

export type DecodeResult =
  | { kind: 'end' }
  | { kind: 'entry'; entry: DecodedEntry };

/**
 * Where a record was found during the walk
 */
export interface EntryLocation {
  parent: string;
  dirCluster: number;
  entryNum: number;
  dirSectors: number[];
}

export interface FileContent {
  filesize: number;
  contentSectors: number[];
  preview: Buffer;
  /** Bytes past the declared size; null when the content cluster was unallocated. */
  slack: Buffer | null;
}

export type VolumeEntryRecord = EntryLocation & DecodedVolumeEntry;

export type LongNameEntryRecord = EntryLocation & DecodedLongNameEntry;

export type DirectoryEntryRecord = EntryLocation & DecodedDirectoryEntry;

export interface FileEntryRecord extends EntryLocation {
  entryType: 'other';
  typeTag: number;
  name: string;
  deleted: boolean;
  contentCluster: number;
  content?: FileContent;
}

export type EntryRecord =
  | VolumeEntryRecord
  | LongNameEntryRecord
  | DirectoryEntryRecord
  | FileEntryRecord;
