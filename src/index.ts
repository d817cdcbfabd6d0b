/**
 * fat32-inspect
 * Library entry point: FAT32 image parsing, directory enumeration and the
 * MCP server that exposes them
 */

export { VolumeHandle } from './volume/VolumeHandle';
export { BootSectorParser } from './parser/BootSectorParser';
export { FileAllocationTable, END_OF_CHAIN_THRESHOLD, BAD_CLUSTER_MARKER } from './parser/FileAllocationTable';
export { ClusterReader } from './parser/ClusterReader';
export type { ChainRead } from './parser/ClusterReader';
export { DirectoryEntryDecoder, DIRECTORY_ENTRY_SIZE } from './parser/DirectoryEntryDecoder';
export { ContentSlackExtractor } from './parser/ContentSlackExtractor';
export type { ContentSlack, ContentSlackOptions } from './parser/ContentSlackExtractor';
export { DirectoryTreeWalker } from './parser/DirectoryTreeWalker';
export { classifyEntryType, decodeDisplayName } from './parser/entryNames';
export { Fat32Session } from './session/Fat32Session';
export type { InspectionResult, SessionOptions } from './session/Fat32Session';
export { formatInspection, geometryDocument, entryDocument, formatBytes } from './output/RecordFormatter';
export {
  Fat32Error,
  IoError,
  FormatError,
  ClusterRangeError,
  CorruptChainError,
  isFat32Error
} from './errors/Fat32Error';
export { ConfigurationManager } from './config/ConfigurationManager';
export { Logger } from './logging/Logger';
export { Fat32InspectorServer } from './server/Fat32InspectorServer';
export { runCli } from './cli';
export * from './types/index';
