/**
 * Fat32 Error Types
 * Fatal error taxonomy for image parsing. Every error names the stage that
 * failed and, where known, the absolute byte offset in the image.
 */

export type Fat32ErrorType = 'IO_ERROR' | 'FORMAT_ERROR' | 'RANGE_ERROR' | 'CORRUPT_CHAIN';

export type ParseStage =
  | 'volume'
  | 'boot-sector'
  | 'fat'
  | 'cluster-read'
  | 'directory-entry'
  | 'directory-walk';

export class Fat32Error extends Error {
  public readonly errorType: Fat32ErrorType;
  public readonly stage: ParseStage;
  public readonly offset: number | undefined;

  constructor(errorType: Fat32ErrorType, stage: ParseStage, message: string, offset?: number) {
    super(message);
    this.name = new.target.name;
    this.errorType = errorType;
    this.stage = stage;
    this.offset = offset;
  }

  /**
   * One-line description used by the CLI and the MCP tools
   */
  public describe(): string {
    const location = this.offset !== undefined ? ` (offset ${this.offset})` : '';
    return `[${this.stage}] ${this.message}${location}`;
  }
}

/** Out-of-bounds read or device failure. */
export class IoError extends Fat32Error {
  constructor(stage: ParseStage, message: string, offset?: number) {
    super('IO_ERROR', stage, message, offset);
  }
}

/** Inconsistent or degenerate on-disk structure. */
export class FormatError extends Fat32Error {
  constructor(stage: ParseStage, message: string, offset?: number) {
    super('FORMAT_ERROR', stage, message, offset);
  }
}

/** A decoded cluster number or FAT index is past its sanity bound. */
export class ClusterRangeError extends Fat32Error {
  public readonly cluster: number;

  constructor(stage: ParseStage, cluster: number, message: string, offset?: number) {
    super('RANGE_ERROR', stage, message, offset);
    this.cluster = cluster;
  }
}

/** A FAT chain loops back on itself or links into a reserved or bad cluster. */
export class CorruptChainError extends Fat32Error {
  public readonly chain: number[];

  constructor(chain: number[], message: string, offset?: number) {
    super('CORRUPT_CHAIN', 'fat', message, offset);
    this.chain = chain;
  }
}

export function isFat32Error(error: unknown): error is Fat32Error {
  return error instanceof Fat32Error;
}
