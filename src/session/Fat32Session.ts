/**
 * Fat32Session Class
 * Owns the open volume and the components built on top of it. Geometry and
 * the FAT are loaded once when the session opens and are read-only after that.
 */

import { VolumeHandle } from '../volume/VolumeHandle';
import { BootSectorParser } from '../parser/BootSectorParser';
import { FileAllocationTable } from '../parser/FileAllocationTable';
import { ClusterReader } from '../parser/ClusterReader';
import { DirectoryEntryDecoder } from '../parser/DirectoryEntryDecoder';
import { ContentSlackExtractor, DEFAULT_CONTENT_SLACK_OPTIONS } from '../parser/ContentSlackExtractor';
import { DirectoryTreeWalker } from '../parser/DirectoryTreeWalker';
import { Logger } from '../logging/Logger';
import { Geometry } from '../types/geometry';
import { EntryRecord } from '../types/entries';

export interface SessionOptions {
  previewLength?: number;
  slackLength?: number;
  logger?: Logger;
}

export interface InspectionResult {
  geometry: Geometry;
  entries: EntryRecord[];
}

export class Fat32Session {
  public readonly geometry: Geometry;
  public readonly fat: FileAllocationTable;
  public readonly reader: ClusterReader;
  public readonly decoder: DirectoryEntryDecoder;
  public readonly extractor: ContentSlackExtractor;
  public readonly walker: DirectoryTreeWalker;
  private readonly logger: Logger;

  private constructor(private readonly handle: VolumeHandle, options: SessionOptions) {
    this.logger = options.logger ?? new Logger();

    this.geometry = new BootSectorParser().parse(handle);
    this.logger.debug(`Boot sector of ${handle.path} decoded`, this.geometry);

    this.fat = FileAllocationTable.load(handle, this.geometry);
    this.reader = new ClusterReader(handle, this.fat, this.logger);
    this.decoder = new DirectoryEntryDecoder(this.geometry);
    this.extractor = new ContentSlackExtractor(this.reader, {
      previewLength: options.previewLength ?? DEFAULT_CONTENT_SLACK_OPTIONS.previewLength,
      slackLength: options.slackLength ?? DEFAULT_CONTENT_SLACK_OPTIONS.slackLength
    });
    this.walker = new DirectoryTreeWalker(this.reader, this.decoder, this.extractor, this.logger);
  }

  /**
   * Open an image file. The handle is released again if the boot sector or
   * FAT cannot be loaded.
   */
  public static open(imagePath: string, options: SessionOptions = {}): Fat32Session {
    return Fat32Session.fromHandle(VolumeHandle.open(imagePath), options);
  }

  public static fromBuffer(bytes: Uint8Array, options: SessionOptions = {}): Fat32Session {
    return Fat32Session.fromHandle(VolumeHandle.fromBuffer(bytes), options);
  }

  public static fromHandle(handle: VolumeHandle, options: SessionOptions = {}): Fat32Session {
    try {
      return new Fat32Session(handle, options);
    } catch (error) {
      handle.close();
      throw error;
    }
  }

  /**
   * Open an image, run `fn` with the session, and close it on every exit path
   */
  public static using<T>(imagePath: string, fn: (session: Fat32Session) => T, options: SessionOptions = {}): T {
    const session = Fat32Session.open(imagePath, options);
    try {
      return fn(session);
    } finally {
      session.close();
    }
  }

  public get closed(): boolean {
    return this.handle.closed;
  }

  /**
   * Geometry plus every entry reachable from the root directory
   */
  public inspect(): InspectionResult {
    const entries = this.walker.walk(this.geometry.rootDirFirstCluster, '');
    this.logger.info(`Enumerated ${entries.length} directory entries from ${this.handle.path}`);
    return { geometry: this.geometry, entries };
  }

  public close(): void {
    this.handle.close();
  }
}
