/**
 * DirectoryTreeWalker Class
 * Enumerates a directory and everything below it into one flat, pre-ordered
 * list of records.
 *
 * Subdirectories are walked from an explicit stack instead of by recursion,
 * and each directory cluster is walked at most once, so deep trees and
 * entries pointing back at an ancestor cannot exhaust the stack or loop.
 */

import { ClusterReader } from './ClusterReader';
import { DirectoryEntryDecoder, DIRECTORY_ENTRY_SIZE } from './DirectoryEntryDecoder';
import { ContentSlackExtractor } from './ContentSlackExtractor';
import { FormatError } from '../errors/Fat32Error';
import { Logger } from '../logging/Logger';
import { DecodedEntry, EntryLocation, EntryRecord } from '../types/entries';

interface DirectoryFrame {
  cluster: number;
  parentPath: string;
  entryNum: number;
}

export class DirectoryTreeWalker {
  private readonly logger: Logger;

  constructor(
    private readonly reader: ClusterReader,
    private readonly decoder: DirectoryEntryDecoder,
    private readonly extractor: ContentSlackExtractor,
    logger: Logger = new Logger()
  ) {
    this.logger = logger.child('walk');
  }

  public walk(cluster: number, parentPath: string = ''): EntryRecord[] {
    const records: EntryRecord[] = [];
    const visited = new Set<number>([cluster]);
    const stack: DirectoryFrame[] = [{ cluster, parentPath, entryNum: 0 }];

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];

      // The directory chain is read afresh for every record
      const { data, sectors } = this.reader.read(frame.cluster, true);
      const start = frame.entryNum * DIRECTORY_ENTRY_SIZE;

      if (start + DIRECTORY_ENTRY_SIZE > data.length) {
        throw new FormatError(
          'directory-walk',
          `Directory at cluster ${frame.cluster} (${frame.parentPath || '/'}) has no end-of-directory record within ${data.length} bytes`,
          this.imageOffset(sectors, frame.cluster, data.length)
        );
      }

      const imageOffset = this.imageOffset(sectors, frame.cluster, start);
      const result = this.decoder.decode(data.subarray(start, start + DIRECTORY_ENTRY_SIZE), imageOffset);
      if (result.kind === 'end') {
        stack.pop();
        continue;
      }

      const location: EntryLocation = {
        parent: frame.parentPath,
        dirCluster: frame.cluster,
        entryNum: frame.entryNum,
        dirSectors: sectors
      };
      records.push(this.toRecord(result.entry, location));
      frame.entryNum++;

      const entry = result.entry;
      if (entry.entryType === 'dir' && entry.name !== '.' && entry.name !== '..') {
        if (visited.has(entry.contentCluster)) {
          this.logger.warn(
            `Skipping ${frame.parentPath}/${entry.name}: cluster ${entry.contentCluster} was already walked`
          );
          continue;
        }
        visited.add(entry.contentCluster);
        stack.push({
          cluster: entry.contentCluster,
          parentPath: `${frame.parentPath}/${entry.name}`,
          entryNum: 0
        });
      }
    }

    return records;
  }

  private toRecord(entry: DecodedEntry, location: EntryLocation): EntryRecord {
    if (entry.entryType !== 'other') {
      return { ...location, ...entry };
    }

    const { filesize, ...rest } = entry;
    if (entry.contentCluster === 0 || filesize === null) {
      return { ...location, ...rest };
    }

    const { preview, slack, sectors } = this.extractor.extract(entry.contentCluster, filesize);
    return {
      ...location,
      ...rest,
      content: { filesize, contentSectors: sectors, preview, slack }
    };
  }

  /**
   * Absolute image offset of byte `position` within a directory's data
   */
  private imageOffset(sectors: number[], cluster: number, position: number): number {
    const { bytesPerSector } = this.reader.geometry;
    const sectorIndex = Math.floor(position / bytesPerSector);
    let sector: number;
    if (sectors.length === 0) {
      sector = this.reader.sectorOf(cluster) + sectorIndex;
    } else if (sectorIndex < sectors.length) {
      sector = sectors[sectorIndex];
    } else {
      sector = sectors[sectors.length - 1] + 1 + sectorIndex - sectors.length;
    }
    return sector * bytesPerSector + (position % bytesPerSector);
  }
}
