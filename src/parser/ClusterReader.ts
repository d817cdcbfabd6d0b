/**
 * ClusterReader Class
 * Reads the raw bytes behind a cluster chain, slack space included
 */

import { VolumeHandle } from '../volume/VolumeHandle';
import { FileAllocationTable } from './FileAllocationTable';
import { Logger } from '../logging/Logger';
import { Geometry } from '../types/geometry';

export interface ChainRead {
  data: Buffer;
  /** Sectors of the resolved chain; empty when the cluster is unallocated. */
  sectors: number[];
  /** True when `data` came from the single-cluster read of an unallocated cluster. */
  unallocated: boolean;
}

export class ClusterReader {
  private readonly logger: Logger;

  constructor(
    private readonly handle: VolumeHandle,
    private readonly fat: FileAllocationTable,
    logger: Logger = new Logger()
  ) {
    this.logger = logger.child('clusters');
  }

  public get geometry(): Geometry {
    return this.fat.geometry;
  }

  public sectorOf(cluster: number): number {
    return this.fat.sectorOf(cluster);
  }

  /**
   * Bytes of every sector in the chain, concatenated in chain order
   */
  public readChain(cluster: number, ignoreUnallocated: boolean): Buffer {
    return this.read(cluster, ignoreUnallocated).data;
  }

  /**
   * Like readChain(), also reporting the sectors read and whether the
   * unallocated-cluster fallback was used.
   *
   * With `ignoreUnallocated`, an unallocated cluster is still read: one
   * cluster's worth of bytes at its nominal position. Those bytes may belong
   * to some other, previously deleted file.
   */
  public read(cluster: number, ignoreUnallocated: boolean): ChainRead {
    const sectors = this.fat.resolveChain(cluster);
    const { bytesPerSector, bytesPerCluster } = this.fat.geometry;

    if (sectors.length === 0) {
      if (!ignoreUnallocated) {
        return { data: Buffer.alloc(0), sectors, unallocated: true };
      }
      const offset = this.fat.sectorOf(cluster) * bytesPerSector;
      this.logger.debug(`Cluster ${cluster} is unallocated, reading ${bytesPerCluster} bytes at ${offset}`);
      return { data: this.handle.read(offset, bytesPerCluster, 'cluster-read'), sectors, unallocated: true };
    }

    const data = Buffer.concat(
      sectors.map(sector => this.handle.read(sector * bytesPerSector, bytesPerSector, 'cluster-read'))
    );
    return { data, sectors, unallocated: false };
  }
}
