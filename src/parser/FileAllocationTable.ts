/**
 * FileAllocationTable Class
 * In-memory copy of FAT #0 and cluster chain resolution
 */

import { VolumeHandle } from '../volume/VolumeHandle';
import { ClusterRangeError, CorruptChainError } from '../errors/Fat32Error';
import { Geometry } from '../types/geometry';

export const FAT_ENTRY_SIZE = 4;

/** Entries above this value end a chain; entries at or below it link to the next cluster. */
export const END_OF_CHAIN_THRESHOLD = 0x0ffffff8;

export const BAD_CLUSTER_MARKER = 0x0ffffff7;

export const UNALLOCATED = 0;

export class FileAllocationTable {
  private constructor(
    private readonly table: Buffer,
    public readonly geometry: Geometry
  ) {}

  /**
   * Load FAT copy 0. Other copies are never consulted.
   */
  public static load(handle: VolumeHandle, geometry: Geometry): FileAllocationTable {
    const table = handle.read(
      geometry.fat0SectorStart * geometry.bytesPerSector,
      geometry.sectorsPerFat * geometry.bytesPerSector,
      'fat'
    );
    return new FileAllocationTable(table, geometry);
  }

  public get byteLength(): number {
    return this.table.length;
  }

  /**
   * Absolute byte offset of a cluster's FAT entry within the image
   */
  public entryImageOffset(cluster: number): number {
    return this.geometry.fat0SectorStart * this.geometry.bytesPerSector + cluster * FAT_ENTRY_SIZE;
  }

  /**
   * Raw 32-bit entry for a cluster
   */
  public entry(cluster: number): number {
    this.assertInRange(cluster);
    return this.table.readUInt32LE(cluster * FAT_ENTRY_SIZE);
  }

  /**
   * First sector of a cluster in the data region
   */
  public sectorOf(cluster: number): number {
    return (cluster - 2) * this.geometry.sectorsPerCluster + this.geometry.dataStart;
  }

  /**
   * Last sector of a cluster in the data region
   */
  public lastSectorOf(cluster: number): number {
    return this.sectorOf(cluster) + this.geometry.sectorsPerCluster - 1;
  }

  /**
   * Follow the chain starting at `cluster` and list every sector it covers,
   * in traversal order. An unallocated starting cluster yields an empty list.
   */
  public resolveChain(cluster: number): number[] {
    return this.resolveClusters(cluster).flatMap(c => this.sectorsOf(c));
  }

  /**
   * Cluster numbers of the chain starting at `cluster`
   */
  public resolveClusters(cluster: number): number[] {
    let value = this.entry(cluster);
    if (value === UNALLOCATED) {
      return [];
    }

    const chain = [cluster];
    const seen = new Set<number>(chain);
    let current = cluster;

    while (value <= END_OF_CHAIN_THRESHOLD) {
      const next = value;
      if (next === BAD_CLUSTER_MARKER) {
        throw new CorruptChainError(
          chain,
          `Cluster ${current} links to a cluster marked bad`,
          this.entryImageOffset(current)
        );
      }
      if (next < 2) {
        throw new CorruptChainError(
          chain,
          `Cluster ${current} links to reserved cluster ${next}`,
          this.entryImageOffset(current)
        );
      }
      if (seen.has(next)) {
        throw new CorruptChainError(
          [...chain, next],
          `Cluster chain starting at ${cluster} loops back to cluster ${next}`,
          this.entryImageOffset(current)
        );
      }

      chain.push(next);
      seen.add(next);
      value = this.entry(next);
      current = next;
    }

    return chain;
  }

  private sectorsOf(cluster: number): number[] {
    const first = this.sectorOf(cluster);
    return Array.from({ length: this.geometry.sectorsPerCluster }, (_, i) => first + i);
  }

  /**
   * Bounds the entry's byte offset against the table size. This is not a
   * check of the cluster against the volume's cluster count.
   */
  private assertInRange(cluster: number): void {
    const entryEnd = cluster * FAT_ENTRY_SIZE + FAT_ENTRY_SIZE;
    if (!Number.isInteger(cluster) || !(0 < entryEnd && entryEnd < this.table.length)) {
      throw new ClusterRangeError(
        'fat',
        cluster,
        `Cluster ${cluster} exceeds FAT size (${this.table.length} bytes)`,
        this.entryImageOffset(cluster)
      );
    }
  }
}
