/**
 * Fat32ImageBuilder
 * Assembles small FAT32 images in memory for tests
 */

import { BootSectorFields } from '../types/geometry';

export const END_OF_CHAIN = 0x0fffffff;

export const ATTR = {
  VOLUME_ID: 0x08,
  DIRECTORY: 0x10,
  ARCHIVE: 0x20,
  LONG_NAME: 0x0f
} as const;

export const DEFAULT_LAYOUT: BootSectorFields = {
  bytesPerSector: 512,
  sectorsPerCluster: 1,
  reservedSectors: 32,
  numberOfFats: 1,
  totalSectors: 64,
  sectorsPerFat: 8,
  rootDirFirstCluster: 2
};

export interface ShortEntryOptions {
  name: string;
  attr: number;
  cluster?: number;
  size?: number;
  deleted?: boolean;
}

/**
 * Pad a display name such as "A.TXT" into the 11-byte 8.3 form
 */
export function toShortName(name: string): string {
  if (name === '.' || name === '..') {
    return name.padEnd(11, ' ');
  }
  const [base, extension = ''] = name.split('.');
  return base.padEnd(8, ' ') + extension.padEnd(3, ' ');
}

export function shortEntry(options: ShortEntryOptions): Buffer {
  const entry = Buffer.alloc(32);
  entry.write(toShortName(options.name), 0, 11, 'latin1');
  if (options.deleted) {
    entry[0] = 0xe5;
  }
  entry[11] = options.attr;
  const cluster = options.cluster ?? 0;
  entry.writeUInt16LE(Math.floor(cluster / 0x10000), 20);
  entry.writeUInt16LE(cluster % 0x10000, 26);
  entry.writeUInt32LE(options.size ?? 0, 28);
  return entry;
}

export function volumeLabelEntry(label: string): Buffer {
  const entry = Buffer.alloc(32);
  entry.write(label.padEnd(11, ' '), 0, 11, 'latin1');
  entry[11] = ATTR.VOLUME_ID;
  return entry;
}

/**
 * One long-file-name fragment holding up to 13 characters
 */
export function longNameEntry(fragment: string, ordinal: number, last: boolean = true): Buffer {
  const entry = Buffer.alloc(32);
  entry[0] = ordinal | (last ? 0x40 : 0);
  entry[11] = ATTR.LONG_NAME;
  const slots = [1, 3, 5, 7, 9, 14, 16, 18, 20, 22, 24, 28, 30];
  slots.forEach((offset, index) => {
    if (index < fragment.length) {
      entry.writeUInt16LE(fragment.charCodeAt(index), offset);
    } else if (index === fragment.length) {
      entry.writeUInt16LE(0x0000, offset);
    } else {
      entry.writeUInt16LE(0xffff, offset);
    }
  });
  return entry;
}

export class Fat32ImageBuilder {
  public readonly layout: BootSectorFields;
  private readonly image: Buffer;

  constructor(layout: Partial<BootSectorFields> = {}) {
    this.layout = { ...DEFAULT_LAYOUT, ...layout };
    this.image = Buffer.alloc(this.layout.totalSectors * this.layout.bytesPerSector);
    this.writeBootSector();
    this.setFatEntry(0, 0x0ffffff8);
    this.setFatEntry(1, END_OF_CHAIN);
  }

  public get dataStart(): number {
    return this.layout.reservedSectors + this.layout.sectorsPerFat * this.layout.numberOfFats;
  }

  public get bytesPerCluster(): number {
    return this.layout.bytesPerSector * this.layout.sectorsPerCluster;
  }

  public sectorOf(cluster: number): number {
    return (cluster - 2) * this.layout.sectorsPerCluster + this.dataStart;
  }

  /**
   * Write a raw FAT entry into every FAT copy
   */
  public setFatEntry(cluster: number, value: number): this {
    for (let copy = 0; copy < this.layout.numberOfFats; copy++) {
      const fatStart = (this.layout.reservedSectors + copy * this.layout.sectorsPerFat) * this.layout.bytesPerSector;
      this.image.writeUInt32LE(value, fatStart + cluster * 4);
    }
    return this;
  }

  /**
   * Link the clusters in order and terminate the chain
   */
  public chain(...clusters: number[]): this {
    clusters.forEach((cluster, index) => {
      const next = index + 1 < clusters.length ? clusters[index + 1] : END_OF_CHAIN;
      this.setFatEntry(cluster, next);
    });
    return this;
  }

  public writeCluster(cluster: number, data: Uint8Array, offset: number = 0): this {
    this.image.set(data, this.sectorOf(cluster) * this.layout.bytesPerSector + offset);
    return this;
  }

  /**
   * Lay directory records out back to back from the start of `cluster`
   */
  public writeDirectory(cluster: number, entries: Buffer[]): this {
    return this.writeCluster(cluster, Buffer.concat(entries));
  }

  public patch(offset: number, data: Uint8Array): this {
    this.image.set(data, offset);
    return this;
  }

  public build(): Buffer {
    return Buffer.from(this.image);
  }

  private writeBootSector(): void {
    const { layout, image } = this;
    image[0] = 0xeb;
    image[1] = 0x58;
    image[2] = 0x90;
    image.write('MSWIN4.1', 3, 'latin1');
    image.writeUInt16LE(layout.bytesPerSector, 11);
    image.writeUInt8(layout.sectorsPerCluster, 13);
    image.writeUInt16LE(layout.reservedSectors, 14);
    image.writeUInt8(layout.numberOfFats, 16);
    image.writeUInt32LE(layout.totalSectors, 32);
    image.writeUInt32LE(layout.sectorsPerFat, 36);
    image.writeUInt32LE(layout.rootDirFirstCluster, 44);
    image[510] = 0x55;
    image[511] = 0xaa;
  }
}

/**
 * Root holds a SUB directory and A.TXT ("hello" followed by slack bytes)
 */
export function buildSampleImage(): Buffer {
  return new Fat32ImageBuilder()
    .chain(2)
    .chain(3)
    .chain(4)
    .writeDirectory(2, [
      shortEntry({ name: 'SUB', attr: ATTR.DIRECTORY, cluster: 3 }),
      shortEntry({ name: 'A.TXT', attr: ATTR.ARCHIVE, cluster: 4, size: 5 })
    ])
    .writeDirectory(3, [
      shortEntry({ name: '.', attr: ATTR.DIRECTORY, cluster: 3 }),
      shortEntry({ name: '..', attr: ATTR.DIRECTORY, cluster: 0 })
    ])
    .writeCluster(4, Buffer.from('helloSLACKDATA', 'latin1'))
    .build();
}
