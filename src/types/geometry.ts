/**
 * Volume Geometry Types
 * Layout parameters decoded from the FAT32 boot sector
 */

export interface BootSectorFields {
  bytesPerSector: number;
  sectorsPerCluster: number;
  reservedSectors: number;
  numberOfFats: number;
  totalSectors: number;
  sectorsPerFat: number;
  rootDirFirstCluster: number;
}

/**
 * Boot sector fields plus the values derived from them.
 * All derived fields are computed once when the geometry is created.
 */
export interface Geometry extends Readonly<BootSectorFields> {
  readonly bytesPerCluster: number;
  readonly fat0SectorStart: number;
  readonly fat0SectorEnd: number;
  readonly dataStart: number;
  readonly dataEnd: number;
}
