/**
 * BootSectorParser Class
 * Decodes the fixed-offset BIOS parameter block fields of a FAT32 boot sector
 */

import { VolumeHandle } from '../volume/VolumeHandle';
import { FormatError } from '../errors/Fat32Error';
import { BootSectorFields, Geometry } from '../types/geometry';

export const BOOT_SECTOR_SIZE = 512;

// Field offsets and widths within the boot sector
const FIELDS = {
  bytesPerSector: { offset: 11, width: 2 },
  sectorsPerCluster: { offset: 13, width: 1 },
  reservedSectors: { offset: 14, width: 2 },
  numberOfFats: { offset: 16, width: 1 },
  totalSectors: { offset: 32, width: 4 },
  sectorsPerFat: { offset: 36, width: 4 },
  rootDirFirstCluster: { offset: 44, width: 4 }
} as const satisfies Record<keyof BootSectorFields, { offset: number; width: 1 | 2 | 4 }>;

export class BootSectorParser {
  /**
   * Read the boot sector and derive the volume geometry
   */
  public parse(handle: VolumeHandle): Geometry {
    if (handle.size < BOOT_SECTOR_SIZE) {
      throw new FormatError(
        'boot-sector',
        `Image is ${handle.size} bytes, too small to hold a boot sector`
      );
    }

    const sector = handle.read(0, BOOT_SECTOR_SIZE, 'boot-sector');
    const fields: BootSectorFields = {
      bytesPerSector: sector.readUIntLE(FIELDS.bytesPerSector.offset, FIELDS.bytesPerSector.width),
      sectorsPerCluster: sector.readUIntLE(FIELDS.sectorsPerCluster.offset, FIELDS.sectorsPerCluster.width),
      reservedSectors: sector.readUIntLE(FIELDS.reservedSectors.offset, FIELDS.reservedSectors.width),
      numberOfFats: sector.readUIntLE(FIELDS.numberOfFats.offset, FIELDS.numberOfFats.width),
      totalSectors: sector.readUIntLE(FIELDS.totalSectors.offset, FIELDS.totalSectors.width),
      sectorsPerFat: sector.readUIntLE(FIELDS.sectorsPerFat.offset, FIELDS.sectorsPerFat.width),
      rootDirFirstCluster: sector.readUIntLE(FIELDS.rootDirFirstCluster.offset, FIELDS.rootDirFirstCluster.width)
    };

    return BootSectorParser.deriveGeometry(fields);
  }

  /**
   * Validate raw fields and compute the derived layout values
   */
  public static deriveGeometry(fields: BootSectorFields): Geometry {
    for (const key of ['bytesPerSector', 'sectorsPerCluster', 'numberOfFats', 'totalSectors', 'sectorsPerFat'] as const) {
      if (fields[key] === 0) {
        throw new FormatError('boot-sector', `Degenerate geometry: ${key} is 0`, FIELDS[key].offset);
      }
    }

    const dataStart = fields.reservedSectors + fields.sectorsPerFat * fields.numberOfFats;
    const dataEnd = fields.totalSectors - 1;
    if (dataStart > dataEnd) {
      throw new FormatError(
        'boot-sector',
        `Degenerate geometry: data region starts at sector ${dataStart} but the volume ends at sector ${dataEnd}`
      );
    }

    return Object.freeze({
      ...fields,
      bytesPerCluster: fields.bytesPerSector * fields.sectorsPerCluster,
      fat0SectorStart: fields.reservedSectors,
      fat0SectorEnd: fields.reservedSectors + fields.sectorsPerFat - 1,
      dataStart,
      dataEnd
    });
  }
}
