/**
 * BootSectorParser Tests
 */

import { BootSectorParser } from '../BootSectorParser';
import { VolumeHandle } from '../../volume/VolumeHandle';
import { FormatError } from '../../errors/Fat32Error';
import { Fat32ImageBuilder } from '../../__fixtures__/Fat32ImageBuilder';

describe('BootSectorParser', () => {
  const parser = new BootSectorParser();

  test('should decode the boot sector fields and derive the layout', () => {
    const image = new Fat32ImageBuilder({
      bytesPerSector: 512,
      sectorsPerCluster: 1,
      reservedSectors: 32,
      numberOfFats: 1,
      sectorsPerFat: 8,
      totalSectors: 64,
      rootDirFirstCluster: 2
    }).build();

    const geometry = parser.parse(VolumeHandle.fromBuffer(image));

    expect(geometry).toEqual({
      bytesPerSector: 512,
      sectorsPerCluster: 1,
      reservedSectors: 32,
      numberOfFats: 1,
      totalSectors: 64,
      sectorsPerFat: 8,
      rootDirFirstCluster: 2,
      bytesPerCluster: 512,
      fat0SectorStart: 32,
      fat0SectorEnd: 39,
      dataStart: 40,
      dataEnd: 63
    });
  });

  test('should honour multi-sector clusters and several FAT copies', () => {
    const image = new Fat32ImageBuilder({
      sectorsPerCluster: 4,
      reservedSectors: 6,
      numberOfFats: 2,
      sectorsPerFat: 3,
      totalSectors: 80
    }).build();

    const geometry = parser.parse(VolumeHandle.fromBuffer(image));

    expect(geometry.bytesPerCluster).toBe(geometry.bytesPerSector * geometry.sectorsPerCluster);
    expect(geometry.bytesPerCluster).toBe(2048);
    expect(geometry.dataStart).toBe(geometry.reservedSectors + geometry.sectorsPerFat * geometry.numberOfFats);
    expect(geometry.dataStart).toBe(12);
    expect(geometry.fat0SectorEnd).toBe(8);
    expect(geometry.dataEnd).toBe(79);
  });

  test('should return a frozen geometry', () => {
    const geometry = parser.parse(VolumeHandle.fromBuffer(new Fat32ImageBuilder().build()));

    expect(Object.isFrozen(geometry)).toBe(true);
  });

  test('should reject an image too small to hold a boot sector', () => {
    expect(() => parser.parse(VolumeHandle.fromBuffer(Buffer.alloc(100)))).toThrow(FormatError);
  });

  test('should reject a volume with zero sectors per FAT', () => {
    const image = new Fat32ImageBuilder().build();
    image.writeUInt32LE(0, 36);

    expect(() => parser.parse(VolumeHandle.fromBuffer(image))).toThrow('sectorsPerFat is 0');
  });

  test('should reject a volume with zero total sectors', () => {
    const image = new Fat32ImageBuilder().build();
    image.writeUInt32LE(0, 32);
    expect.assertions(3);

    try {
      parser.parse(VolumeHandle.fromBuffer(image));
    } catch (error) {
      expect(error).toBeInstanceOf(FormatError);
      expect((error as FormatError).stage).toBe('boot-sector');
      expect((error as FormatError).offset).toBe(32);
    }
  });

  test('should reject a data region that starts past the end of the volume', () => {
    expect(() =>
      BootSectorParser.deriveGeometry({
        bytesPerSector: 512,
        sectorsPerCluster: 1,
        reservedSectors: 32,
        numberOfFats: 2,
        totalSectors: 40,
        sectorsPerFat: 8,
        rootDirFirstCluster: 2
      })
    ).toThrow('data region starts at sector 48');
  });
});
