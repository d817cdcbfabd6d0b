/**
 * Fat32Error Tests
 */

import {
  ClusterRangeError,
  CorruptChainError,
  FormatError,
  IoError,
  isFat32Error
} from '../Fat32Error';

describe('Fat32Error', () => {
  test('should describe the stage, message and offset', () => {
    const error = new FormatError('boot-sector', 'Degenerate geometry: totalSectors is 0', 32);

    expect(error.describe()).toBe('[boot-sector] Degenerate geometry: totalSectors is 0 (offset 32)');
  });

  test('should leave the offset out when it is unknown', () => {
    expect(new IoError('volume', 'Volume is closed').describe()).toBe('[volume] Volume is closed');
  });

  test('should carry the error type and class name', () => {
    const range = new ClusterRangeError('fat', 5000, 'Cluster 5000 exceeds FAT size (4096 bytes)');
    const chain = new CorruptChainError([2, 3, 2], 'loop');

    expect(range.errorType).toBe('RANGE_ERROR');
    expect(range.name).toBe('ClusterRangeError');
    expect(range.cluster).toBe(5000);
    expect(chain.errorType).toBe('CORRUPT_CHAIN');
    expect(chain.stage).toBe('fat');
    expect(chain).toBeInstanceOf(Error);
  });

  test('should recognise parse errors', () => {
    expect(isFat32Error(new IoError('volume', 'x'))).toBe(true);
    expect(isFat32Error(new Error('x'))).toBe(false);
    expect(isFat32Error('x')).toBe(false);
  });
});
