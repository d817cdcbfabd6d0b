/**
 * VolumeHandle Class
 * Read-only, random-access view of a raw volume image addressed by absolute
 * byte offsets. Backed either by an open file descriptor or by bytes already
 * in memory.
 */

import * as fs from 'fs';
import { IoError, ParseStage } from '../errors/Fat32Error';

interface ByteSource {
  readonly size: number;
  readInto(target: Buffer, position: number): number;
  release(): void;
}

class FileByteSource implements ByteSource {
  public readonly size: number;

  constructor(private readonly fd: number) {
    this.size = fs.fstatSync(fd).size;
  }

  public readInto(target: Buffer, position: number): number {
    let filled = 0;
    while (filled < target.length) {
      const bytesRead = fs.readSync(this.fd, target, filled, target.length - filled, position + filled);
      if (bytesRead === 0) {
        break;
      }
      filled += bytesRead;
    }
    return filled;
  }

  public release(): void {
    fs.closeSync(this.fd);
  }
}

class BufferByteSource implements ByteSource {
  public readonly size: number;

  constructor(private readonly bytes: Uint8Array) {
    this.size = bytes.length;
  }

  public readInto(target: Buffer, position: number): number {
    const slice = this.bytes.subarray(position, position + target.length);
    target.set(slice);
    return slice.length;
  }

  public release(): void {
    // nothing to release
  }
}

export class VolumeHandle {
  private source: ByteSource | null;

  private constructor(source: ByteSource, public readonly path: string) {
    this.source = source;
  }

  /**
   * Open an image file read-only
   */
  public static open(imagePath: string): VolumeHandle {
    let fd: number;
    try {
      fd = fs.openSync(imagePath, 'r');
    } catch (error) {
      throw new IoError('volume', `Cannot open image ${imagePath}: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }

    try {
      const stats = fs.fstatSync(fd);
      if (!stats.isFile()) {
        throw new IoError('volume', `Image is not a regular file: ${imagePath}`);
      }
      return new VolumeHandle(new FileByteSource(fd), imagePath);
    } catch (error) {
      fs.closeSync(fd);
      throw error;
    }
  }

  /**
   * Wrap an image that is already in memory
   */
  public static fromBuffer(bytes: Uint8Array, label: string = '<memory>'): VolumeHandle {
    return new VolumeHandle(new BufferByteSource(bytes), label);
  }

  /**
   * Open an image, run `fn` with it, and release it on every exit path
   */
  public static using<T>(imagePath: string, fn: (handle: VolumeHandle) => T): T {
    const handle = VolumeHandle.open(imagePath);
    try {
      return fn(handle);
    } finally {
      handle.close();
    }
  }

  public get size(): number {
    return this.requireSource().size;
  }

  public get closed(): boolean {
    return this.source === null;
  }

  /**
   * Read exactly `length` bytes starting at absolute byte `offset`. Failures
   * are attributed to `stage`, the component that asked for the bytes.
   */
  public read(offset: number, length: number, stage: ParseStage = 'volume'): Buffer {
    const source = this.requireSource();

    if (!Number.isInteger(offset) || !Number.isInteger(length) || offset < 0 || length < 0) {
      throw new IoError(stage, `Invalid read of ${length} bytes`, offset);
    }
    if (offset + length > source.size) {
      throw new IoError(
        stage,
        `Read of ${length} bytes runs past the end of ${this.path} (${source.size} bytes)`,
        offset
      );
    }

    const target = Buffer.alloc(length);
    let bytesRead: number;
    try {
      bytesRead = source.readInto(target, offset);
    } catch (error) {
      throw new IoError(stage, `Device read failed: ${error instanceof Error ? error.message : 'Unknown error'}`, offset);
    }
    if (bytesRead !== length) {
      throw new IoError(stage, `Short read: got ${bytesRead} of ${length} bytes`, offset);
    }
    return target;
  }

  /**
   * Release the underlying source. Further calls are no-ops.
   */
  public close(): void {
    if (this.source === null) {
      return;
    }
    const source = this.source;
    this.source = null;
    source.release();
  }

  private requireSource(): ByteSource {
    if (this.source === null) {
      throw new IoError('volume', `Volume handle for ${this.path} is closed`);
    }
    return this.source;
  }
}
