/**
 * Random-access byte sources that bundles are read through.
 */
import { open } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';

/**
 * Immutable byte source of known length. Reads may come back short only at
 * the end of the source.
 */
export interface Bundle {
  readonly size: number;
  read(position: number, length: number): Promise<Buffer>;
}

/**
 * Bundle backed by an open file handle. The handle stays open until `close`.
 */
export class FileBundle implements Bundle {
  private constructor(
    public readonly filePath: string,
    public readonly size: number,
    private readonly handle: FileHandle
  ) {}

  static async open(filePath: string): Promise<FileBundle> {
    const handle: FileHandle = await open(filePath, 'r');
    try {
      const { size } = await handle.stat();
      return new FileBundle(filePath, size, handle);
    } catch (error) {
      await handle.close();
      throw error;
    }
  }

  async read(position: number, length: number): Promise<Buffer> {
    const available: number = Math.max(0, Math.min(length, this.size - position));
    const buffer: Buffer = Buffer.alloc(available);
    let filled = 0;
    while (filled < available) {
      const { bytesRead } = await this.handle.read(buffer, filled, available - filled, position + filled);
      if (bytesRead === 0) {
        // File shrank since it was opened
        return buffer.subarray(0, filled);
      }
      filled += bytesRead;
    }
    return buffer;
  }

  async close(): Promise<void> {
    await this.handle.close();
  }
}

/**
 * Bundle over bytes already in memory.
 */
export class BufferBundle implements Bundle {
  private readonly data: Buffer;

  constructor(data: Uint8Array) {
    this.data = Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  }

  get size(): number {
    return this.data.length;
  }

  async read(position: number, length: number): Promise<Buffer> {
    const start: number = Math.min(position, this.data.length);
    const end: number = Math.min(position + length, this.data.length);
    return Buffer.from(this.data.subarray(start, end));
  }
}

/**
 * Opens a bundle file for the duration of `action` and closes it on every exit path.
 *
 * @param filePath - Path to the bundle file
 * @param action - Work to run against the open bundle
 * @returns Whatever `action` resolves to
 */
export async function withBundle<T>(filePath: string, action: (bundle: FileBundle) => Promise<T>): Promise<T> {
  const bundle: FileBundle = await FileBundle.open(filePath);
  try {
    return await action(bundle);
  } finally {
    await bundle.close();
  }
}
