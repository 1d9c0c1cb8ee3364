import { open, type FileHandle } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import type { ByteSink, ByteSource, Closable, Seekable } from './types.js';

/** `fs.open` flags the factory may ask for. */
export type FileOpenFlags = 'r' | 'r+' | 'w' | 'w+' | 'a' | 'a+' | 'wx' | 'wx+';

/** File-backed byte stream over a `fs/promises` FileHandle. */
export class FileStream implements ByteSource, ByteSink, Seekable, Closable {
  private position = 0;
  private closed = false;

  constructor(
    private readonly handle: FileHandle,
    private readonly append = false
  ) {}

  static async open(path: string | URL, flags: FileOpenFlags): Promise<FileStream> {
    const filePath = typeof path === 'string' ? path : fileURLToPath(path);
    const handle = await open(filePath, flags);
    return new FileStream(handle, flags.startsWith('a'));
  }

  async read(size: number): Promise<Uint8Array> {
    const buffer = new Uint8Array(size);
    const { bytesRead } = await this.handle.read(buffer, 0, size, this.position);
    this.position += bytesRead;
    return bytesRead === size ? buffer : buffer.subarray(0, bytesRead);
  }

  async write(chunk: Uint8Array): Promise<void> {
    let written = 0;
    while (written < chunk.length) {
      const { bytesWritten } = await this.handle.write(
        chunk,
        written,
        chunk.length - written,
        this.append ? null : this.position + written
      );
      written += bytesWritten;
    }
    this.position += chunk.length;
  }

  seek(offset: number): void {
    this.position = offset;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.handle.close();
  }
}
