import type { ByteSink, ByteSource, Closable, Seekable } from './types.js';

/** Growable in-memory byte stream; reads and writes share one position. */
export class MemoryStream implements ByteSource, ByteSink, Seekable, Closable {
  private data: Uint8Array;
  private size: number;
  private position = 0;
  private closedFlag = false;

  constructor(initial?: Uint8Array) {
    this.data = initial ? new Uint8Array(initial) : new Uint8Array(0);
    this.size = this.data.length;
  }

  get closed(): boolean {
    return this.closedFlag;
  }

  async read(size: number): Promise<Uint8Array> {
    const end = Math.min(this.size, this.position + Math.max(0, size));
    const out = this.data.slice(this.position, end);
    this.position = Math.max(this.position, end);
    return out;
  }

  async write(chunk: Uint8Array): Promise<void> {
    const end = this.position + chunk.length;
    if (end > this.data.length) {
      const next = new Uint8Array(Math.max(end, this.data.length * 2));
      next.set(this.data.subarray(0, this.size));
      this.data = next;
    }
    this.data.set(chunk, this.position);
    this.position = end;
    if (end > this.size) this.size = end;
  }

  seek(offset: number): void {
    this.position = offset;
  }

  close(): void {
    this.closedFlag = true;
  }

  /** Copy of everything written so far. */
  bytes(): Uint8Array {
    return this.data.slice(0, this.size);
  }
}
