import type { ByteSink, ByteSource, Closable } from './types.js';

/** Byte source over a WHATWG ReadableStream; not seekable. */
export class WebReadableSource implements ByteSource, Closable {
  private readonly reader: ReadableStreamDefaultReader<Uint8Array>;
  private leftover: Uint8Array = new Uint8Array(0);
  private done = false;

  constructor(stream: ReadableStream<Uint8Array>) {
    this.reader = stream.getReader();
  }

  async read(size: number): Promise<Uint8Array> {
    while (this.leftover.length === 0 && !this.done) {
      const { value, done } = await this.reader.read();
      if (done) {
        this.done = true;
        break;
      }
      if (value && value.length > 0) this.leftover = value;
    }
    const out = this.leftover.subarray(0, size);
    this.leftover = this.leftover.subarray(out.length);
    return out;
  }

  async close(): Promise<void> {
    if (!this.done) {
      this.done = true;
      await this.reader.cancel();
    }
    this.reader.releaseLock();
  }
}

/** Byte sink over a WHATWG WritableStream. */
export class WebWritableSink implements ByteSink, Closable {
  private readonly writer: WritableStreamDefaultWriter<Uint8Array>;

  constructor(stream: WritableStream<Uint8Array>) {
    this.writer = stream.getWriter();
  }

  async write(chunk: Uint8Array): Promise<void> {
    if (chunk.length === 0) return;
    await this.writer.write(chunk);
  }

  async close(): Promise<void> {
    await this.writer.close();
  }
}
