import { describeType } from '../binary.js';
import {
  InvalidArgumentError,
  ResourceError,
  UnsupportedOperationError
} from '../errors.js';
import { CookieCache } from '../seek/CookieCache.js';
import { lookupCodec, type TextCodec } from '../text/codecs.js';
import { codePointLength, codePointOffset } from '../text/codePoints.js';
import { decodeChunk, INITIAL_CARRY, type DecodeCarry } from '../text/decode.js';
import { findLineEnd, translateForWrite, type NewlineMode } from '../text/newline.js';
import { GzipBinaryFile, isWhence, type Whence } from './GzipBinaryFile.js';
import type { GzipOpenOptions, ResolvedOptions } from './options.js';
import { openTarget, type GzipTarget } from './target.js';

/**
 * Text handle layered on a binary handle.
 *
 * Decoding is incremental: each chunk of decompressed bytes is decoded with
 * the carry of the previous one, so characters and `\r\n` pairs split across
 * chunks come out whole. Positions and counts are in code points, and a read
 * never ends between the halves of a surrogate pair. Every forward read records
 * a checkpoint for its resulting position, and absolute seeks can only return
 * to a recorded position (or to 0).
 */
export class GzipTextFile implements AsyncIterable<string> {
  /** The binary handle underneath. */
  readonly buffer: GzipBinaryFile;
  readonly encoding: string;
  readonly errors: string;
  readonly newline: NewlineMode;

  private readonly codec: TextCodec;
  private readonly chunkSize: number;
  private readonly signal: AbortSignal | undefined;
  private readonly cookies: CookieCache;

  private text = '';
  private carry: DecodeCarry = INITIAL_CARRY;
  private position = 0;
  private decodedToEnd = false;
  private closedFlag = false;
  private poisoned = false;

  constructor(binary: GzipBinaryFile, options: ResolvedOptions) {
    this.buffer = binary;
    this.encoding = options.encoding;
    this.errors = options.errors;
    this.newline = options.newline;
    this.codec = lookupCodec(options.encoding);
    this.chunkSize = options.chunkSize;
    this.signal = options.signal;
    this.cookies = new CookieCache(options.cookieCacheSize);
  }

  /** Open a path or wrap a raw byte stream in text mode; `b` is refused, `t` is implied. */
  static async open(target: GzipTarget, mode = 'rt', options?: GzipOpenOptions): Promise<GzipTextFile> {
    const init = await openTarget(target, mode, options, 'text');
    return new GzipTextFile(new GzipBinaryFile(init), init.options);
  }

  get closed(): boolean {
    return this.closedFlag;
  }

  get mode(): string {
    return this.buffer.mode;
  }

  get name(): string | null {
    return this.buffer.name;
  }

  get mtime(): number | null {
    return this.buffer.mtime;
  }

  get originalFilename(): string | null {
    return this.buffer.originalFilename;
  }

  readable(): boolean {
    this.ensureOpen();
    return this.buffer.readable();
  }

  writable(): boolean {
    this.ensureOpen();
    return this.buffer.writable();
  }

  seekable(): boolean {
    this.ensureOpen();
    return this.buffer.seekable();
  }

  /** Logical character position; doubles as the cookie accepted by `seek()`. */
  tell(): number {
    this.ensureOpen();
    return this.position;
  }

  /** Read up to `size` characters; a negative size reads to end of stream. */
  async read(size = -1): Promise<string> {
    this.ensureReadable();
    if (size === 0) return '';
    return this.guard(async () => {
      if (size < 0) {
        await this.decodeAll();
        return this.deliver(this.text.length);
      }
      let end = codePointOffset(this.text, size);
      while (end < 0 && (await this.decodeMore())) end = codePointOffset(this.text, size);
      return this.deliver(end < 0 ? this.text.length : end);
    });
  }

  /** Read one line including its terminator; with `limit >= 0` at most `limit` characters. */
  async readline(limit = -1): Promise<string> {
    this.ensureReadable();
    return this.guard(async () => {
      let from = 0;
      let stop: number;
      let cut = -1;
      while (true) {
        if (limit >= 0) cut = codePointOffset(this.text, limit);
        const lineEnd = findLineEnd(this.text, this.newline, from);
        if (lineEnd) {
          stop = lineEnd.index + lineEnd.length;
          break;
        }
        if (cut >= 0) {
          stop = cut;
          break;
        }
        // A two-character terminator may straddle the old end of the text.
        from = Math.max(0, this.text.length - 1);
        if (!(await this.decodeMore())) {
          stop = this.text.length;
          break;
        }
      }
      return this.deliver(cut >= 0 ? Math.min(stop, cut) : stop);
    });
  }

  async readlines(hint = -1): Promise<string[]> {
    const lines: string[] = [];
    let total = 0;
    while (true) {
      const line = await this.readline();
      if (line.length === 0) break;
      lines.push(line);
      total += codePointLength(line);
      if (hint > 0 && total >= hint) break;
    }
    return lines;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<string> {
    while (true) {
      const line = await this.readline();
      if (line.length === 0) return;
      yield line;
    }
  }

  /** Encode and write `text`; returns its length in characters. */
  async write(text: string): Promise<number> {
    this.ensureWritable();
    if (typeof text !== 'string') {
      throw new TypeError(`write() argument must be a string, not ${describeType(text)}`);
    }
    return this.guard(async () => {
      const encoded = this.codec.encode(translateForWrite(text, this.newline), this.errors);
      await this.buffer.write(encoded);
      const count = codePointLength(text);
      this.position += count;
      return count;
    });
  }

  async writelines(lines: Iterable<string> | AsyncIterable<string>): Promise<void> {
    for await (const line of lines) {
      await this.write(line);
    }
  }

  async flush(): Promise<void> {
    this.ensureOpen();
    await this.guard(() => this.buffer.flush());
  }

  /**
   * Seek to a position returned by `tell()`. Only 0 and positions recorded
   * by earlier reads (and still cached) can be reached.
   */
  async seek(cookie: number, whence: Whence = 'start'): Promise<number> {
    this.ensureUsable();
    if (!isWhence(whence)) {
      throw new InvalidArgumentError('GZIP_INVALID_OPTION', `Invalid whence (${String(whence)}, should be 'start', 'current' or 'end')`, {
        context: { option: 'whence' }
      });
    }
    if (!Number.isInteger(cookie)) {
      throw new InvalidArgumentError('GZIP_INVALID_OPTION', 'Seek position must be an integer', {
        context: { option: 'offset' }
      });
    }
    if (whence !== 'start' && cookie !== 0) {
      throw new UnsupportedOperationError('GZIP_UNSUPPORTED_SEEK', `Can't do nonzero ${whence}-relative seeks`, {
        context: { whence, offset: String(cookie) }
      });
    }
    if (this.buffer.writable()) {
      if (whence === 'start') {
        throw new UnsupportedOperationError('GZIP_UNSUPPORTED_SEEK', 'Text files in write mode only support tell-style seeks', {
          context: { whence }
        });
      }
      return this.position;
    }
    if (whence === 'current') return this.position;
    return this.guard(async () => {
      if (whence === 'end') {
        do {
          this.position += codePointLength(this.text);
          this.text = '';
        } while (await this.decodeMore());
        this.checkpoint();
        return this.position;
      }
      if (cookie < 0) {
        throw new InvalidArgumentError('GZIP_INVALID_OPTION', `Negative seek position ${cookie}`, {
          context: { option: 'offset' }
        });
      }
      if (cookie === 0) {
        await this.buffer.seek(0);
        this.restore(0, INITIAL_CARRY, '');
        return 0;
      }
      const checkpoint = this.cookies.get(cookie);
      if (!checkpoint) {
        throw new ResourceError('GZIP_UNCACHED_SEEK', `Cannot seek to uncached position ${cookie}`, {
          context: { cookie: String(cookie), cacheSize: String(this.cookies.capacity) }
        });
      }
      await this.buffer.seek(checkpoint.byteOffset);
      this.restore(cookie, checkpoint.carry, checkpoint.text);
      return cookie;
    });
  }

  async rewind(): Promise<void> {
    this.ensureReadable();
    await this.seek(0);
  }

  /** Close the binary handle (finishing the member in write mode). Later calls do nothing. */
  async close(): Promise<void> {
    if (this.closedFlag) return;
    this.closedFlag = true;
    this.text = '';
    this.cookies.clear();
    await this.buffer.close();
  }

  async [Symbol.asyncDispose](): Promise<void> {
    await this.close();
  }

  private restore(position: number, carry: DecodeCarry, text: string): void {
    this.position = position;
    this.carry = carry;
    this.text = text;
    this.decodedToEnd = false;
  }

  /** Hand out the first `end` UTF-16 units of decoded text. */
  private deliver(end: number): string {
    const out = this.text.slice(0, end);
    this.text = this.text.slice(out.length);
    this.position += codePointLength(out);
    this.checkpoint();
    return out;
  }

  private checkpoint(): void {
    this.cookies.set(this.position, {
      byteOffset: this.buffer.tell(),
      carry: this.carry,
      text: this.text
    });
  }

  private async decodeAll(): Promise<void> {
    let more = true;
    while (more) more = await this.decodeMore();
  }

  /** Decode one more chunk. Returns false once everything has been decoded. */
  private async decodeMore(): Promise<boolean> {
    if (this.decodedToEnd) return false;
    const raw = await this.buffer.read1(this.chunkSize);
    const final = raw.length === 0;
    const result = decodeChunk(this.codec, this.errors, this.newline, this.carry, raw, final);
    this.carry = result.carry;
    this.text += result.text;
    if (final) this.decodedToEnd = true;
    return true;
  }

  private async guard<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (this.signal?.aborted) this.poisoned = true;
      throw err;
    }
  }

  private ensureOpen(): void {
    if (this.closedFlag) {
      throw new UnsupportedOperationError('GZIP_CLOSED', 'I/O operation on closed file');
    }
  }

  private ensureUsable(): void {
    this.ensureOpen();
    if (this.poisoned) {
      throw new UnsupportedOperationError('GZIP_HANDLE_POISONED', 'Handle is unusable after an aborted operation');
    }
  }

  private ensureReadable(): void {
    this.ensureUsable();
    if (this.buffer.writable()) {
      throw new UnsupportedOperationError('GZIP_NOT_READABLE', 'File not open for reading', {
        context: { mode: this.mode }
      });
    }
  }

  private ensureWritable(): void {
    this.ensureUsable();
    if (!this.buffer.writable()) {
      throw new UnsupportedOperationError('GZIP_NOT_WRITABLE', 'File not open for writing', {
        context: { mode: this.mode }
      });
    }
  }
}
