import { raceAbort, throwIfAborted } from '../abort.js';
import { concatBytes, toBytes, type BytesLike } from '../binary.js';
import {
  InvalidArgumentError,
  UnsupportedOperationError,
  wrapCodecError,
  wrapIoError
} from '../errors.js';
import { ByteArena } from '../streams/arena.js';
import { MemberDecoder } from '../gzip/MemberDecoder.js';
import { MemberEncoder } from '../gzip/MemberEncoder.js';
import { isByteSink, isByteSource, isClosable, isFlushable, isSeekable, type RawByteStream } from '../io/types.js';
import type { ParsedMode } from './mode.js';
import type { GzipOpenOptions, ResolvedOptions } from './options.js';
import { openTarget, type GzipFileInit, type GzipTarget } from './target.js';

/** Reference point of a seek offset. */
export type Whence = 'start' | 'current' | 'end';

export function isWhence(value: unknown): value is Whence {
  return value === 'start' || value === 'current' || value === 'end';
}

/**
 * Binary file-like handle over a gzip stream.
 *
 * Reads pull compressed bytes from the source in `chunkSize` reads and keep
 * decompressed bytes in an arena until delivered. Writes collect in a second
 * arena and are compressed in whole `chunkSize` slices.
 */
export class GzipBinaryFile implements AsyncIterable<Uint8Array> {
  readonly mode: string;
  readonly name: string | null;

  private readonly stream: RawByteStream;
  private readonly parsed: ParsedMode;
  private readonly options: ResolvedOptions;
  private readonly ownsStream: boolean;

  private decoder: MemberDecoder;
  private readonly buffer: ByteArena;
  private eof = false;
  private failure: Error | null = null;
  private sourceOffset = 0;

  private readonly encoder: MemberEncoder | null;
  private readonly pending: ByteArena;

  private position = 0;
  private closedFlag = false;
  private poisoned = false;

  constructor(init: GzipFileInit) {
    this.stream = init.stream;
    this.parsed = init.parsed;
    this.options = init.options;
    this.mode = init.parsed.mode;
    this.name = init.name;
    this.ownsStream = init.ownsStream;
    this.decoder = this.createDecoder();
    this.buffer = new ByteArena({ compactionRatio: init.options.compactionRatio });
    this.pending = new ByteArena({ compactionRatio: init.options.compactionRatio });
    this.encoder = init.parsed.writing
      ? new MemberEncoder({
          level: init.options.compressLevel,
          mtime: init.options.mtime,
          filename: init.headerFilename
        })
      : null;
  }

  /** Open a path or wrap a raw byte stream in binary mode. */
  static async open(target: GzipTarget, mode = 'rb', options?: GzipOpenOptions): Promise<GzipBinaryFile> {
    const init = await openTarget(target, mode, options, 'binary');
    return new GzipBinaryFile(init);
  }

  get closed(): boolean {
    return this.closedFlag;
  }

  /** mtime of the first member header; null until it has been read. */
  get mtime(): number | null {
    if (this.encoder) return this.encoder.mtime;
    return this.decoder.header?.mtime ?? null;
  }

  /** Original filename recorded in the first member header, if any. */
  get originalFilename(): string | null {
    if (this.encoder) return this.encoder.filename;
    return this.decoder.header?.filename ?? null;
  }

  readable(): boolean {
    this.ensureOpen();
    return !this.parsed.writing;
  }

  writable(): boolean {
    this.ensureOpen();
    return this.parsed.writing;
  }

  seekable(): boolean {
    this.ensureOpen();
    return this.parsed.writing || isSeekable(this.stream);
  }

  /** Logical position: uncompressed bytes delivered (read) or accepted (write). */
  tell(): number {
    this.ensureOpen();
    return this.position;
  }

  /** Read up to `size` bytes; a negative size reads to end of stream. */
  async read(size = -1): Promise<Uint8Array> {
    this.ensureReadable();
    this.ensureIntact();
    if (size === 0) return new Uint8Array(0);
    return this.guard(async () => {
      await this.fillTo(size < 0 ? Infinity : size);
      return this.deliver(size < 0 ? this.buffer.length : size);
    });
  }

  /** Read up to `size` bytes with at most one pull from the source. */
  async read1(size = -1): Promise<Uint8Array> {
    this.ensureReadable();
    this.ensureIntact();
    if (size === 0) return new Uint8Array(0);
    return this.guard(async () => {
      if (this.buffer.length === 0) await this.fillBuffer();
      return this.deliver(size < 0 ? this.buffer.length : size);
    });
  }

  /** Read into a caller-provided buffer; returns the number of bytes stored. */
  async readInto(target: ArrayBufferView): Promise<number> {
    const view = toBytes(target, 'readInto() argument');
    const data = await this.read(view.length);
    view.set(data);
    return data.length;
  }

  /**
   * Return buffered bytes without consuming them. With `size > 0` the buffer
   * is first filled to `size` bytes or to end of stream; at most `size`
   * bytes come back. With `size <= 0` the source is not touched.
   */
  async peek(size = 0): Promise<Uint8Array> {
    this.ensureReadable();
    this.ensureIntact();
    if (size <= 0) return this.buffer.view().slice();
    return this.guard(async () => {
      await this.fillTo(size);
      return this.buffer.view(size).slice();
    });
  }

  /** Read one `\n`-terminated line; with `limit >= 0` at most `limit` bytes. */
  async readline(limit = -1): Promise<Uint8Array> {
    this.ensureReadable();
    this.ensureIntact();
    return this.guard(async () => {
      let searchFrom = 0;
      let end: number;
      while (true) {
        const newline = this.buffer.indexOf(0x0a, searchFrom);
        if (newline >= 0) {
          end = newline + 1;
          break;
        }
        if (limit >= 0 && this.buffer.length >= limit) {
          end = limit;
          break;
        }
        searchFrom = this.buffer.length;
        if (!(await this.fillBuffer())) {
          end = this.buffer.length;
          break;
        }
      }
      return this.deliver(limit >= 0 ? Math.min(end, limit) : end);
    });
  }

  /** Read lines until end of stream, or until their total length reaches `hint` when positive. */
  async readlines(hint = -1): Promise<Uint8Array[]> {
    const lines: Uint8Array[] = [];
    let total = 0;
    while (true) {
      const line = await this.readline();
      if (line.length === 0) break;
      lines.push(line);
      total += line.length;
      if (hint > 0 && total >= hint) break;
    }
    return lines;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<Uint8Array> {
    while (true) {
      const line = await this.readline();
      if (line.length === 0) return;
      yield line;
    }
  }

  /** Queue bytes for compression; returns the number of bytes accepted. */
  async write(data: BytesLike): Promise<number> {
    const encoder = this.ensureWritable();
    const bytes = toBytes(data, 'write() argument');
    if (bytes.length === 0) return 0;
    return this.guard(async () => {
      this.pending.append(bytes);
      this.position += bytes.length;
      const chunkSize = this.options.chunkSize;
      while (this.pending.length >= chunkSize) {
        const compressed = this.compress(() => encoder.encode(this.pending.take(chunkSize)));
        await this.sinkWrite(compressed);
      }
      return bytes.length;
    });
  }

  async writelines(lines: Iterable<BytesLike> | AsyncIterable<BytesLike>): Promise<void> {
    for await (const line of lines) {
      await this.write(line);
    }
  }

  /** Compress pending bytes up to a sync-flush point and flush the sink when it can be flushed. */
  async flush(): Promise<void> {
    this.ensureOpen();
    const encoder = this.encoder;
    if (!encoder) return;
    await this.guard(async () => {
      const pending = this.pending.take();
      const compressed = this.compress(() => concatBytes([encoder.encode(pending), encoder.flush()]));
      await this.sinkWrite(compressed);
      if (isFlushable(this.stream)) {
        const stream = this.stream;
        await this.io('flush', () => stream.flush());
      }
    });
  }

  /**
   * Move to an absolute position (`'start'`), or report the current one
   * (`'current'`) or the end (`'end'`) with a zero offset.
   */
  async seek(offset: number, whence: Whence = 'start'): Promise<number> {
    this.ensureUsable();
    if (!isWhence(whence)) {
      throw new InvalidArgumentError('GZIP_INVALID_OPTION', `Invalid whence (${String(whence)}, should be 'start', 'current' or 'end')`, {
        context: { option: 'whence' }
      });
    }
    if (!Number.isInteger(offset)) {
      throw new InvalidArgumentError('GZIP_INVALID_OPTION', 'Seek offset must be an integer', {
        context: { option: 'offset' }
      });
    }
    if (whence !== 'start' && offset !== 0) {
      throw new UnsupportedOperationError('GZIP_UNSUPPORTED_SEEK', `Can't do nonzero ${whence}-relative seeks`, {
        context: { whence, offset: String(offset) }
      });
    }
    if (this.parsed.writing) return this.seekWriting(offset, whence);
    if (whence === 'current') return this.position;
    return this.guard(async () => {
      if (whence === 'end') {
        await this.skip(Infinity);
        return this.position;
      }
      if (offset < 0) {
        throw new InvalidArgumentError('GZIP_INVALID_OPTION', `Negative seek position ${offset}`, {
          context: { option: 'offset' }
        });
      }
      if (offset < this.position) await this.restart();
      await this.skip(offset - this.position);
      return this.position;
    });
  }

  /** Return to the start of the stream. */
  async rewind(): Promise<void> {
    this.ensureReadable();
    await this.seek(0);
  }

  /**
   * Finish the gzip member in write mode and close the stream when the handle
   * owns it. Later calls do nothing.
   */
  async close(): Promise<void> {
    if (this.closedFlag) return;
    this.closedFlag = true;
    try {
      const encoder = this.encoder;
      if (encoder && !this.poisoned && !encoder.finished) {
        const pending = this.pending.take();
        const compressed = this.compress(() => concatBytes([encoder.encode(pending), encoder.finish()]));
        await this.sinkWrite(compressed);
      }
    } finally {
      this.buffer.clear();
      if (this.ownsStream && isClosable(this.stream)) {
        const stream = this.stream;
        await this.io('close', () => stream.close());
      }
    }
  }

  async [Symbol.asyncDispose](): Promise<void> {
    await this.close();
  }

  private createDecoder(): MemberDecoder {
    return new MemberDecoder({ onWarning: this.options.onWarning });
  }

  private deliver(count: number): Uint8Array {
    const out = this.buffer.take(count);
    this.position += out.length;
    return out;
  }

  /**
   * Pull one read from the source. Returns false once the stream is exhausted.
   * A decoding failure sticks: every later pull raises it again.
   */
  private async fillBuffer(): Promise<boolean> {
    if (this.failure) throw this.failure;
    while (!this.eof) {
      const source = this.stream;
      if (!isByteSource(source)) return false;
      const raw = await this.io('read', () => source.read(this.options.chunkSize));
      this.sourceOffset += raw.length;
      if (raw.length === 0) {
        this.decode(() => this.decoder.finish());
        this.eof = true;
        return false;
      }
      const out = this.decode(() => this.decoder.push(raw));
      if (out.length > 0) {
        this.buffer.append(out);
        return true;
      }
    }
    return false;
  }

  private async fillTo(size: number): Promise<void> {
    while (this.buffer.length < size) {
      if (!(await this.fillBuffer())) return;
    }
  }

  private async skip(count: number): Promise<void> {
    let remaining = count;
    while (remaining > 0) {
      if (this.buffer.length === 0 && !(await this.fillBuffer())) return;
      const step = Math.min(remaining, this.buffer.length);
      this.buffer.consume(step);
      this.position += step;
      remaining -= step;
    }
  }

  /** Rewind the source to offset 0 and start decoding from scratch. */
  private async restart(): Promise<void> {
    const stream = this.stream;
    if (!isSeekable(stream)) {
      throw new UnsupportedOperationError('GZIP_NOT_SEEKABLE', 'Underlying stream does not support seeking', {
        context: { operation: 'rewind' }
      });
    }
    await this.io('seek', () => stream.seek(0));
    this.sourceOffset = 0;
    this.decoder = this.createDecoder();
    this.buffer.clear();
    this.eof = false;
    this.failure = null;
    this.position = 0;
  }

  private async seekWriting(offset: number, whence: Whence): Promise<number> {
    if (whence !== 'start') return this.position;
    if (offset < this.position) {
      throw new UnsupportedOperationError('GZIP_UNSUPPORTED_SEEK', 'Negative seek in write mode', {
        context: { offset: String(offset), position: String(this.position) }
      });
    }
    let remaining = offset - this.position;
    while (remaining > 0) {
      const step = Math.min(remaining, this.options.chunkSize);
      await this.write(new Uint8Array(step));
      remaining -= step;
    }
    return this.position;
  }

  private decode<T>(fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      this.failure = wrapCodecError(err, 'decompression');
      throw this.failure;
    }
  }

  private compress<T>(fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      throw wrapCodecError(err, 'compression');
    }
  }

  private async sinkWrite(chunk: Uint8Array): Promise<void> {
    if (chunk.length === 0) return;
    const sink = this.stream;
    if (!isByteSink(sink)) return;
    await this.io('write', () => sink.write(chunk));
  }

  /** Run one call on the underlying stream: abort-aware, with failures wrapped. */
  private async io<T>(operation: string, fn: () => Promise<T> | T): Promise<T> {
    const signal = this.options.signal;
    throwIfAborted(signal);
    try {
      return await raceAbort(Promise.resolve().then(fn), signal);
    } catch (err) {
      if (signal?.aborted) throw err;
      throw wrapIoError(err, operation, this.sourceOffset);
    }
  }

  /** Mark the handle unusable when an operation is cut short by its abort signal. */
  private async guard<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (this.options.signal?.aborted) this.poisoned = true;
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

  /** Decoded bytes are not handed out once the stream has proven corrupt. */
  private ensureIntact(): void {
    if (this.failure) throw this.failure;
  }

  private ensureReadable(): void {
    this.ensureUsable();
    if (this.parsed.writing) {
      throw new UnsupportedOperationError('GZIP_NOT_READABLE', 'File not open for reading', {
        context: { mode: this.mode }
      });
    }
  }

  private ensureWritable(): MemberEncoder {
    this.ensureUsable();
    if (!this.encoder) {
      throw new UnsupportedOperationError('GZIP_NOT_WRITABLE', 'File not open for writing', {
        context: { mode: this.mode }
      });
    }
    return this.encoder;
  }
}
