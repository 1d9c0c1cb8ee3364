import { constants } from 'pako';
import * as zlib from 'pako/lib/zlib/inflate.js';
import { GzipFormatError, ResourceError } from '../errors.js';
import { concatBytes } from '../binary.js';

type ZStream = Parameters<typeof zlib.inflateInit2>[0];

const OUTPUT_CHUNK_SIZE = 64 * 1024;
const RAW_WINDOW_BITS = -15;
const EMPTY = new Uint8Array(0);

/**
 * Incremental raw-deflate (RFC 1951) decoder over pako's zlib port.
 *
 * Input is pushed in arbitrary slices; `inflate()` decodes as far as the
 * buffered input allows and returns the bytes produced. Once the final block
 * ends, `done` turns true and `remainder()` hands back every input byte past
 * the end of the deflate stream, which is where a gzip trailer starts.
 */
export class RawInflater {
  private readonly strm: ZStream = {
    input: null,
    next_in: 0,
    avail_in: 0,
    total_in: 0,
    output: null,
    next_out: 0,
    avail_out: 0,
    total_out: 0,
    msg: '',
    state: null,
    data_type: 0,
    adler: 0
  };
  private output = new Uint8Array(OUTPUT_CHUNK_SIZE);
  private ended = false;

  constructor() {
    const ret = zlib.inflateInit2(this.strm, RAW_WINDOW_BITS);
    if (ret !== constants.Z_OK) {
      throw new ResourceError('GZIP_CODEC_FAILURE', `Unexpected error during decompression: ${this.detail(ret)}`, {
        context: { operation: 'decompression' }
      });
    }
  }

  get done(): boolean {
    return this.ended;
  }

  push(chunk: Uint8Array): void {
    if (chunk.length === 0) return;
    const pending = this.unread();
    // The engine keeps no pointer into earlier input between calls.
    this.strm.input = pending.length === 0 ? chunk : concatBytes([pending, chunk]);
    this.strm.next_in = 0;
    this.strm.avail_in = this.strm.input.length;
  }

  inflate(): Uint8Array {
    if (this.ended) return EMPTY;
    const produced: Uint8Array[] = [];
    while (true) {
      this.strm.output = this.output;
      this.strm.next_out = 0;
      this.strm.avail_out = this.output.length;
      const ret = zlib.inflate(this.strm, constants.Z_NO_FLUSH);
      const written = this.output.length - this.strm.avail_out;
      if (written > 0) produced.push(this.output.slice(0, written));
      if (ret === constants.Z_STREAM_END) {
        this.ended = true;
        zlib.inflateEnd(this.strm);
        break;
      }
      if (ret === constants.Z_BUF_ERROR) break;
      if (ret !== constants.Z_OK) {
        throw new GzipFormatError('GZIP_BAD_DEFLATE', `Invalid deflate data: ${this.detail(ret)}`);
      }
      if (this.strm.avail_out > 0) break;
    }
    const out = concatBytes(produced);
    return out.length === 0 ? EMPTY : out;
  }

  /** Unconsumed input after the final block; empty until `done`. */
  remainder(): Uint8Array {
    if (!this.ended) return EMPTY;
    const rest = this.unread().slice();
    this.strm.input = null;
    this.strm.avail_in = 0;
    return rest;
  }

  private unread(): Uint8Array {
    const input = this.strm.input;
    if (!input || this.strm.avail_in === 0) return EMPTY;
    return input.subarray(this.strm.next_in, this.strm.next_in + this.strm.avail_in);
  }

  private detail(ret: number): string {
    return this.strm.msg || `error code ${ret}`;
  }
}
