import { Crc32 } from '../crc32.js';
import { concatBytes } from '../binary.js';
import { RawDeflater, type DeflateLevel } from '../compression/deflate.js';
import { encodeMemberHeader, encodeTrailer } from './header.js';

export type MemberEncoderOptions = {
  level: DeflateLevel;
  /** Header mtime in seconds; null records the time the header is produced. */
  mtime: number | null;
  filename?: string | null | undefined;
};

/** Produces one gzip member: header, deflate payload and trailer. */
export class MemberEncoder {
  private readonly deflater: RawDeflater;
  private readonly crc = new Crc32();
  private size = 0;
  private headerWritten = false;
  private headerMtime: number | null;
  private done = false;

  constructor(private readonly options: MemberEncoderOptions) {
    this.deflater = new RawDeflater(options.level);
    this.headerMtime = options.mtime;
  }

  /** mtime recorded in the header; null while it is still to be taken from the clock. */
  get mtime(): number | null {
    return this.headerMtime;
  }

  get filename(): string | null {
    return this.options.filename ?? null;
  }

  get finished(): boolean {
    return this.done;
  }

  encode(data: Uint8Array): Uint8Array {
    this.crc.update(data);
    this.size = (this.size + data.length) >>> 0;
    return this.withHeader(this.deflater.compress(data));
  }

  flush(): Uint8Array {
    return this.withHeader(this.deflater.flush());
  }

  finish(): Uint8Array {
    const body = this.withHeader(this.deflater.finish());
    this.done = true;
    return concatBytes([body, encodeTrailer(this.crc.digest(), this.size)]);
  }

  private withHeader(body: Uint8Array): Uint8Array {
    if (this.headerWritten) return body;
    this.headerWritten = true;
    const mtime = this.headerMtime ?? Math.floor(Date.now() / 1000);
    this.headerMtime = mtime;
    const header = encodeMemberHeader({
      mtime,
      filename: this.options.filename ?? null,
      level: this.options.level
    });
    return body.length === 0 ? header : concatBytes([header, body]);
  }
}
