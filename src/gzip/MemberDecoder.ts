import { GzipFormatError, type GzipWarning } from '../errors.js';
import { Crc32 } from '../crc32.js';
import { readUint32LE, concatBytes } from '../binary.js';
import { ByteArena } from '../streams/arena.js';
import { RawInflater } from '../compression/inflate.js';
import { GZIP_TRAILER_SIZE, parseMemberHeader, type GzipMemberHeader } from './header.js';

export type MemberDecoderPhase = 'header' | 'body' | 'trailer' | 'boundary';

export type MemberDecoderOptions = {
  onWarning?: ((warning: GzipWarning) => void) | undefined;
};

/**
 * Push-driven decoder for a stream of concatenated gzip members.
 *
 * Compressed bytes go in through `push()` in slices of any size; the
 * decompressed bytes they complete come back out. Members are chained
 * transparently and zero padding after a trailer is skipped. `finish()`
 * must be called at end of input to detect truncation.
 */
export class MemberDecoder {
  private readonly input = new ByteArena();
  private readonly crc = new Crc32();
  private inflater: RawInflater | null = null;
  private phaseValue: MemberDecoderPhase = 'header';
  private memberSize = 0;
  private memberCount = 0;
  private totalIn = 0;
  private paddingReported = false;
  private firstHeader: GzipMemberHeader | null = null;

  constructor(private readonly options: MemberDecoderOptions = {}) {}

  get phase(): MemberDecoderPhase {
    return this.phaseValue;
  }

  /** Number of members whose trailer has been verified. */
  get members(): number {
    return this.memberCount;
  }

  /** Header of the first member, once parsed. */
  get header(): GzipMemberHeader | null {
    return this.firstHeader;
  }

  push(chunk: Uint8Array): Uint8Array {
    this.totalIn += chunk.length;
    this.input.append(chunk);
    const produced: Uint8Array[] = [];
    let progressed = true;
    while (progressed) progressed = this.step(produced);
    return produced.length === 0 ? new Uint8Array(0) : concatBytes(produced);
  }

  /** Signal end of input. Throws when the input stopped inside a member. */
  finish(): void {
    if (this.phaseValue === 'boundary') return;
    if (this.phaseValue === 'header' && this.totalIn === 0) return;
    throw new GzipFormatError(
      'GZIP_TRUNCATED',
      'Compressed file ended before the end-of-stream marker was reached',
      { offset: this.totalIn, context: { phase: this.phaseValue } }
    );
  }

  private inputOffset(): number {
    return this.totalIn - this.input.length;
  }

  private step(produced: Uint8Array[]): boolean {
    switch (this.phaseValue) {
      case 'header': {
        if (this.input.length === 0) return false;
        const header = parseMemberHeader(this.input.view(), this.inputOffset());
        if (!header) return false;
        if (this.memberCount === 0 && !this.firstHeader) this.firstHeader = header;
        this.input.consume(header.length);
        this.inflater = new RawInflater();
        this.crc.reset();
        this.memberSize = 0;
        this.phaseValue = 'body';
        return true;
      }
      case 'body': {
        const inflater = this.inflater;
        if (!inflater) return false;
        if (this.input.length > 0) inflater.push(this.input.take());
        const out = inflater.inflate();
        if (out.length > 0) {
          this.crc.update(out);
          this.memberSize = (this.memberSize + out.length) >>> 0;
          produced.push(out);
        }
        if (!inflater.done) return false;
        this.input.append(inflater.remainder());
        this.inflater = null;
        this.phaseValue = 'trailer';
        return true;
      }
      case 'trailer': {
        if (this.input.length < GZIP_TRAILER_SIZE) return false;
        const trailer = this.input.view(GZIP_TRAILER_SIZE);
        const storedCrc = readUint32LE(trailer, 0);
        const storedSize = readUint32LE(trailer, 4);
        const offset = this.inputOffset();
        const actualCrc = this.crc.digest();
        if (storedCrc !== actualCrc) {
          throw new GzipFormatError('GZIP_BAD_CRC', 'CRC check failed', {
            offset,
            context: { stored: hex32(storedCrc), computed: hex32(actualCrc) }
          });
        }
        if (storedSize !== this.memberSize) {
          throw new GzipFormatError('GZIP_BAD_SIZE', 'Incorrect length of data produced', {
            offset: offset + 4,
            context: { stored: String(storedSize), computed: String(this.memberSize) }
          });
        }
        this.input.consume(GZIP_TRAILER_SIZE);
        this.memberCount += 1;
        this.phaseValue = 'boundary';
        return true;
      }
      case 'boundary': {
        const view = this.input.view();
        let zeros = 0;
        while (zeros < view.length && view[zeros] === 0) zeros += 1;
        if (zeros > 0) {
          this.reportPadding();
          this.input.consume(zeros);
        }
        if (this.input.length === 0) return false;
        this.phaseValue = 'header';
        return true;
      }
    }
  }

  private reportPadding(): void {
    if (this.paddingReported) return;
    this.paddingReported = true;
    this.options.onWarning?.({
      code: 'GZIP_TRAILING_PADDING',
      message: 'Skipped zero padding after a gzip member',
      context: { offset: String(this.inputOffset()) }
    });
  }
}

function hex32(value: number): string {
  return `0x${value.toString(16).padStart(8, '0')}`;
}
