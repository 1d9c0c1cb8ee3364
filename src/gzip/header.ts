import { GzipFormatError } from '../errors.js';
import { crc32 } from '../crc32.js';
import { decodeLatin1, encodeLatin1, readUint16LE, readUint32LE, writeUint32LE } from '../binary.js';

export const GZIP_MAGIC_1 = 0x1f;
export const GZIP_MAGIC_2 = 0x8b;
export const GZIP_METHOD_DEFLATE = 8;
export const GZIP_OS_UNKNOWN = 255;

export const FLAG_FHCRC = 0x02;
export const FLAG_FEXTRA = 0x04;
export const FLAG_FNAME = 0x08;
export const FLAG_FCOMMENT = 0x10;
const FLAG_RESERVED = 0xe0;

/** Fixed part of the member header. */
export const GZIP_HEADER_MIN = 10;
export const GZIP_TRAILER_SIZE = 8;

/** Fields of a parsed member header. */
export type GzipMemberHeader = {
  flags: number;
  /** Seconds since the epoch; 0 when the writer did not record one. */
  mtime: number;
  xfl: number;
  os: number;
  filename: string | null;
  comment: string | null;
  extra: Uint8Array | null;
  /** Total header length in bytes, optional fields included. */
  length: number;
};

/**
 * Parse a member header from the front of `data`.
 * Returns null when `data` ends before the header does.
 */
export function parseMemberHeader(data: Uint8Array, memberOffset = 0): GzipMemberHeader | null {
  if (data.length >= 1 && data[0] !== GZIP_MAGIC_1) throw notGzip(memberOffset);
  if (data.length >= 2 && data[1] !== GZIP_MAGIC_2) throw notGzip(memberOffset);
  if (data.length >= 3 && data[2] !== GZIP_METHOD_DEFLATE) {
    throw new GzipFormatError('GZIP_BAD_HEADER', `Unknown compression method ${data[2]!}`, {
      offset: memberOffset + 2,
      context: { method: String(data[2]!) }
    });
  }
  if (data.length < GZIP_HEADER_MIN) return null;

  const flags = data[3]!;
  if ((flags & FLAG_RESERVED) !== 0) {
    throw new GzipFormatError('GZIP_BAD_HEADER', 'Reserved gzip header flags are set', {
      offset: memberOffset + 3,
      context: { flags: String(flags) }
    });
  }
  const mtime = readUint32LE(data, 4);
  let offset = GZIP_HEADER_MIN;

  let extra: Uint8Array | null = null;
  if (flags & FLAG_FEXTRA) {
    if (offset + 2 > data.length) return null;
    const xlen = readUint16LE(data, offset);
    if (offset + 2 + xlen > data.length) return null;
    extra = data.slice(offset + 2, offset + 2 + xlen);
    offset += 2 + xlen;
  }

  let filename: string | null = null;
  if (flags & FLAG_FNAME) {
    const end = data.indexOf(0, offset);
    if (end < 0) return null;
    filename = decodeLatin1(data.subarray(offset, end));
    offset = end + 1;
  }

  let comment: string | null = null;
  if (flags & FLAG_FCOMMENT) {
    const end = data.indexOf(0, offset);
    if (end < 0) return null;
    comment = decodeLatin1(data.subarray(offset, end));
    offset = end + 1;
  }

  if (flags & FLAG_FHCRC) {
    if (offset + 2 > data.length) return null;
    const stored = readUint16LE(data, offset);
    const computed = crc32(data.subarray(0, offset)) & 0xffff;
    if (stored !== computed) {
      throw new GzipFormatError('GZIP_BAD_HEADER', 'Header CRC check failed', {
        offset: memberOffset + offset,
        context: { stored: String(stored), expected: String(computed) }
      });
    }
    offset += 2;
  }

  return { flags, mtime, xfl: data[8]!, os: data[9]!, filename, comment, extra, length: offset };
}

function notGzip(offset: number): GzipFormatError {
  return new GzipFormatError('GZIP_BAD_HEADER', 'Not a gzipped file', { offset });
}

/** Extra-flags byte that records which level the writer used. */
export function extraFlagsForLevel(level: number): number {
  if (level === 9) return 2;
  if (level === 1) return 4;
  return 0;
}

/**
 * Build the header written at the start of a member. The filename is stored
 * as latin-1 and dropped when it has characters latin-1 cannot hold
 * or an embedded NUL.
 */
export function encodeMemberHeader(options: { mtime: number; filename?: string | null; level: number }): Uint8Array {
  const encoded = options.filename ? encodeLatin1(options.filename) : null;
  const name = encoded && encoded.length > 0 && !encoded.includes(0) ? encoded : null;
  const size = GZIP_HEADER_MIN + (name ? name.length + 1 : 0);
  const out = new Uint8Array(size);
  out[0] = GZIP_MAGIC_1;
  out[1] = GZIP_MAGIC_2;
  out[2] = GZIP_METHOD_DEFLATE;
  out[3] = name ? FLAG_FNAME : 0;
  writeUint32LE(out, 4, options.mtime);
  out[8] = extraFlagsForLevel(options.level);
  out[9] = GZIP_OS_UNKNOWN;
  if (name) {
    out.set(name, GZIP_HEADER_MIN);
    out[size - 1] = 0;
  }
  return out;
}

export function encodeTrailer(crc: number, size: number): Uint8Array {
  const out = new Uint8Array(GZIP_TRAILER_SIZE);
  writeUint32LE(out, 0, crc);
  writeUint32LE(out, 4, size);
  return out;
}
