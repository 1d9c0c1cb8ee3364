import { InvalidArgumentError, type GzipWarning } from '../errors.js';
import { DEFAULT_OPTIONS, MAX_UINT32 } from '../defaults.js';
import { isDeflateLevel, type DeflateLevel } from '../compression/deflate.js';
import { lookupCodec } from '../text/codecs.js';
import { isNewlineMode, type NewlineMode } from '../text/newline.js';
import type { ParsedMode } from './mode.js';

export type GzipOpenOptions = {
  /** Text encoding (text modes only). */
  encoding?: string | null | undefined;
  /** Codec error handler name (text modes only); looked up when first needed. */
  errors?: string | null | undefined;
  newline?: NewlineMode | undefined;
  /** Deflate level, -1 to 9. Only checked when writing. */
  compressLevel?: number | undefined;
  chunkSize?: number | undefined;
  /** Header mtime in seconds since the epoch; null or omitted uses the current time. */
  mtime?: number | null | undefined;
  /** Name stored in the header instead of the one derived from the path. */
  originalFilename?: string | null | undefined;
  /** Close the underlying stream on close(); defaults to true for paths and false for streams. */
  closeStream?: boolean | undefined;
  cookieCacheSize?: number | undefined;
  /** Dead-prefix share of the read buffer above which it is compacted instead of grown. */
  compactionRatio?: number | undefined;
  signal?: AbortSignal | undefined;
  onWarning?: ((warning: GzipWarning) => void) | undefined;
};

export type ResolvedOptions = {
  encoding: string;
  errors: string;
  newline: NewlineMode;
  compressLevel: DeflateLevel;
  chunkSize: number;
  mtime: number | null;
  originalFilename: string | null;
  closeStream: boolean | undefined;
  cookieCacheSize: number;
  compactionRatio: number;
  signal: AbortSignal | undefined;
  onWarning: ((warning: GzipWarning) => void) | undefined;
};

function invalidOption(option: string, message: string): InvalidArgumentError {
  return new InvalidArgumentError('GZIP_INVALID_OPTION', message, { context: { option } });
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

/** Validate caller options against the parsed mode and fill in defaults. */
export function resolveOptions(parsed: ParsedMode, options: GzipOpenOptions = {}): ResolvedOptions {
  if (!parsed.text) {
    for (const key of ['encoding', 'errors', 'newline'] as const) {
      const value = options[key];
      if (value !== undefined && value !== null) {
        throw invalidOption(key, `Argument '${key}' not supported in binary mode`);
      }
    }
  }

  const encoding = options.encoding ?? DEFAULT_OPTIONS.encoding;
  if (typeof encoding !== 'string') throw invalidOption('encoding', 'encoding must be a string');
  if (parsed.text) lookupCodec(encoding);

  const errors = options.errors ?? DEFAULT_OPTIONS.errors;
  if (typeof errors !== 'string') throw invalidOption('errors', 'errors must be a string');

  const newline = options.newline === undefined ? null : options.newline;
  if (!isNewlineMode(newline)) throw invalidOption('newline', `illegal newline value: ${JSON.stringify(newline)}`);

  let compressLevel: DeflateLevel = 6;
  const requestedLevel = options.compressLevel ?? DEFAULT_OPTIONS.compressLevel;
  if (parsed.writing) {
    if (!isDeflateLevel(requestedLevel)) {
      throw invalidOption('compressLevel', `Compression level must be between -1 and 9, got ${String(requestedLevel)}`);
    }
    compressLevel = requestedLevel;
  }

  const chunkSize = options.chunkSize ?? DEFAULT_OPTIONS.chunkSize;
  if (!isPositiveInteger(chunkSize)) throw invalidOption('chunkSize', 'Chunk size must be a positive integer');

  const mtime = options.mtime ?? null;
  if (mtime !== null && !(Number.isInteger(mtime) && mtime >= 0 && mtime <= MAX_UINT32)) {
    throw invalidOption('mtime', `mtime must be an integer between 0 and ${MAX_UINT32}`);
  }

  const originalFilename = options.originalFilename ?? null;
  if (originalFilename !== null && typeof originalFilename !== 'string') {
    throw invalidOption('originalFilename', 'originalFilename must be a string');
  }

  if (options.closeStream !== undefined && typeof options.closeStream !== 'boolean') {
    throw invalidOption('closeStream', 'closeStream must be a boolean');
  }

  const cookieCacheSize = options.cookieCacheSize ?? DEFAULT_OPTIONS.cookieCacheSize;
  if (!isPositiveInteger(cookieCacheSize)) {
    throw invalidOption('cookieCacheSize', 'cookieCacheSize must be a positive integer');
  }

  const compactionRatio = options.compactionRatio ?? DEFAULT_OPTIONS.compactionRatio;
  if (!(typeof compactionRatio === 'number' && compactionRatio > 0 && compactionRatio <= 1)) {
    throw invalidOption('compactionRatio', 'compactionRatio must be in (0, 1]');
  }

  return {
    encoding,
    errors,
    newline,
    compressLevel,
    chunkSize,
    mtime,
    originalFilename,
    closeStream: options.closeStream,
    cookieCacheSize,
    compactionRatio,
    signal: options.signal,
    onWarning: options.onWarning
  };
}
