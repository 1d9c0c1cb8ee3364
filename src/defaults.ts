/** Tunables shared by every handle; any of them can be overridden per open call. */
export type GzipDefaults = {
  compressLevel: number;
  chunkSize: number;
  encoding: string;
  errors: string;
  cookieCacheSize: number;
  compactionRatio: number;
};

const DEFAULTS = Object.freeze({
  compressLevel: 6,
  chunkSize: 64 * 1024,
  encoding: 'utf-8',
  errors: 'strict',
  cookieCacheSize: 1000,
  compactionRatio: 0.5
} satisfies GzipDefaults);

export const DEFAULT_OPTIONS: Readonly<GzipDefaults> = DEFAULTS;

/** Largest value the 32-bit header mtime and trailer size fields can hold. */
export const MAX_UINT32 = 0xffffffff;
