import { basename } from 'node:path';
import { fileURLToPath } from 'node:url';
import { describeType } from '../binary.js';
import { InvalidArgumentError, wrapIoError } from '../errors.js';
import { FileStream } from '../io/FileStream.js';
import { isByteSink, isByteSource, type RawByteStream } from '../io/types.js';
import { fileFlagsFor, parseMode, type ParsedMode } from './mode.js';
import { resolveOptions, type GzipOpenOptions, type ResolvedOptions } from './options.js';

/** A filesystem path, or an already-open raw byte stream. */
export type GzipTarget = string | URL | RawByteStream;

/** Everything a handle is built from. */
export type GzipFileInit = {
  stream: RawByteStream;
  parsed: ParsedMode;
  options: ResolvedOptions;
  /** Path the handle was opened from, or null for a caller-supplied stream. */
  name: string | null;
  ownsStream: boolean;
  headerFilename: string | null;
};

export type HandleKind = 'binary' | 'text' | 'auto';

/** Name to store in the header: the explicit one, else the path, as a basename without `.gz`. */
export function deriveHeaderFilename(explicit: string | null, path: string | null): string | null {
  const candidate = explicit ?? path;
  if (candidate === null) return null;
  const base = basename(candidate);
  const stripped = base.endsWith('.gz') ? base.slice(0, -3) : base;
  return stripped.length > 0 ? stripped : null;
}

function targetError(message: string): InvalidArgumentError {
  return new InvalidArgumentError('GZIP_INVALID_OPTION', message, { context: { option: 'target' } });
}

/**
 * Validate mode and options, then open the path or check the stream's
 * capabilities. Binary handles refuse `t`; text handles refuse `b`.
 */
export async function openTarget(
  target: unknown,
  mode: unknown,
  options: GzipOpenOptions | undefined,
  kind: HandleKind
): Promise<GzipFileInit> {
  const parsedMode = parseMode(mode);
  if (kind === 'binary' && parsedMode.text) {
    throw new InvalidArgumentError('GZIP_INVALID_MODE', "Binary mode cannot include text ('t')", {
      context: { mode: parsedMode.mode }
    });
  }
  if (kind === 'text' && parsedMode.explicitBinary) {
    throw new InvalidArgumentError('GZIP_INVALID_MODE', "Text mode cannot include binary ('b')", {
      context: { mode: parsedMode.mode }
    });
  }
  const parsed: ParsedMode = kind === 'text' ? { ...parsedMode, text: true } : parsedMode;
  const resolved = resolveOptions(parsed, options);

  if (typeof target === 'string' || target instanceof URL) {
    const path = typeof target === 'string' ? target : fileURLToPath(target);
    if (path.length === 0) throw targetError('Filename cannot be empty');
    let stream: FileStream;
    try {
      stream = await FileStream.open(path, fileFlagsFor(parsed));
    } catch (err) {
      throw wrapIoError(err, 'open', 0);
    }
    return {
      stream,
      parsed,
      options: resolved,
      name: path,
      ownsStream: resolved.closeStream ?? true,
      headerFilename: deriveHeaderFilename(resolved.originalFilename, path)
    };
  }

  if (typeof target !== 'object' || target === null) {
    throw targetError(`Target must be a path or a byte stream, not ${describeType(target)}`);
  }
  let stream: RawByteStream;
  if (parsed.writing) {
    if (!isByteSink(target)) throw targetError('Stream must provide write(chunk) for writing');
    stream = target;
  } else {
    if (!isByteSource(target)) throw targetError('Stream must provide read(size) for reading');
    stream = target;
  }
  return {
    stream,
    parsed,
    options: resolved,
    name: null,
    ownsStream: resolved.closeStream ?? false,
    headerFilename: deriveHeaderFilename(resolved.originalFilename, null)
  };
}
