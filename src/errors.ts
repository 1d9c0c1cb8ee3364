/** Version of the JSON shape produced by `GzipError.toJSON()`. */
export const ERROR_SCHEMA_VERSION = '1';

/** Stable error codes. */
export type GzipErrorCode =
  | 'GZIP_BAD_HEADER'
  | 'GZIP_BAD_DEFLATE'
  | 'GZIP_BAD_CRC'
  | 'GZIP_BAD_SIZE'
  | 'GZIP_TRUNCATED'
  | 'GZIP_UNSUPPORTED_SEEK'
  | 'GZIP_CLOSED'
  | 'GZIP_NOT_READABLE'
  | 'GZIP_NOT_WRITABLE'
  | 'GZIP_NOT_SEEKABLE'
  | 'GZIP_HANDLE_POISONED'
  | 'GZIP_INVALID_MODE'
  | 'GZIP_INVALID_OPTION'
  | 'GZIP_UNKNOWN_ENCODING'
  | 'GZIP_UNKNOWN_ERROR_HANDLER'
  | 'GZIP_IO_FAILED'
  | 'GZIP_CODEC_FAILURE'
  | 'GZIP_UNCACHED_SEEK'
  | 'GZIP_TEXT_DECODE'
  | 'GZIP_TEXT_ENCODE';

export type GzipErrorOptions = {
  /** Byte offset related to the error, if available. */
  offset?: number | undefined;
  context?: Record<string, string> | undefined;
  cause?: unknown;
};

export type GzipErrorJson = {
  schemaVersion: string;
  name: string;
  code: GzipErrorCode;
  message: string;
  hint: string;
  context: Record<string, string>;
  offset?: number;
};

const RESERVED_CONTEXT_KEYS = new Set<string>(['schemaVersion', 'name', 'code', 'message', 'hint', 'context', 'offset']);

/** Base class of every error raised by this package. */
export class GzipError extends Error {
  /** Machine-readable error code. */
  readonly code: GzipErrorCode;
  readonly offset?: number | undefined;
  override readonly cause?: unknown;
  readonly context?: Record<string, string> | undefined;

  constructor(code: GzipErrorCode, message: string, options?: GzipErrorOptions) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'GzipError';
    this.code = code;
    this.offset = options?.offset;
    this.context = options?.context;
    this.cause = options?.cause;
  }

  /** JSON-safe serialization; context keys that would shadow top-level fields are dropped. */
  toJSON(): GzipErrorJson {
    const context: Record<string, string> = {};
    for (const [key, value] of Object.entries(this.context ?? {})) {
      if (RESERVED_CONTEXT_KEYS.has(key)) continue;
      context[key] = value;
    }
    return {
      schemaVersion: ERROR_SCHEMA_VERSION,
      name: this.name,
      code: this.code,
      message: this.message,
      hint: this.message,
      context,
      ...(this.offset !== undefined ? { offset: this.offset } : {})
    };
  }
}

/** Corrupt or truncated gzip data: bad header, bad deflate data, CRC or size mismatch. */
export class GzipFormatError extends GzipError {
  constructor(
    code: 'GZIP_BAD_HEADER' | 'GZIP_BAD_DEFLATE' | 'GZIP_BAD_CRC' | 'GZIP_BAD_SIZE' | 'GZIP_TRUNCATED',
    message: string,
    options?: GzipErrorOptions
  ) {
    super(code, message, options);
    this.name = 'GzipFormatError';
  }
}

/** Operation not available on this handle in its current mode or state. */
export class UnsupportedOperationError extends GzipError {
  constructor(
    code:
      | 'GZIP_UNSUPPORTED_SEEK'
      | 'GZIP_CLOSED'
      | 'GZIP_NOT_READABLE'
      | 'GZIP_NOT_WRITABLE'
      | 'GZIP_NOT_SEEKABLE'
      | 'GZIP_HANDLE_POISONED',
    message: string,
    options?: GzipErrorOptions
  ) {
    super(code, message, options);
    this.name = 'UnsupportedOperationError';
  }
}

/** Malformed mode string or option value. */
export class InvalidArgumentError extends GzipError {
  constructor(
    code: 'GZIP_INVALID_MODE' | 'GZIP_INVALID_OPTION' | 'GZIP_UNKNOWN_ENCODING' | 'GZIP_UNKNOWN_ERROR_HANDLER',
    message: string,
    options?: GzipErrorOptions
  ) {
    super(code, message, options);
    this.name = 'InvalidArgumentError';
  }
}

/** Failure of the underlying byte source/sink or of the compression engine. */
export class ResourceError extends GzipError {
  constructor(
    code: 'GZIP_IO_FAILED' | 'GZIP_CODEC_FAILURE' | 'GZIP_UNCACHED_SEEK',
    message: string,
    options?: GzipErrorOptions
  ) {
    super(code, message, options);
    this.name = 'ResourceError';
  }
}

/** Text could not be decoded from, or encoded to, the configured encoding. */
export class TextCodingError extends GzipError {
  constructor(code: 'GZIP_TEXT_DECODE' | 'GZIP_TEXT_ENCODE', message: string, options?: GzipErrorOptions) {
    super(code, message, options);
    this.name = 'TextCodingError';
  }
}

/** Non-fatal conditions reported through the `onWarning` option. */
export type GzipWarningCode = 'GZIP_TRAILING_PADDING';

export type GzipWarning = {
  code: GzipWarningCode;
  message: string;
  context?: Record<string, string>;
};

/** Wrap a failure of the external stream, keeping the original error as `cause`. */
export function wrapIoError(err: unknown, operation: string, offset: number): GzipError {
  if (err instanceof GzipError) return err;
  const detail = err instanceof Error ? err.message : String(err);
  return new ResourceError('GZIP_IO_FAILED', `Error during ${operation}: ${detail}`, {
    offset,
    context: { operation },
    cause: err
  });
}

/** Wrap an unexpected (non-validation) failure of the compression engine. */
export function wrapCodecError(err: unknown, operation: string): GzipError {
  if (err instanceof GzipError) return err;
  const detail = err instanceof Error ? err.message : String(err);
  return new ResourceError('GZIP_CODEC_FAILURE', `Unexpected error during ${operation}: ${detail}`, {
    context: { operation },
    cause: err
  });
}
