export { openGzip, type BinaryMode, type TextMode } from './file/open.js';
export { GzipBinaryFile, type Whence } from './file/GzipBinaryFile.js';
export { GzipTextFile } from './file/GzipTextFile.js';
export type { GzipTarget } from './file/target.js';
export { parseMode, type ParsedMode, type ModeOperation } from './file/mode.js';
export type { GzipOpenOptions } from './file/options.js';
export { DEFAULT_OPTIONS, type GzipDefaults } from './defaults.js';
export type { BytesLike } from './binary.js';

export {
  ERROR_SCHEMA_VERSION,
  GzipError,
  GzipFormatError,
  UnsupportedOperationError,
  InvalidArgumentError,
  ResourceError,
  TextCodingError
} from './errors.js';
export type { GzipErrorCode, GzipErrorJson, GzipWarning, GzipWarningCode } from './errors.js';

export { ByteArena } from './streams/arena.js';
export { MemberDecoder, type MemberDecoderPhase, type MemberDecoderOptions } from './gzip/MemberDecoder.js';
export { MemberEncoder, type MemberEncoderOptions } from './gzip/MemberEncoder.js';
export type { GzipMemberHeader } from './gzip/header.js';
export type { DeflateLevel } from './compression/deflate.js';

export { decodeChunk, INITIAL_CARRY, type DecodeCarry, type DecodeResult } from './text/decode.js';
export { lookupCodec, type TextCodec, type CodecName } from './text/codecs.js';
export type { NewlineMode } from './text/newline.js';
export { CookieCache, type TextCheckpoint } from './seek/CookieCache.js';

export {
  isByteSink,
  isByteSource,
  isClosable,
  isFlushable,
  isSeekable,
  type ByteSink,
  type ByteSource,
  type Closable,
  type Flushable,
  type RawByteStream,
  type Seekable
} from './io/types.js';
export { FileStream, type FileOpenFlags } from './io/FileStream.js';
export { MemoryStream } from './io/MemoryStream.js';
export { WebReadableSource, WebWritableSink } from './io/web.js';
