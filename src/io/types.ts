/**
 * Capabilities a raw byte stream may offer. A handle checks for each one at
 * run time and only calls what the stream actually has.
 */
export interface ByteSource {
  /** Read up to `size` bytes; an empty result means end of stream. */
  read(size: number): Promise<Uint8Array>;
}

export interface ByteSink {
  write(chunk: Uint8Array): Promise<void> | void;
}

export interface Seekable {
  /** Move to an absolute byte offset. */
  seek(offset: number): Promise<void> | void;
}

export interface Flushable {
  flush(): Promise<void> | void;
}

export interface Closable {
  close(): Promise<void> | void;
}

/** Anything that can be handed to `openGzip` in place of a path. */
export type RawByteStream = Partial<ByteSource & ByteSink & Seekable & Flushable & Closable>;

function hasMethod(value: unknown, name: string): boolean {
  return typeof value === 'object' && value !== null && typeof Reflect.get(value, name) === 'function';
}

export function isByteSource(value: unknown): value is ByteSource {
  return hasMethod(value, 'read');
}

export function isByteSink(value: unknown): value is ByteSink {
  return hasMethod(value, 'write');
}

export function isSeekable(value: unknown): value is Seekable {
  return hasMethod(value, 'seek');
}

export function isFlushable(value: unknown): value is Flushable {
  return hasMethod(value, 'flush');
}

export function isClosable(value: unknown): value is Closable {
  return hasMethod(value, 'close');
}
