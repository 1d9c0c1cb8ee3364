import { InvalidArgumentError, TextCodingError } from '../errors.js';
import { decodeLatin1 } from '../binary.js';
import { isHighSurrogate, isLowSurrogate } from './codePoints.js';

/** Error handlers the codecs implement. Other names are rejected when first needed. */
export type KnownErrorHandler = 'strict' | 'replace' | 'ignore';

export type CodecName = 'utf-8' | 'utf-16-le' | 'latin-1' | 'ascii';

export interface TextCodec {
  readonly name: CodecName;
  /**
   * Length of the trailing run of `bytes` that starts a character but does
   * not finish it. Those bytes are held back until more input arrives.
   */
  incompleteTail(bytes: Uint8Array): number;
  decode(bytes: Uint8Array, errors: string): string;
  encode(text: string, errors: string): Uint8Array;
}

const REPLACEMENT_CHAR = '\ufffd';
const ENCODE_REPLACEMENT = 0x3f;

export function resolveErrorHandler(errors: string): KnownErrorHandler {
  if (errors === 'strict' || errors === 'replace' || errors === 'ignore') return errors;
  throw new InvalidArgumentError('GZIP_UNKNOWN_ERROR_HANDLER', `unknown error handler name '${errors}'`, {
    context: { errors }
  });
}

function decodeFailure(codec: CodecName, bytes: Uint8Array, start: number, end: number, reason: string): TextCodingError {
  const detail =
    end - start === 1
      ? `byte 0x${hexByte(bytes[start] ?? 0)} in position ${start}`
      : `bytes in position ${start}-${end - 1}`;
  return new TextCodingError('GZIP_TEXT_DECODE', `'${codec}' codec can't decode ${detail}: ${reason}`, {
    context: { encoding: codec, start: String(start), end: String(end), reason }
  });
}

function encodeFailure(codec: CodecName, text: string, start: number, end: number, reason: string): TextCodingError {
  const code = text.charCodeAt(start);
  return new TextCodingError(
    'GZIP_TEXT_ENCODE',
    `'${codec}' codec can't encode character '\\u${code.toString(16).padStart(4, '0')}' in position ${start}: ${reason}`,
    { context: { encoding: codec, start: String(start), end: String(end), reason } }
  );
}

function hexByte(value: number): string {
  return value.toString(16).padStart(2, '0');
}

/** Apply a decode error handler to an invalid byte range; returns the substitute text. */
function onDecodeError(codec: CodecName, errors: string, bytes: Uint8Array, start: number, end: number, reason: string): string {
  const handler = resolveErrorHandler(errors);
  if (handler === 'strict') throw decodeFailure(codec, bytes, start, end, reason);
  return handler === 'replace' ? REPLACEMENT_CHAR : '';
}

/** Apply an encode error handler to an unencodable code unit range; returns substitute bytes. */
function onEncodeError(codec: CodecName, errors: string, text: string, start: number, end: number, reason: string): number[] {
  const handler = resolveErrorHandler(errors);
  if (handler === 'strict') throw encodeFailure(codec, text, start, end, reason);
  return handler === 'replace' ? [ENCODE_REPLACEMENT] : [];
}

/**
 * Visit each code point of `text`, calling `onLone` for unpaired surrogates.
 * Returns the well-formed string rebuilt from the pieces.
 */
function replaceLoneSurrogates(text: string, onLone: (index: number) => string): string {
  let out = '';
  let runStart = 0;
  for (let i = 0; i < text.length; i += 1) {
    const code = text.charCodeAt(i);
    if (isHighSurrogate(code) && i + 1 < text.length && isLowSurrogate(text.charCodeAt(i + 1))) {
      i += 1;
      continue;
    }
    if (isHighSurrogate(code) || isLowSurrogate(code)) {
      out += text.slice(runStart, i) + onLone(i);
      runStart = i + 1;
    }
  }
  return runStart === 0 ? text : out + text.slice(runStart);
}

const LONE_SURROGATE = /[\ud800-\udbff](?![\udc00-\udfff])|(?<![\ud800-\udbff])[\udc00-\udfff]/;

class Utf8Codec implements TextCodec {
  readonly name = 'utf-8' as const;
  private readonly fatal = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
  private readonly lenient = new TextDecoder('utf-8', { fatal: false, ignoreBOM: true });
  private readonly encoder = new TextEncoder();

  incompleteTail(bytes: Uint8Array): number {
    const len = bytes.length;
    for (let k = 1; k <= Math.min(3, len); k += 1) {
      const b = bytes[len - k]!;
      if ((b & 0xc0) === 0x80) continue;
      const need = b >= 0xf0 && b <= 0xf4 ? 4 : b >= 0xe0 && b <= 0xef ? 3 : b >= 0xc2 && b <= 0xdf ? 2 : 1;
      return need > k ? k : 0;
    }
    return 0;
  }

  decode(bytes: Uint8Array, errors: string): string {
    if (bytes.length === 0) return '';
    if (errors === 'replace') return this.lenient.decode(bytes);
    try {
      return this.fatal.decode(bytes);
    } catch (err) {
      if (!(err instanceof TypeError)) throw err;
    }
    return decodeUtf8Manually(bytes, (start, end, reason) => onDecodeError(this.name, errors, bytes, start, end, reason));
  }

  encode(text: string, errors: string): Uint8Array {
    if (!LONE_SURROGATE.test(text)) return this.encoder.encode(text);
    const cleaned = replaceLoneSurrogates(text, (index) => {
      const sub = onEncodeError(this.name, errors, text, index, index + 1, 'surrogates not allowed');
      return String.fromCharCode(...sub);
    });
    return this.encoder.encode(cleaned);
  }
}

/** Scalar UTF-8 decoder; each maximal invalid subpart is passed to `onInvalid`. */
function decodeUtf8Manually(
  bytes: Uint8Array,
  onInvalid: (start: number, end: number, reason: string) => string
): string {
  const parts: string[] = [];
  const n = bytes.length;
  let i = 0;
  outer: while (i < n) {
    const b = bytes[i]!;
    if (b < 0x80) {
      parts.push(String.fromCharCode(b));
      i += 1;
      continue;
    }
    let need: number;
    let lo = 0x80;
    let hi = 0xbf;
    if (b >= 0xc2 && b <= 0xdf) need = 1;
    else if (b === 0xe0) {
      need = 2;
      lo = 0xa0;
    } else if ((b >= 0xe1 && b <= 0xec) || b === 0xee || b === 0xef) need = 2;
    else if (b === 0xed) {
      need = 2;
      hi = 0x9f;
    } else if (b === 0xf0) {
      need = 3;
      lo = 0x90;
    } else if (b >= 0xf1 && b <= 0xf3) need = 3;
    else if (b === 0xf4) {
      need = 3;
      hi = 0x8f;
    } else {
      parts.push(onInvalid(i, i + 1, 'invalid start byte'));
      i += 1;
      continue;
    }
    let cp = b & (need === 1 ? 0x1f : need === 2 ? 0x0f : 0x07);
    let j = i + 1;
    for (let k = 0; k < need; k += 1) {
      const next = bytes[j];
      if (next === undefined) {
        parts.push(onInvalid(i, j, 'unexpected end of data'));
        i = j;
        continue outer;
      }
      if (next < lo || next > hi) {
        parts.push(onInvalid(i, j, 'invalid continuation byte'));
        i = j;
        continue outer;
      }
      cp = (cp << 6) | (next & 0x3f);
      j += 1;
      lo = 0x80;
      hi = 0xbf;
    }
    parts.push(String.fromCodePoint(cp));
    i = j;
  }
  return parts.join('');
}

class Utf16LeCodec implements TextCodec {
  readonly name = 'utf-16-le' as const;

  incompleteTail(bytes: Uint8Array): number {
    const odd = bytes.length & 1;
    const even = bytes.length - odd;
    if (even >= 2 && isHighSurrogate(bytes[even - 2]! | (bytes[even - 1]! << 8))) return odd + 2;
    return odd;
  }

  decode(bytes: Uint8Array, errors: string): string {
    const parts: string[] = [];
    let run: number[] = [];
    const flushRun = (): void => {
      if (run.length > 0) parts.push(String.fromCharCode(...run));
      run = [];
    };
    let i = 0;
    while (i + 1 < bytes.length) {
      const unit = bytes[i]! | (bytes[i + 1]! << 8);
      if (isHighSurrogate(unit)) {
        if (i + 3 < bytes.length) {
          const low = bytes[i + 2]! | (bytes[i + 3]! << 8);
          if (isLowSurrogate(low)) {
            run.push(unit, low);
            i += 4;
            if (run.length >= 4096) flushRun();
            continue;
          }
          flushRun();
          parts.push(onDecodeError(this.name, errors, bytes, i, i + 2, 'illegal UTF-16 surrogate'));
          i += 2;
          continue;
        }
        flushRun();
        parts.push(onDecodeError(this.name, errors, bytes, i, bytes.length, 'unexpected end of data'));
        i = bytes.length;
        break;
      }
      if (isLowSurrogate(unit)) {
        flushRun();
        parts.push(onDecodeError(this.name, errors, bytes, i, i + 2, 'illegal encoding'));
        i += 2;
        continue;
      }
      run.push(unit);
      i += 2;
      if (run.length >= 4096) flushRun();
    }
    flushRun();
    if (i < bytes.length) {
      parts.push(onDecodeError(this.name, errors, bytes, i, bytes.length, 'truncated data'));
    }
    return parts.join('');
  }

  encode(text: string, errors: string): Uint8Array {
    const cleaned = LONE_SURROGATE.test(text)
      ? replaceLoneSurrogates(text, (index) =>
          String.fromCharCode(...onEncodeError(this.name, errors, text, index, index + 1, 'surrogates not allowed'))
        )
      : text;
    const out = new Uint8Array(cleaned.length * 2);
    for (let i = 0; i < cleaned.length; i += 1) {
      const code = cleaned.charCodeAt(i);
      out[i * 2] = code & 0xff;
      out[i * 2 + 1] = code >>> 8;
    }
    return out;
  }
}

/** Single-byte codecs: latin-1 maps every byte, ascii only 0x00-0x7f. */
class SingleByteCodec implements TextCodec {
  constructor(
    readonly name: 'latin-1' | 'ascii',
    private readonly maxCode: number
  ) {}

  incompleteTail(): number {
    return 0;
  }

  decode(bytes: Uint8Array, errors: string): string {
    if (this.maxCode === 0xff) return decodeLatin1(bytes);
    const bad = bytes.findIndex((b) => b > this.maxCode);
    if (bad < 0) return decodeLatin1(bytes);
    let out = '';
    let runStart = 0;
    for (let i = bad; i < bytes.length; i += 1) {
      if (bytes[i]! <= this.maxCode) continue;
      out += decodeLatin1(bytes.subarray(runStart, i));
      out += onDecodeError(this.name, errors, bytes, i, i + 1, 'ordinal not in range(128)');
      runStart = i + 1;
    }
    return out + decodeLatin1(bytes.subarray(runStart));
  }

  encode(text: string, errors: string): Uint8Array {
    const out: number[] = [];
    const reason = `ordinal not in range(${this.maxCode + 1})`;
    for (let i = 0; i < text.length; i += 1) {
      const code = text.charCodeAt(i);
      if (code <= this.maxCode) {
        out.push(code);
        continue;
      }
      // A surrogate pair is one character and is reported once.
      const end = isHighSurrogate(code) && isLowSurrogate(text.charCodeAt(i + 1)) ? i + 2 : i + 1;
      out.push(...onEncodeError(this.name, errors, text, i, end, reason));
      i = end - 1;
    }
    return Uint8Array.from(out);
  }
}

const CODEC_ALIASES = new Map<string, CodecName>([
  ['utf-8', 'utf-8'],
  ['utf8', 'utf-8'],
  ['u8', 'utf-8'],
  ['utf-16le', 'utf-16-le'],
  ['utf-16-le', 'utf-16-le'],
  ['utf16le', 'utf-16-le'],
  ['latin-1', 'latin-1'],
  ['latin1', 'latin-1'],
  ['iso-8859-1', 'latin-1'],
  ['iso8859-1', 'latin-1'],
  ['l1', 'latin-1'],
  ['ascii', 'ascii'],
  ['us-ascii', 'ascii']
]);

function createCodec(name: CodecName): TextCodec {
  switch (name) {
    case 'utf-8':
      return new Utf8Codec();
    case 'utf-16-le':
      return new Utf16LeCodec();
    case 'latin-1':
      return new SingleByteCodec('latin-1', 0xff);
    case 'ascii':
      return new SingleByteCodec('ascii', 0x7f);
  }
}

export function normalizeEncodingName(name: string): string {
  return name.trim().toLowerCase().replace(/[_\s]/g, '-');
}

/** Find the codec for an encoding name or alias; unknown names are an InvalidArgumentError. */
export function lookupCodec(encoding: string): TextCodec {
  const canonical = CODEC_ALIASES.get(normalizeEncodingName(encoding));
  if (!canonical) {
    throw new InvalidArgumentError('GZIP_UNKNOWN_ENCODING', `unknown encoding: ${encoding}`, {
      context: { encoding }
    });
  }
  return createCodec(canonical);
}
