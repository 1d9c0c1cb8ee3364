import { concatBytes } from '../binary.js';
import type { TextCodec } from './codecs.js';
import { translateUniversal, type NewlineMode } from './newline.js';

/**
 * State carried between decode calls: bytes that do not yet form a whole
 * character, and whether a `\r` was held back from the end of the last chunk.
 */
export type DecodeCarry = Readonly<{
  pending: Uint8Array;
  pendingCR: boolean;
}>;

export const INITIAL_CARRY: DecodeCarry = Object.freeze({ pending: new Uint8Array(0), pendingCR: false });

export type DecodeResult = {
  text: string;
  carry: DecodeCarry;
};

/**
 * Decode one chunk of bytes given the carry of the previous call.
 *
 * With `final` set nothing is held back: an incomplete trailing sequence goes
 * to the error handler and a pending `\r` is emitted. The carry passed in is
 * never modified.
 */
export function decodeChunk(
  codec: TextCodec,
  errors: string,
  newline: NewlineMode,
  carry: DecodeCarry,
  bytes: Uint8Array,
  final: boolean
): DecodeResult {
  const input = carry.pending.length > 0 ? concatBytes([carry.pending, bytes]) : bytes;
  const tail = final ? 0 : codec.incompleteTail(input);
  let text = codec.decode(input.subarray(0, input.length - tail), errors);
  if (carry.pendingCR) text = `\r${text}`;
  let pendingCR = false;
  if (!final && text.endsWith('\r')) {
    text = text.slice(0, -1);
    pendingCR = true;
  }
  if (newline === null) text = translateUniversal(text);
  const pending = tail > 0 ? input.slice(input.length - tail) : EMPTY;
  return { text, carry: pending.length === 0 && !pendingCR ? INITIAL_CARRY : Object.freeze({ pending, pendingCR }) };
}

const EMPTY = new Uint8Array(0);
