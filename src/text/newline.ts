import { EOL } from 'node:os';

/**
 * Newline policy of a text handle.
 *
 * - `null`: universal. `\r\n`, `\r` and `\n` all read as `\n`; `\n` is
 *   written as the platform separator.
 * - `''`: no translation; any of the three terminates a line on read.
 * - `'\n'`, `'\r'`, `'\r\n'`: only that literal terminates a line, and `\n`
 *   is written as it.
 */
export type NewlineMode = null | '' | '\n' | '\r' | '\r\n';

export function isNewlineMode(value: unknown): value is NewlineMode {
  return value === null || value === '' || value === '\n' || value === '\r' || value === '\r\n';
}

export type LineEnd = {
  /** Index of the first terminator character. */
  index: number;
  /** Terminator length in UTF-16 code units. */
  length: number;
};

/**
 * Locate the first line terminator in already-decoded text. Decoding holds a
 * trailing `\r` back until the next chunk arrives, so a `\r` at the very end
 * of `text` is only seen at end of stream.
 */
export function findLineEnd(text: string, newline: NewlineMode, from = 0): LineEnd | null {
  switch (newline) {
    case null:
    case '\n':
      return literal(text, '\n', from);
    case '\r':
      return literal(text, '\r', from);
    case '\r\n':
      return literal(text, '\r\n', from);
    case '': {
      const lf = text.indexOf('\n', from);
      const cr = text.indexOf('\r', from);
      if (cr >= 0 && (lf < 0 || cr < lf)) {
        return { index: cr, length: text.charCodeAt(cr + 1) === 0x0a ? 2 : 1 };
      }
      return lf >= 0 ? { index: lf, length: 1 } : null;
    }
  }
}

function literal(text: string, terminator: string, from: number): LineEnd | null {
  const index = text.indexOf(terminator, from);
  return index >= 0 ? { index, length: terminator.length } : null;
}

/** Apply write-side newline translation. */
export function translateForWrite(text: string, newline: NewlineMode, lineSeparator: string = EOL): string {
  if (newline === '' || newline === '\n') return text;
  const target = newline ?? lineSeparator;
  return target === '\n' ? text : text.replaceAll('\n', target);
}

/** Universal-newline read translation. */
export function translateUniversal(text: string): string {
  return text.includes('\r') ? text.replace(/\r\n?/g, '\n') : text;
}
