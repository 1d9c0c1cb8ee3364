import { InvalidArgumentError } from '../errors.js';
import type { FileOpenFlags } from '../io/FileStream.js';

export type ModeOperation = 'r' | 'w' | 'a' | 'x';

export type ParsedMode = {
  /** Mode string as given by the caller. */
  mode: string;
  operation: ModeOperation;
  text: boolean;
  /** `b` was spelled out. */
  explicitBinary: boolean;
  plus: boolean;
  writing: boolean;
};

function invalidMode(mode: string, message: string): InvalidArgumentError {
  return new InvalidArgumentError('GZIP_INVALID_MODE', message, { context: { mode } });
}

/**
 * Parse a mode string of the form `[rwxa][bt]?[+]?`. Characters may come in
 * any order but each at most once.
 */
export function parseMode(mode: unknown): ParsedMode {
  if (typeof mode !== 'string') {
    throw new InvalidArgumentError('GZIP_INVALID_MODE', `mode must be a string, not ${typeof mode}`);
  }
  if (mode.length === 0) throw invalidMode(mode, 'Mode string cannot be empty');

  let operation: ModeOperation | null = null;
  let sawB = false;
  let sawT = false;
  let plus = false;
  for (const ch of mode) {
    switch (ch) {
      case 'r':
      case 'w':
      case 'a':
      case 'x':
        if (operation !== null) throw invalidMode(mode, 'Mode string can only specify one of r, w, a, or x');
        operation = ch;
        break;
      case 'b':
        if (sawB) throw invalidMode(mode, "Mode string cannot specify 'b' more than once");
        sawB = true;
        break;
      case 't':
        if (sawT) throw invalidMode(mode, "Mode string cannot specify 't' more than once");
        sawT = true;
        break;
      case '+':
        if (plus) throw invalidMode(mode, "Mode string cannot specify '+' more than once");
        plus = true;
        break;
      default:
        throw invalidMode(mode, `Invalid mode character '${ch}' in mode '${mode}'`);
    }
  }
  if (operation === null) throw invalidMode(mode, `Invalid mode '${mode}': must contain one of r, w, a, or x`);
  if (sawB && sawT) throw invalidMode(mode, "Mode string cannot contain both 'b' and 't'");
  return { mode, operation, text: sawT, explicitBinary: sawB, plus, writing: operation !== 'r' };
}

/** `fs.open` flags for opening a path in the given mode. */
export function fileFlagsFor(parsed: ParsedMode): FileOpenFlags {
  const base = parsed.operation === 'x' ? 'wx' : parsed.operation;
  switch (base) {
    case 'r':
      return parsed.plus ? 'r+' : 'r';
    case 'w':
      return parsed.plus ? 'w+' : 'w';
    case 'a':
      return parsed.plus ? 'a+' : 'a';
    case 'wx':
      return parsed.plus ? 'wx+' : 'wx';
  }
}
