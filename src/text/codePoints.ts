export function isHighSurrogate(unit: number): boolean {
  return unit >= 0xd800 && unit <= 0xdbff;
}

export function isLowSurrogate(unit: number): boolean {
  return unit >= 0xdc00 && unit <= 0xdfff;
}

/** Width in UTF-16 units of the code point starting at `index`: 2 for a surrogate pair, else 1. */
function unitWidth(text: string, index: number): number {
  return isHighSurrogate(text.charCodeAt(index)) && index + 1 < text.length && isLowSurrogate(text.charCodeAt(index + 1))
    ? 2
    : 1;
}

/** Number of code points in `text`; a lone surrogate counts as one. */
export function codePointLength(text: string): number {
  let count = 0;
  for (let index = 0; index < text.length; index += unitWidth(text, index)) count += 1;
  return count;
}

/**
 * UTF-16 index just past the first `count` code points of `text`, or -1 when
 * it holds fewer. Never lands between the halves of a surrogate pair.
 */
export function codePointOffset(text: string, count: number): number {
  let index = 0;
  for (let seen = 0; seen < count; seen += 1) {
    if (index >= text.length) return -1;
    index += unitWidth(text, index);
  }
  return index;
}
