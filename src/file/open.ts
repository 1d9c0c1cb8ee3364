import { GzipBinaryFile } from './GzipBinaryFile.js';
import { GzipTextFile } from './GzipTextFile.js';
import type { GzipOpenOptions } from './options.js';
import { openTarget, type GzipTarget } from './target.js';

type ModeOp = 'r' | 'w' | 'a' | 'x';
type Perm2<A extends string, B extends string> = `${A}${B}` | `${B}${A}`;
type Perm3<A extends string, B extends string, C extends string> =
  | `${A}${Perm2<B, C>}`
  | `${B}${Perm2<A, C>}`
  | `${C}${Perm2<A, B>}`;

/** Mode strings that open a text handle. */
export type TextMode = Perm2<ModeOp, 't'> | Perm3<ModeOp, 't', '+'>;

/** Mode strings that open a binary handle. */
export type BinaryMode = ModeOp | Perm2<ModeOp, 'b'> | Perm2<ModeOp, '+'> | Perm3<ModeOp, 'b', '+'>;

/**
 * Open a gzip stream. Modes containing `t` give a text handle, every other
 * mode a binary one.
 *
 * @example
 * await using file = await openGzip('notes.txt.gz', 'wt');
 * await file.write('hello\n');
 */
export function openGzip(target: GzipTarget, mode: TextMode, options?: GzipOpenOptions): Promise<GzipTextFile>;
export function openGzip(target: GzipTarget, mode?: BinaryMode, options?: GzipOpenOptions): Promise<GzipBinaryFile>;
export function openGzip(
  target: GzipTarget,
  mode?: string,
  options?: GzipOpenOptions
): Promise<GzipBinaryFile | GzipTextFile>;
export async function openGzip(
  target: GzipTarget,
  mode: string = 'rb',
  options?: GzipOpenOptions
): Promise<GzipBinaryFile | GzipTextFile> {
  const init = await openTarget(target, mode, options, 'auto');
  const binary = new GzipBinaryFile(init);
  return init.parsed.text ? new GzipTextFile(binary, init.options) : binary;
}
