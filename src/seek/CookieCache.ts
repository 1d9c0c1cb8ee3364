import type { DecodeCarry } from '../text/decode.js';

/** What a text handle needs to resume decoding at a recorded position. */
export type TextCheckpoint = {
  /** Decompressed byte position of the binary layer. */
  byteOffset: number;
  carry: DecodeCarry;
  /** Decoded text that had not been handed to the caller yet. */
  text: string;
};

/**
 * Bounded map from a logical position to a checkpoint, with
 * least-recently-used eviction. Lookups refresh an entry.
 */
export class CookieCache<T = TextCheckpoint> {
  private readonly entries = new Map<number, T>();
  readonly capacity: number;

  constructor(capacity: number) {
    this.capacity = Number.isFinite(capacity) && capacity > 0 ? Math.floor(capacity) : 1;
  }

  get size(): number {
    return this.entries.size;
  }

  get(position: number): T | undefined {
    const entry = this.entries.get(position);
    if (entry === undefined) return undefined;
    this.entries.delete(position);
    this.entries.set(position, entry);
    return entry;
  }

  has(position: number): boolean {
    return this.entries.has(position);
  }

  set(position: number, entry: T): void {
    this.entries.delete(position);
    this.entries.set(position, entry);
    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  clear(): void {
    this.entries.clear();
  }

  /** Positions from least to most recently used. */
  positions(): number[] {
    return [...this.entries.keys()];
  }
}
