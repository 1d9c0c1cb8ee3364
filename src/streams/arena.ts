const MIN_CAPACITY = 1024;

/**
 * Growable byte buffer addressed by `(offset, length)`.
 *
 * Consuming bytes only advances `offset`. Valid bytes are copied back to the
 * start of the arena when room is needed at the tail and the dead prefix is
 * larger than `compactionRatio` of the capacity; otherwise the arena grows.
 */
export class ByteArena {
  private data: Uint8Array;
  private start = 0;
  private size = 0;
  private readonly compactionRatio: number;

  constructor(options?: { initialCapacity?: number; compactionRatio?: number }) {
    this.data = new Uint8Array(options?.initialCapacity ?? 0);
    this.compactionRatio = options?.compactionRatio ?? 0.5;
  }

  get length(): number {
    return this.size;
  }

  get offset(): number {
    return this.start;
  }

  get capacity(): number {
    return this.data.length;
  }

  append(chunk: Uint8Array): void {
    if (chunk.length === 0) return;
    this.reserve(chunk.length);
    this.data.set(chunk, this.start + this.size);
    this.size += chunk.length;
  }

  /** View of the first `n` valid bytes (all of them when `n` is omitted); invalidated by the next mutation. */
  view(n = this.size): Uint8Array {
    const count = Math.max(0, Math.min(n, this.size));
    return this.data.subarray(this.start, this.start + count);
  }

  /** Remove and return up to `n` bytes as an independent copy. */
  take(n = this.size): Uint8Array {
    const out = this.view(n).slice();
    this.consume(out.length);
    return out;
  }

  consume(n: number): void {
    const count = Math.max(0, Math.min(n, this.size));
    this.start += count;
    this.size -= count;
    if (this.size === 0) this.start = 0;
  }

  /** Index of `byte` relative to the first valid byte, searching from `from`; -1 when absent. */
  indexOf(byte: number, from = 0): number {
    if (from >= this.size) return -1;
    return this.data.subarray(this.start, this.start + this.size).indexOf(byte, Math.max(0, from));
  }

  clear(): void {
    this.start = 0;
    this.size = 0;
  }

  private reserve(extra: number): void {
    const end = this.start + this.size;
    if (end + extra <= this.data.length) return;
    if (this.start > 0 && this.start > this.compactionRatio * this.data.length && this.size + extra <= this.data.length) {
      this.data.copyWithin(0, this.start, end);
      this.start = 0;
      return;
    }
    let capacity = Math.max(this.data.length * 2, MIN_CAPACITY);
    while (capacity < this.size + extra) capacity *= 2;
    const next = new Uint8Array(capacity);
    next.set(this.data.subarray(this.start, end), 0);
    this.data = next;
    this.start = 0;
  }
}
