import { gzipSync } from 'node:zlib';
import { MemoryStream, type ByteSource } from '../src/index.js';

export const encoder = new TextEncoder();
export const decoder = new TextDecoder();

/** Copy into a plain Uint8Array so strict deep equality does not see a Buffer prototype. */
export function bytes(data: ArrayLike<number> | ArrayBuffer): Uint8Array {
  return data instanceof ArrayBuffer ? new Uint8Array(data.slice(0)) : Uint8Array.from(data);
}

export function gzipText(text: string, level = 6): Uint8Array {
  return bytes(gzipSync(encoder.encode(text), { level }));
}

export function gzipBytes(data: Uint8Array, level = 6): Uint8Array {
  return bytes(gzipSync(data, { level }));
}

export function concat(...parts: Uint8Array[]): Uint8Array {
  const out = new Uint8Array(parts.reduce((sum, part) => sum + part.length, 0));
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

/** Read-only source that is not seekable and hands out at most `step` bytes per read. */
export function forwardOnly(data: Uint8Array, step = Infinity): ByteSource & { reads: number } {
  let offset = 0;
  return {
    reads: 0,
    async read(size: number): Promise<Uint8Array> {
      this.reads += 1;
      const end = Math.min(data.length, offset + Math.min(size, step));
      const out = data.slice(offset, end);
      offset = end;
      return out;
    }
  };
}

export function memory(data: Uint8Array): MemoryStream {
  return new MemoryStream(data);
}

/** Deterministic bytes that compress poorly, so members span several reads. */
export function noise(length: number, seed = 1): Uint8Array {
  const out = new Uint8Array(length);
  let state = seed >>> 0;
  for (let i = 0; i < length; i += 1) {
    state = (Math.imul(state, 1103515245) + 12345) >>> 0;
    out[i] = state >>> 24;
  }
  return out;
}
