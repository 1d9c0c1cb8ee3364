const TABLE = (() => {
  const table = new Uint32Array(256);
  for (let i = 0; i < 256; i += 1) {
    let c = i;
    for (let k = 0; k < 8; k += 1) {
      c = (c & 1) !== 0 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
    }
    table[i] = c >>> 0;
  }
  return table;
})();

/** Running CRC32 (IEEE 802.3, as used by the gzip trailer). */
export class Crc32 {
  private state = 0xffffffff;

  update(chunk: Uint8Array): void {
    this.state = crc32Update(this.state, chunk);
  }

  digest(): number {
    return (this.state ^ 0xffffffff) >>> 0;
  }

  reset(): void {
    this.state = 0xffffffff;
  }
}

/** CRC32 of a complete buffer. */
export function crc32(chunk: Uint8Array): number {
  return (crc32Update(0xffffffff, chunk) ^ 0xffffffff) >>> 0;
}

function crc32Update(state: number, chunk: Uint8Array): number {
  let crc = state;
  for (let i = 0; i < chunk.length; i += 1) {
    crc = TABLE[(crc ^ chunk[i]!) & 0xff]! ^ (crc >>> 8);
  }
  return crc >>> 0;
}
