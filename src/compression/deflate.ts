import { Deflate, constants } from 'pako';
import type { FlushValues } from 'pako';
import { ResourceError } from '../errors.js';
import { concatBytes } from '../binary.js';

/** Compression levels accepted by the encoder; -1 selects the engine default. */
export type DeflateLevel = -1 | 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

export function isDeflateLevel(value: unknown): value is DeflateLevel {
  return typeof value === 'number' && Number.isInteger(value) && value >= -1 && value <= 9;
}

/**
 * Incremental raw-deflate encoder. Every call returns the compressed bytes it
 * produced (possibly none); the engine keeps its own history between calls.
 */
export class RawDeflater {
  private readonly engine: Deflate;
  private chunks: Uint8Array[] = [];
  private finished = false;

  constructor(level: DeflateLevel) {
    this.engine = new Deflate({ level, raw: true });
    this.engine.onData = (chunk) => {
      this.chunks.push(chunk instanceof Uint8Array ? chunk : new Uint8Array(chunk));
    };
  }

  compress(data: Uint8Array): Uint8Array {
    if (data.length === 0) return new Uint8Array(0);
    return this.run(data, constants.Z_NO_FLUSH, 'compress');
  }

  /** Emit everything buffered so far, ending on a byte boundary, without ending the stream. */
  flush(): Uint8Array {
    return this.run(new Uint8Array(0), constants.Z_SYNC_FLUSH, 'flush');
  }

  /** Emit the final block. Further calls are rejected. */
  finish(): Uint8Array {
    const out = this.run(new Uint8Array(0), constants.Z_FINISH, 'finish');
    this.finished = true;
    return out;
  }

  private run(
    data: Uint8Array,
    mode: FlushValues,
    operation: string
  ): Uint8Array {
    if (this.finished) {
      throw new ResourceError('GZIP_CODEC_FAILURE', `Unexpected error during ${operation}: stream already finished`, {
        context: { operation }
      });
    }
    this.engine.push(data, mode);
    if (this.engine.err !== constants.Z_OK) {
      const detail = this.engine.msg || `error code ${this.engine.err}`;
      throw new ResourceError('GZIP_CODEC_FAILURE', `Unexpected error during ${operation}: ${detail}`, {
        context: { operation }
      });
    }
    const out = concatBytes(this.chunks);
    this.chunks = [];
    return out.length === 0 ? new Uint8Array(0) : out;
  }
}
