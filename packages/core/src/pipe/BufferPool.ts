// packages/core/src/pipe/BufferPool.ts
import { DEFAULTS } from '../config/defaults.js';

/**
 * Fixed-size block pool owned by a transport writer.
 * Oversized requests are served by one-off allocations that are never retained.
 */
export class BufferPool {
  private readonly free: Uint8Array[] = [];

  constructor(
    readonly blockSize   : number = DEFAULTS.poolBlockSize,
    readonly maxRetained : number = DEFAULTS.poolMaxRetained,
  ) {
    if (!Number.isInteger(blockSize) || blockSize <= 0) {
      throw new RangeError('Block size must be a positive integer');
    }
    if (!Number.isInteger(maxRetained) || maxRetained < 0) {
      throw new RangeError('maxRetained must be a non-negative integer');
    }
  }

  get retainedCount(): number { return this.free.length; }

  rent(minimumLength = 1): Uint8Array {
    if (minimumLength > this.blockSize) return new Uint8Array(minimumLength);
    return this.free.pop() ?? new Uint8Array(this.blockSize);
  }

  return(block: Uint8Array): void {
    if (block.byteLength !== this.blockSize) return;
    if (this.free.length >= this.maxRetained) return;
    if (this.free.includes(block)) return;
    this.free.push(block);
  }
}
