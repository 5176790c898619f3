// packages/core/src/pipe/StreamPipeWriter.ts
import type { WritableStream, WritableStreamDefaultWriter } from 'node:stream/web';
import { PipeStateError } from '../errors/index.js';
import { concat } from '../util/bytes.js';
import { BufferPool } from './BufferPool.js';
import { writeBytes } from './BufferWriter.js';
import type { PipeWriter } from './types.js';

/**
 * PipeWriter over a WHATWG WritableStream.
 *
 * Committed bytes accumulate in blocks rented from `pool`. Nothing reaches
 * the sink until `flush()`, which hands over one contiguous chunk and gives
 * the blocks back to the pool.
 */
export class StreamPipeWriter implements PipeWriter {
  private readonly writer : WritableStreamDefaultWriter<Uint8Array>;

  private committed : Uint8Array[] = [];
  private rented    : Uint8Array[] = [];
  private current   : Uint8Array | null = null;
  private pos       = 0;
  private pending   = 0;
  private closed    = false;

  constructor(
    sink: WritableStream<Uint8Array>,
    private readonly pool: BufferPool = new BufferPool(),
  ) {
    this.writer = sink.getWriter();
  }

  get unflushedBytes(): number { return this.pending; }

  getSpan(sizeHint = 1): Uint8Array {
    if (this.closed) throw new PipeStateError('Writer has been completed');

    const need = Math.max(sizeHint, 1);
    if (!this.current || this.current.byteLength - this.pos < need) {
      this.retireCurrent();
      this.current = this.pool.rent(need);
      this.rented.push(this.current);
    }
    return this.current.subarray(this.pos);
  }

  advance(count: number): void {
    if (!this.current || count < 0 || this.pos + count > this.current.byteLength) {
      throw new RangeError(`Cannot advance ${count} bytes past the last span`);
    }
    this.pos     += count;
    this.pending += count;
  }

  write(bytes: Uint8Array): void {
    writeBytes(this, bytes);
  }

  async flush(): Promise<void> {
    this.retireCurrent();
    if (!this.committed.length) return;

    const chunk = concat(...this.committed);
    this.committed = [];
    this.pending   = 0;
    for (const block of this.rented) this.pool.return(block);
    this.rented = [];

    await this.writer.write(chunk);
  }

  async complete(): Promise<void> {
    if (this.closed) return;
    await this.flush();
    this.closed = true;
    await this.writer.close();
  }

  private retireCurrent(): void {
    if (this.current && this.pos > 0) {
      this.committed.push(this.current.subarray(0, this.pos));
    }
    this.current = null;
    this.pos     = 0;
  }
}
