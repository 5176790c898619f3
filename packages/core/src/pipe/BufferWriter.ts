// packages/core/src/pipe/BufferWriter.ts

/**
 * Append-only sink with "reserve, then commit" semantics.
 *
 * `getSpan(n)` hands out a writable region of at least `n` bytes;
 * `advance(m)` commits the first `m` bytes of the last region handed out.
 * Bytes are not part of the output until they are committed.
 */
export interface BufferWriter {
  getSpan(sizeHint?: number): Uint8Array;
  advance(count: number): void;
}

/** Copy `bytes` into `writer`, spanning as many regions as it takes */
export function writeBytes(writer: BufferWriter, bytes: Uint8Array): void {
  let offset = 0;
  while (offset < bytes.byteLength) {
    const span = writer.getSpan(1);
    const n    = Math.min(span.byteLength, bytes.byteLength - offset);
    span.set(bytes.subarray(offset, offset + n));
    writer.advance(n);
    offset += n;
  }
}

/**
 * Growable in-memory writer. Doubles its backing store on demand.
 */
export class ArrayBufferWriter implements BufferWriter {
  private buf     : Uint8Array;
  private written = 0;

  constructor(initialCapacity = 256) {
    if (!Number.isInteger(initialCapacity) || initialCapacity <= 0) {
      throw new RangeError('Initial capacity must be a positive integer');
    }
    this.buf = new Uint8Array(initialCapacity);
  }

  get writtenCount(): number { return this.written; }

  /** View of the committed bytes; valid until the next write or clear() */
  get writtenBytes(): Uint8Array { return this.buf.subarray(0, this.written); }

  getSpan(sizeHint = 1): Uint8Array {
    const need = Math.max(sizeHint, 1);
    if (this.buf.byteLength - this.written < need) {
      let size = this.buf.byteLength * 2;
      while (size - this.written < need) size *= 2;
      const next = new Uint8Array(size);
      next.set(this.writtenBytes);
      this.buf = next;
    }
    return this.buf.subarray(this.written);
  }

  advance(count: number): void {
    if (count < 0 || this.written + count > this.buf.byteLength) {
      throw new RangeError(`Cannot advance past the end of the buffer (count=${count})`);
    }
    this.written += count;
  }

  clear(): void {
    this.buf.fill(0, 0, this.written);
    this.written = 0;
  }
}
