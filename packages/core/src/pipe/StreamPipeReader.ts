// packages/core/src/pipe/StreamPipeReader.ts
import type { ReadableStream, ReadableStreamDefaultReader } from 'node:stream/web';
import { PipeStateError } from '../errors/index.js';
import { ByteSequence, type SequencePosition } from './ByteSequence.js';
import type { PipeReader, ReadResult } from './types.js';

const CANCELLED = Symbol('cancelled');

/**
 * PipeReader over a WHATWG ReadableStream.
 *
 * Chunks are kept as delivered by the stream (no coalescing copy); the
 * reader only drops them once `advanceTo()` moves the consumed position
 * past them. A chunk pulled while a read gets cancelled stays pending and
 * is delivered by the following read.
 */
export class StreamPipeReader implements PipeReader {
  private readonly reader : ReadableStreamDefaultReader<Uint8Array>;

  private segments : Uint8Array[] = [];
  private head     : SequencePosition = 0;   // first unconsumed byte
  private tail     : SequencePosition = 0;   // one past the last buffered byte
  private examined : SequencePosition = 0;

  private pending     : Promise<Uint8Array | null> | null = null;
  private outstanding : ByteSequence | null = null;
  private reading     = false;
  private sourceDone  = false;
  private closed      = false;

  private cancelRequested = false;
  private wakeOnCancel    : (() => void) | null = null;

  constructor(source: ReadableStream<Uint8Array>) {
    this.reader = source.getReader();
  }

  /** Bytes buffered but not yet consumed */
  get bufferedBytes(): number { return this.tail - this.head; }

  async read(): Promise<ReadResult> {
    if (this.closed)              throw new PipeStateError('Reader has been completed');
    if (this.reading)             throw new PipeStateError('Concurrent reads are not supported');
    if (this.outstanding)         throw new PipeStateError('advanceTo() must be called before the next read()');

    this.reading = true;
    try {
      while (!this.cancelRequested && !this.sourceDone && this.examined >= this.tail) {
        const pull = (this.pending ??= this.reader.read().then(r => (r.done ? null : r.value)));

        const outcome = await Promise.race([pull, this.cancellation()]);
        if (outcome === CANCELLED) break;

        this.pending = null;
        if (outcome === null) this.sourceDone = true;
        else if (outcome.byteLength > 0) this.append(outcome);
      }

      const isCanceled = this.cancelRequested;
      this.cancelRequested = false;
      this.outstanding = new ByteSequence(this.segments.slice(), this.head);

      return {
        buffer      : this.outstanding,
        isCompleted : this.sourceDone,
        isCanceled,
      };
    } finally {
      this.reading      = false;
      this.wakeOnCancel = null;
    }
  }

  advanceTo(consumed: SequencePosition, examined: SequencePosition = consumed): void {
    if (!this.outstanding) {
      throw new PipeStateError('advanceTo() called without an outstanding read result');
    }
    if (consumed < this.head || examined < consumed || examined > this.tail) {
      throw new PipeStateError(
        `Invalid positions consumed=${consumed}, examined=${examined} for buffer [${this.head}, ${this.tail})`,
      );
    }

    while (this.segments.length && this.head + this.segments[0].byteLength <= consumed) {
      this.head += this.segments[0].byteLength;
      this.segments.shift();
    }
    if (consumed > this.head) {
      this.segments[0] = this.segments[0].subarray(consumed - this.head);
      this.head = consumed;
    }

    this.examined    = examined;
    this.outstanding = null;
  }

  cancelPendingRead(): void {
    this.cancelRequested = true;
    this.wakeOnCancel?.();
  }

  async complete(): Promise<void> {
    if (this.closed) return;
    this.closed   = true;
    this.segments = [];
    this.head     = this.tail;
    await this.reader.cancel();
  }

  /* ------------------------------------------------------------------ */
  /*  Internals                                                          */
  /* ------------------------------------------------------------------ */

  private append(chunk: Uint8Array): void {
    this.segments.push(chunk);
    this.tail += chunk.byteLength;
  }

  private cancellation(): Promise<typeof CANCELLED> {
    return new Promise(resolve => {
      this.wakeOnCancel = () => resolve(CANCELLED);
    });
  }
}
