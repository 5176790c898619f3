import type { BufferWriter } from './BufferWriter.js';
import type { ByteSequence, SequencePosition } from './ByteSequence.js';

export interface ReadResult {
  /** Every buffered, unconsumed byte */
  buffer      : ByteSequence;
  /** The source ended; no byte beyond `buffer.end` will ever arrive */
  isCompleted : boolean;
  /** The read was cut short by `cancelPendingRead()` */
  isCanceled  : boolean;
}

/**
 * Pull-based byte source.
 *
 * Each `read()` must be answered by exactly one `advanceTo()` before the
 * next `read()`. Bytes before `consumed` are released; bytes up to
 * `examined` count as seen, so the next `read()` waits for new data
 * unless something lies beyond `examined`.
 */
export interface PipeReader {
  read(): Promise<ReadResult>;
  advanceTo(consumed: SequencePosition, examined?: SequencePosition): void;
  cancelPendingRead(): void;
  complete(): Promise<void>;
}

/** Buffered byte sink that hands data to its transport on `flush()` */
export interface PipeWriter extends BufferWriter {
  readonly unflushedBytes: number;
  write(bytes: Uint8Array): void;
  flush(): Promise<void>;
  complete(): Promise<void>;
}
