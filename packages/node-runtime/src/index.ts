// packages/node-runtime/src/index.ts
import type { Readable, Writable } from 'node:stream';
import {
  BufferPool,
  MessageCodec,
  StreamPipeReader,
  StreamPipeWriter,
  type MessageCodecOptions,
} from '../../core/src/index.js';
import { toWebReadable, toWebWritable } from './streamAdapter.js';

export function createCodec(cfg?: MessageCodecOptions): MessageCodec {
  return new MessageCodec(cfg);
}

/** PipeReader pulling from a Node readable (socket, file, STDIN …) */
export function createReader(source: Readable): StreamPipeReader {
  return new StreamPipeReader(toWebReadable(source));
}

/** PipeWriter flushing into a Node writable; the pool stays with the caller's transport */
export function createWriter(sink: Writable, pool: BufferPool = new BufferPool()): StreamPipeWriter {
  return new StreamPipeWriter(toWebWritable(sink), pool);
}

export * from '../../core/src/index.js';
