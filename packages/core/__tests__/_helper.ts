import { ReadableStream, WritableStream } from 'node:stream/web';
import { StreamPipeReader } from '../src/pipe/StreamPipeReader.js';

export const bytes = (...values: number[]): Uint8Array => new Uint8Array(values);

/** Stream that delivers `chunks` one by one, then closes */
export function streamOf(...chunks: Uint8Array[]): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(c) {
      for (const chunk of chunks) c.enqueue(chunk);
      c.close();
    },
  });
}

export function readerOf(...chunks: Uint8Array[]): StreamPipeReader {
  return new StreamPipeReader(streamOf(...chunks));
}

/** Stream fed by the test: nothing arrives until push() */
export function controlledStream() {
  let push  : (chunk: Uint8Array) => void = () => undefined;
  let end   : () => void = () => undefined;
  const stream = new ReadableStream<Uint8Array>({
    start(c) {
      push = chunk => c.enqueue(chunk);
      end  = () => c.close();
    },
  });
  return {
    stream,
    push : (chunk: Uint8Array) => push(chunk),
    end  : () => end(),
  };
}

/** Sink recording every chunk handed to it */
export function collectingSink() {
  const chunks: Uint8Array[] = [];
  let closed = false;
  const sink = new WritableStream<Uint8Array>({
    write(chunk) { chunks.push(chunk.slice()); },
    close()      { closed = true; },
  });
  return {
    sink,
    chunks,
    isClosed : () => closed,
    bytes    : () => Array.from(chunks.flatMap(c => Array.from(c))),
  };
}

/** Deterministic filler payload */
export function payloadOf(length: number, seed = 0): Uint8Array {
  return Uint8Array.from({ length }, (_, i) => (i * 31 + seed) & 0xff);
}
