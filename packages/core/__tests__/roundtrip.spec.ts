import { readMessages } from '../src/message/decoder.js';
import { writeMessage } from '../src/message/encoder.js';
import { BufferPool } from '../src/pipe/BufferPool.js';
import { StreamPipeWriter } from '../src/pipe/StreamPipeWriter.js';
import { collectingSink, payloadOf, readerOf } from './_helper.js';

it('reads back what the writer flushed', async () => {
  const sizes = [0, 1, 5, 4096, 70_000];
  const out    = collectingSink();
  const writer = new StreamPipeWriter(out.sink, new BufferPool(1024, 2));

  for (const [i, size] of sizes.entries()) {
    await writeMessage(writer, payloadOf(size, i), i % 2 === 0);
  }
  await writer.complete();
  expect(out.isClosed()).toBe(true);

  const received: Uint8Array[] = [];
  for await (const msg of readMessages(readerOf(...out.chunks))) received.push(msg);

  expect(received.map(m => m.byteLength)).toEqual(sizes);
  sizes.forEach((size, i) => {
    expect(Array.from(received[i])).toEqual(Array.from(payloadOf(size, i)));
  });
});

it('survives re-chunking of the wire bytes', async () => {
  const out    = collectingSink();
  const writer = new StreamPipeWriter(out.sink);
  await writeMessage(writer, payloadOf(300, 1));
  await writeMessage(writer, payloadOf(2, 2), true);

  const wire = Uint8Array.from(out.bytes());
  const chunks: Uint8Array[] = [];
  for (let i = 0; i < wire.length; i += 7) chunks.push(wire.subarray(i, i + 7));

  const received: number[][] = [];
  for await (const msg of readMessages(readerOf(...chunks))) received.push(Array.from(msg));
  expect(received).toEqual([Array.from(payloadOf(300, 1)), Array.from(payloadOf(2, 2))]);
});
