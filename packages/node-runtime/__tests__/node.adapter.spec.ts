import { Readable, Writable } from 'node:stream';
import { createCodec, createReader, createWriter } from '../src/index.js';
import { BufferPool, readMessage } from '../../core/src/index.js';

describe('node stream adapters', () => {
  it('reads frames from a Node readable', async () => {
    const reader = createReader(Readable.from([
      Buffer.from([0, 0, 0, 0, 2, 0x61]),
      Buffer.from([0x62, 0, 0, 0]),
      Buffer.from([0, 0]),
    ]));

    expect(Buffer.from((await readMessage(reader, true)) ?? []).toString()).toBe('ab');
    expect((await readMessage(reader, true))?.byteLength).toBe(0);
    expect(await readMessage(reader, true)).toBeNull();
  });

  it('writes frames to a Node writable', async () => {
    const chunks: Buffer[] = [];
    const sink = new Writable({
      write(chunk: Buffer, _enc, cb) { chunks.push(Buffer.from(chunk)); cb(); },
    });
    const pool   = new BufferPool(8, 2);
    const writer = createWriter(sink, pool);
    const codec  = createCodec();

    await codec.writeMessage(writer, Buffer.from('hello world'), true);
    expect(Array.from(Buffer.concat(chunks)))
      .toEqual([0, 0, 0, 0, 11, ...Buffer.from('hello world')]);
    expect(pool.retainedCount).toBe(2);
  });

  it('completing the writer ends the Node stream', async () => {
    const sink = new Writable({ write(_chunk, _enc, cb) { cb(); } });
    const finished = new Promise<void>(resolve => sink.on('finish', () => resolve()));

    await createWriter(sink).complete();
    await finished;
    expect(sink.writableFinished).toBe(true);
  });
});
