import { StreamPipeWriter } from '../../src/pipe/StreamPipeWriter.js';
import { BufferPool } from '../../src/pipe/BufferPool.js';
import { PipeStateError } from '../../src/errors/index.js';
import { bytes, collectingSink } from '../_helper.js';

describe('StreamPipeWriter', () => {
  it('hands out spans of at least the hinted size', () => {
    const writer = new StreamPipeWriter(collectingSink().sink, new BufferPool(8, 1));
    expect(writer.getSpan(3).byteLength).toBeGreaterThanOrEqual(3);
    expect(writer.getSpan(20).byteLength).toBeGreaterThanOrEqual(20);
  });

  it('commits only advanced bytes', async () => {
    const out    = collectingSink();
    const writer = new StreamPipeWriter(out.sink);

    const span = writer.getSpan(4);
    span.set([1, 2, 3, 4]);
    writer.advance(2);
    expect(writer.unflushedBytes).toBe(2);

    await writer.flush();
    expect(out.bytes()).toEqual([1, 2]);
    expect(writer.unflushedBytes).toBe(0);
  });

  it('does not write on an empty flush', async () => {
    const out = collectingSink();
    await new StreamPipeWriter(out.sink).flush();
    expect(out.chunks).toHaveLength(0);
  });

  it('rejects advancing past the span', () => {
    const writer = new StreamPipeWriter(collectingSink().sink, new BufferPool(8, 1));
    expect(() => writer.advance(1)).toThrow(RangeError);
    writer.getSpan(1);
    expect(() => writer.advance(9)).toThrow(RangeError);
    expect(() => writer.advance(-1)).toThrow(RangeError);
  });

  it('returns rented blocks to the pool on flush', async () => {
    const pool   = new BufferPool(8, 4);
    const out    = collectingSink();
    const writer = new StreamPipeWriter(out.sink, pool);

    writer.write(new Uint8Array(20).fill(7));
    expect(pool.retainedCount).toBe(0);

    await writer.flush();
    expect(pool.retainedCount).toBe(3);
    expect(out.chunks).toHaveLength(1);
    expect(out.chunks[0].byteLength).toBe(20);
  });

  it('flushes and closes the sink on complete()', async () => {
    const out    = collectingSink();
    const writer = new StreamPipeWriter(out.sink);

    writer.write(bytes(5));
    await writer.complete();
    await writer.complete();

    expect(out.bytes()).toEqual([5]);
    expect(out.isClosed()).toBe(true);
    expect(() => writer.getSpan()).toThrow(new PipeStateError('Writer has been completed'));
  });
});
