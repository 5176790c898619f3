import { ArrayBufferWriter, writeBytes } from '../../src/pipe/BufferWriter.js';

describe('ArrayBufferWriter', () => {
  it('grows past its initial capacity', () => {
    const w = new ArrayBufferWriter(2);
    writeBytes(w, new Uint8Array([1, 2, 3, 4, 5]));
    expect(w.writtenCount).toBe(5);
    expect(Array.from(w.writtenBytes)).toEqual([1, 2, 3, 4, 5]);
  });

  it('hands out a span of at least the hinted size', () => {
    const w = new ArrayBufferWriter(4);
    expect(w.getSpan(100).byteLength).toBeGreaterThanOrEqual(100);
  });

  it('clear() resets the written count', () => {
    const w = new ArrayBufferWriter();
    writeBytes(w, new Uint8Array([9, 9]));
    w.clear();
    expect(w.writtenCount).toBe(0);
    writeBytes(w, new Uint8Array([1]));
    expect(Array.from(w.writtenBytes)).toEqual([1]);
  });

  it('rejects bad advances and capacities', () => {
    const w = new ArrayBufferWriter(4);
    expect(() => w.advance(5)).toThrow(RangeError);
    expect(() => w.advance(-1)).toThrow(RangeError);
    expect(() => new ArrayBufferWriter(0)).toThrow(RangeError);
  });

  it('writeBytes ignores empty input', () => {
    const w = new ArrayBufferWriter(4);
    writeBytes(w, new Uint8Array(0));
    expect(w.writtenCount).toBe(0);
  });
});
