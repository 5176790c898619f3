import { BufferPool } from '../../src/pipe/BufferPool.js';

describe('BufferPool', () => {
  it('rents blocks of the configured size', () => {
    const pool = new BufferPool(16, 2);
    expect(pool.rent().byteLength).toBe(16);
    expect(pool.rent(16).byteLength).toBe(16);
  });

  it('defaults to 4 KiB blocks', () => {
    expect(new BufferPool().blockSize).toBe(4096);
    expect(new BufferPool().maxRetained).toBe(16);
  });

  it('reuses returned blocks', () => {
    const pool  = new BufferPool(16, 2);
    const block = pool.rent();
    pool.return(block);
    expect(pool.retainedCount).toBe(1);
    expect(pool.rent()).toBe(block);
    expect(pool.retainedCount).toBe(0);
  });

  it('serves oversized requests without retaining them', () => {
    const pool = new BufferPool(16, 2);
    const big  = pool.rent(17);
    expect(big.byteLength).toBe(17);
    pool.return(big);
    expect(pool.retainedCount).toBe(0);
  });

  it('retains at most maxRetained blocks, once each', () => {
    const pool = new BufferPool(4, 2);
    const [a, b, c] = [pool.rent(), pool.rent(), pool.rent()];
    pool.return(a);
    pool.return(a);
    pool.return(b);
    pool.return(c);
    expect(pool.retainedCount).toBe(2);
  });

  it.each([
    [0, 1],
    [1.5, 1],
    [8, -1],
  ])('rejects blockSize=%d maxRetained=%d', (size, retained) => {
    expect(() => new BufferPool(size, retained)).toThrow(RangeError);
  });
});
