import { concat, toHex } from '../src/util/bytes.js';

describe('util/bytes helpers', () => {
  const a = new Uint8Array([1, 2, 3]);
  const b = new Uint8Array([4, 5]);

  it('concats arbitrary Uint8Arrays', () => {
    expect(Array.from(concat(a, b))).toEqual([1, 2, 3, 4, 5]);
    expect(concat().byteLength).toBe(0);
  });

  it('renders hex', () => {
    expect(toHex(new Uint8Array([0x00, 0x0f, 0xc1]))).toBe('00 0f c1');
    expect(toHex(new Uint8Array(0))).toBe('');
  });

  it('truncates long hex dumps', () => {
    expect(toHex(concat(a, b), 2)).toBe('01 02 …');
  });
});
