export function concat(...chunks: Uint8Array[]): Uint8Array {
  const total = chunks.reduce((n, c) => n + c.byteLength, 0);
  const out   = new Uint8Array(total);
  let offset  = 0;
  for (const c of chunks) {
    out.set(c, offset);
    offset += c.byteLength;
  }
  return out;
}

/* ----------  Hex (diagnostics only)  ------------------------------ */
export function toHex(bytes: Uint8Array, max = 16): string {
  let s = '';
  const n = Math.min(bytes.length, max);
  for (let i = 0; i < n; i++) {
    if (i) s += ' ';
    s += bytes[i].toString(16).padStart(2, '0');
  }
  return bytes.length > max ? `${s} …` : s;
}
