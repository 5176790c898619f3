// packages/core/src/header/encoder.ts
import {
  CompressionFlag,
  HEADER_SIZE,
  MESSAGE_DELIMITER_SIZE,
} from '../config/defaults.js';
import { BufferTooSmallError } from '../errors/index.js';
import type { BufferWriter } from '../pipe/BufferWriter.js';

export function encodeMessageLength(length: number, destination: Uint8Array): void {
  if (destination.byteLength < MESSAGE_DELIMITER_SIZE) {
    throw new BufferTooSmallError('Buffer too small to encode message length.');
  }
  if (!Number.isInteger(length) || length < 0 || length > 0xffff_ffff) {
    throw new RangeError(`Message length must be an unsigned 32-bit integer, got ${length}`);
  }
  new DataView(destination.buffer, destination.byteOffset, MESSAGE_DELIMITER_SIZE)
    .setUint32(0, length, false);   // big‑endian
}

/** Reserve, fill and commit one 5-byte header (never compressed) */
export function writeHeader(writer: BufferWriter, length: number): void {
  const header = writer.getSpan(HEADER_SIZE);
  header[0] = CompressionFlag.NONE;
  encodeMessageLength(length, header.subarray(1));
  writer.advance(HEADER_SIZE);
}
