// packages/core/src/header/decoder.ts
import {
  CompressionFlag,
  HEADER_SIZE,
  MAX_MESSAGE_LENGTH,
  MESSAGE_DELIMITER_SIZE,
} from '../config/defaults.js';
import {
  BufferTooSmallError,
  CorruptFrameError,
  MessageTooLargeError,
} from '../errors/index.js';
import type { ByteSequence } from '../pipe/ByteSequence.js';
import type { FrameHeader } from '../types/index.js';

export function decodeMessageLength(source: Uint8Array): number {
  if (source.byteLength < MESSAGE_DELIMITER_SIZE) {
    throw new BufferTooSmallError('Buffer too small to decode message length.');
  }
  const length = new DataView(source.buffer, source.byteOffset, MESSAGE_DELIMITER_SIZE)
                   .getUint32(0, false);
  if (length > MAX_MESSAGE_LENGTH) {
    throw new MessageTooLargeError(`Message too large: ${length}`);
  }
  return length;
}

export function decodeCompressionFlag(flag: number): boolean {
  if (flag === CompressionFlag.NONE)       return false;
  if (flag === CompressionFlag.COMPRESSED) return true;
  throw new CorruptFrameError('Unexpected compressed flag value in message header.');
}

/**
 * Decode the frame header at the head of `buffer`.
 * Returns null while fewer than HEADER_SIZE bytes are buffered.
 */
export function tryReadHeader(buffer: ByteSequence): FrameHeader | null {
  if (buffer.length < HEADER_SIZE) return null;

  // Fast path: the header sits inside one segment
  let header = buffer.first;
  if (header.byteLength < HEADER_SIZE) {
    header = new Uint8Array(HEADER_SIZE);
    buffer.slice(0, HEADER_SIZE).copyTo(header);
  }

  return {
    compressed : decodeCompressionFlag(header[0]),
    length     : decodeMessageLength(header.subarray(1, HEADER_SIZE)),
  };
}
