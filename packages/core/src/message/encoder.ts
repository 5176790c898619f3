// packages/core/src/message/encoder.ts
import { HEADER_SIZE, MAX_MESSAGE_LENGTH } from '../config/defaults.js';
import { MessageTooLargeError } from '../errors/index.js';
import { writeHeader } from '../header/encoder.js';
import { ArrayBufferWriter, writeBytes } from '../pipe/BufferWriter.js';
import type { PipeWriter } from '../pipe/types.js';
import type { WriteMessageOptions } from '../types/index.js';

function assertSendable(length: number, maxMessageSize?: number | null): void {
  if (length > MAX_MESSAGE_LENGTH) {
    throw new MessageTooLargeError(`Message too large: ${length}`);
  }
  if (maxMessageSize != null && length > maxMessageSize) {
    throw new MessageTooLargeError(
      `Sending message larger than max (${length} vs. ${maxMessageSize})`,
    );
  }
}

/**
 * Write one uncompressed frame to `output`.
 * With `flush`, resolves once the bytes were handed to the transport;
 * otherwise they stay buffered in the writer.
 */
export async function writeMessage(
  output: PipeWriter,
  payload: Uint8Array,
  flush = false,
  options: WriteMessageOptions = {},
): Promise<void> {
  assertSendable(payload.byteLength, options.maxMessageSize);

  writeHeader(output, payload.byteLength);
  output.write(payload);
  options.log?.log(4, `Frame written: ${payload.byteLength} B payload`);

  if (flush) {
    await output.flush();
  }
}

/** Standalone frame (header + payload) as one array */
export function encodeFrame(payload: Uint8Array, maxMessageSize?: number | null): Uint8Array {
  assertSendable(payload.byteLength, maxMessageSize);

  const writer = new ArrayBufferWriter(HEADER_SIZE + payload.byteLength);
  writeHeader(writer, payload.byteLength);
  writeBytes(writer, payload);
  return writer.writtenBytes;
}
