// packages/core/src/message/decoder.ts
import { HEADER_SIZE } from '../config/defaults.js';
import {
  IncompleteMessageError,
  MessageTooLargeError,
  ReadCancelledError,
  UnsupportedCompressionError,
} from '../errors/index.js';
import { tryReadHeader } from '../header/decoder.js';
import { ByteSequence } from '../pipe/ByteSequence.js';
import type { PipeReader } from '../pipe/types.js';
import type { Frame, ReadMessageOptions } from '../types/index.js';
import { toHex } from '../util/bytes.js';

export interface ExtractedMessage {
  /** Payload copied out of the transport buffer */
  payload : Uint8Array;
  /** What is left of the buffer after the frame */
  rest    : ByteSequence;
}

/**
 * Extract the first complete frame of `buffer`.
 * Returns null when the header or payload is not fully buffered yet.
 */
export function tryReadMessage(
  buffer: ByteSequence,
  maxMessageSize?: number | null,
): ExtractedMessage | null {
  const header = tryReadHeader(buffer);
  if (!header) return null;

  if (header.compressed) {
    throw new UnsupportedCompressionError('Compressed messages are not yet supported.');
  }
  if (maxMessageSize != null && header.length > maxMessageSize) {
    throw new MessageTooLargeError(
      `Received message larger than max (${header.length} vs. ${maxMessageSize})`,
    );
  }

  if (buffer.length < HEADER_SIZE + header.length) return null;

  return {
    payload : buffer.slice(HEADER_SIZE, header.length).toArray(),
    rest    : buffer.slice(HEADER_SIZE + header.length),
  };
}

/**
 * Read one message from the pipe reader.
 *
 * @param supportMultipleMessages
 *   false: a complete message must be read and the reader must then complete
 *   with no further data.
 *   true: a complete message must be read; the reader may still hold or
 *   receive more data for later calls.
 * @returns The message payload, or null when the reader completed cleanly
 *   before another message started (multi-message mode only).
 */
export async function readMessage(
  input: PipeReader,
  supportMultipleMessages: boolean,
  options: ReadMessageOptions = {},
): Promise<Uint8Array | null> {
  const { signal, maxMessageSize, log } = options;

  if (signal?.aborted) throw new ReadCancelledError('Incoming message cancelled.');
  const onAbort = () => input.cancelPendingRead();
  signal?.addEventListener('abort', onAbort, { once: true });

  let completeMessage: Uint8Array | null = null;

  try {
    while (true) {
      const result = await input.read();
      let buffer   = result.buffer;
      let examined = buffer.end;

      try {
        if (result.isCanceled) {
          throw new ReadCancelledError('Incoming message cancelled.');
        }

        if (!buffer.isEmpty) {
          if (completeMessage !== null) {
            throw new IncompleteMessageError('Additional data after the message received.');
          }

          const extracted = tryReadMessage(buffer, maxMessageSize);
          if (extracted) {
            log?.log(4, `Frame extracted: ${extracted.payload.byteLength} B payload`);
            buffer = extracted.rest;
            if (supportMultipleMessages) {
              // Leave the rest unexamined so the next call sees it at once
              examined = buffer.start;
              return extracted.payload;
            }

            // Hold on to it until the reader confirms nothing follows
            completeMessage = extracted.payload;
          } else {
            log?.log(4, `Partial frame buffered: ${buffer.length} B [${toHex(buffer.first, 8)}]`);
          }
        }

        if (result.isCompleted) {
          if (supportMultipleMessages) {
            if (buffer.isEmpty) return null;
          } else if (completeMessage !== null) {
            // Bytes that came with the completion still count as trailing data
            if (!buffer.isEmpty) {
              throw new IncompleteMessageError('Additional data after the message received.');
            }
            return completeMessage;
          }
          throw new IncompleteMessageError('Incomplete message.');
        }
      } finally {
        // Consumed up to the end of the last extracted frame. Anything
        // examined but unconsumed makes the next read wait for fresh bytes.
        input.advanceTo(buffer.start, examined);
      }
    }
  } finally {
    signal?.removeEventListener('abort', onAbort);
  }
}

/** Yield every message of the reader until it completes */
export async function* readMessages(
  input: PipeReader,
  options: ReadMessageOptions = {},
): AsyncGenerator<Uint8Array, void, undefined> {
  while (true) {
    const message = await readMessage(input, true, options);
    if (message === null) return;
    yield message;
  }
}

/**
 * Decode a standalone buffer holding exactly one frame.
 */
export function decodeFrame(bytes: Uint8Array, maxMessageSize?: number | null): Frame {
  const extracted = tryReadMessage(ByteSequence.from(bytes), maxMessageSize);
  if (!extracted || !extracted.rest.isEmpty) {
    throw new IncompleteMessageError(
      extracted ? 'Additional data after the message received.' : 'Incomplete message.',
    );
  }
  return {
    compressed : false,
    length     : extracted.payload.byteLength,
    payload    : extracted.payload,
  };
}
