// packages/core/src/index.ts

import { DEFAULTS, MAX_MESSAGE_LENGTH } from './config/defaults.js';
import { ConfigError }                  from './errors/index.js';
import {
  decodeFrame,
  readMessage,
  readMessages,
} from './message/decoder.js';
import { encodeFrame, writeMessage }    from './message/encoder.js';
import type { PipeReader, PipeWriter }  from './pipe/types.js';
import type { Frame }                   from './types/index.js';
import {
  createLogger,
  type Logger,
  type Verbosity,
} from './util/logger.js';

// ────────────────────────────────────────────────────────────────────────────
//  Public configuration shape
// ────────────────────────────────────────────────────────────────────────────

/**
 * Options for configuring MessageCodec behavior.
 */
export interface MessageCodecOptions {
  /** Largest payload accepted by writes; null = protocol cap only */
  maxSendMessageSize?    : number | null;
  /** Largest payload accepted by reads; null = protocol cap only */
  maxReceiveMessageSize? : number | null;
  /** Verbosity level 0-4 for logging (0 = errors only) */
  verbose?               : Verbosity;
  /** Optional custom logger callback (receives formatted messages) */
  logger?                : (msg: string) => void;
}

/**
 * MessageCodec reads and writes length-prefixed gRPC messages over pipes,
 * applying the configured size limits and logging.
 */
export class MessageCodec {
  readonly maxSendMessageSize    : number | null;
  readonly maxReceiveMessageSize : number | null;

  // diagnostics
  private readonly log : Logger;

  constructor(opt: MessageCodecOptions = {}) {
    this.maxSendMessageSize    = MessageCodec.checkLimit(
      'maxSendMessageSize', opt.maxSendMessageSize, DEFAULTS.maxSendMessageSize);
    this.maxReceiveMessageSize = MessageCodec.checkLimit(
      'maxReceiveMessageSize', opt.maxReceiveMessageSize, DEFAULTS.maxReceiveMessageSize);

    this.log = createLogger(opt.verbose ?? 0, opt.logger);
  }

  /**
   * Read one message. In single-message mode the reader must complete right
   * after it; in multi-message mode null signals a clean end of stream.
   */
  async readMessage(
    input: PipeReader,
    supportMultipleMessages: boolean,
    signal?: AbortSignal,
  ): Promise<Uint8Array | null> {
    this.log.log(3, `Reading message (${supportMultipleMessages ? 'multi' : 'single'}-message mode)`);
    try {
      const message = await readMessage(input, supportMultipleMessages, {
        signal,
        maxMessageSize : this.maxReceiveMessageSize,
        log            : this.log,
      });
      this.log.log(2, message === null
        ? 'End of stream'
        : `Message read: ${message.byteLength} B`);
      return message;
    } catch (err) {
      this.logReadFailure(err);
      throw err;
    }
  }

  /** Iterate over every message until the reader completes */
  async *readAll(input: PipeReader, signal?: AbortSignal): AsyncGenerator<Uint8Array, void, undefined> {
    this.log.log(3, 'Reading all messages');
    try {
      yield* readMessages(input, {
        signal,
        maxMessageSize : this.maxReceiveMessageSize,
        log            : this.log,
      });
    } catch (err) {
      this.logReadFailure(err);
      throw err;
    }
  }

  async writeMessage(output: PipeWriter, payload: Uint8Array, flush = false): Promise<void> {
    this.log.log(2, `Writing message: ${payload.byteLength} B${flush ? ' (flush)' : ''}`);
    await writeMessage(output, payload, flush, {
      maxMessageSize : this.maxSendMessageSize,
      log            : this.log,
    });
  }

  encodeFrame(payload: Uint8Array): Uint8Array {
    return encodeFrame(payload, this.maxSendMessageSize);
  }

  decodeFrame(bytes: Uint8Array): Frame {
    return decodeFrame(bytes, this.maxReceiveMessageSize);
  }

  // ════════════════════════════════════════════════════════════════════════
  //  PRIVATE helpers
  // ════════════════════════════════════════════════════════════════════════

  private logReadFailure(err: unknown): void {
    this.log.log(0, `Message read failed: ${err instanceof Error ? err.message : String(err)}`);
  }

  private static checkLimit(
    name: string,
    value: number | null | undefined,
    fallback: number | null,
  ): number | null {
    const v = value === undefined ? fallback : value;
    if (v === null) return null;
    if (!Number.isInteger(v) || v < 0 || v > MAX_MESSAGE_LENGTH) {
      throw new ConfigError(`${name} must be an integer between 0 and ${MAX_MESSAGE_LENGTH}`);
    }
    return v;
  }
}

export * from './errors/index.js';
export {
  CompressionFlag,
  DEFAULTS,
  HEADER_SIZE,
  MAX_MESSAGE_LENGTH,
  MESSAGE_DELIMITER_SIZE,
} from './config/defaults.js';
export { encodeMessageLength, writeHeader } from './header/encoder.js';
export {
  decodeCompressionFlag,
  decodeMessageLength,
  tryReadHeader,
} from './header/decoder.js';
export {
  decodeFrame,
  readMessage,
  readMessages,
  tryReadMessage,
  type ExtractedMessage,
} from './message/decoder.js';
export { encodeFrame, writeMessage } from './message/encoder.js';
export { ByteSequence, type SequencePosition } from './pipe/ByteSequence.js';
export { ArrayBufferWriter, writeBytes, type BufferWriter } from './pipe/BufferWriter.js';
export { BufferPool } from './pipe/BufferPool.js';
export { StreamPipeReader } from './pipe/StreamPipeReader.js';
export { StreamPipeWriter } from './pipe/StreamPipeWriter.js';
export type { PipeReader, PipeWriter, ReadResult } from './pipe/types.js';
export type {
  Frame,
  FrameHeader,
  ReadMessageOptions,
  WriteMessageOptions,
} from './types/index.js';
export { createLogger, toVerbosity, type Logger, type Verbosity } from './util/logger.js';
