// packages/core/src/config/defaults.ts

/** Bytes used by the big-endian "Message-Length" field */
export const MESSAGE_DELIMITER_SIZE = 4 as const;

/** Compression flag + message length */
export const HEADER_SIZE = MESSAGE_DELIMITER_SIZE + 1;

/** Largest length a frame may declare (signed 32-bit max) */
export const MAX_MESSAGE_LENGTH = 0x7fff_ffff;

export const CompressionFlag = {
  NONE       : 0x00,
  COMPRESSED : 0x01,
} as const;

export const DEFAULTS = {
  poolBlockSize         : 4 * 1024,
  poolMaxRetained       : 16,
  maxSendMessageSize    : null,
  maxReceiveMessageSize : 4 * 1024 * 1024,   // 4 MiB, gRPC's customary receive cap
} as const;
