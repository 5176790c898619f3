import type { Logger } from '../util/logger.js';

/* --------------------------- wire shapes ----------------------------- */
export interface FrameHeader {
  compressed : boolean;
  length     : number;
}

export interface Frame extends FrameHeader {
  payload : Uint8Array;
}

/* ------------------------- operation options ------------------------- */
export interface ReadMessageOptions {
  /** Aborting cancels the pending pull and fails the read */
  signal?         : AbortSignal;
  /** Reject frames declaring more bytes than this */
  maxMessageSize? : number | null;
  log?            : Logger;
}

export interface WriteMessageOptions {
  /** Reject payloads longer than this before writing anything */
  maxMessageSize? : number | null;
  log?            : Logger;
}
