export class GrpcWireError extends Error {
  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = new.target.name;
  }
}

/* ---------------------------- framing ------------------------------ */
export class BufferTooSmallError          extends GrpcWireError {}
export class MessageTooLargeError         extends GrpcWireError {}
export class CorruptFrameError            extends GrpcWireError {}
export class UnsupportedCompressionError  extends GrpcWireError {}
export class IncompleteMessageError       extends GrpcWireError {}
export class ReadCancelledError           extends GrpcWireError {}

/* ------------------------- pipes & options ------------------------- */
export class PipeStateError               extends GrpcWireError {}
export class ConfigError                  extends GrpcWireError {}
