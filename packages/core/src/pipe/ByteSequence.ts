// packages/core/src/pipe/ByteSequence.ts

/** Absolute byte offset within the stream a reader serves */
export type SequencePosition = number;

/**
 * Read-only view over an ordered list of byte segments.
 *
 * `start` and `end` are absolute stream positions, so a slice handed back
 * to `PipeReader.advanceTo()` tells the reader exactly how far the caller
 * consumed (`start`) and examined (`end`). Segments are never copied by
 * slicing; only `copyTo()` / `toArray()` copy.
 */
export class ByteSequence {
  static readonly EMPTY = new ByteSequence([]);

  readonly start : SequencePosition;
  readonly end   : SequencePosition;

  constructor(
    private readonly segments: readonly Uint8Array[],
    private readonly origin: SequencePosition = 0,
    start?: SequencePosition,
    end?: SequencePosition,
  ) {
    const limit = origin + segments.reduce((n, s) => n + s.byteLength, 0);
    this.start  = start ?? origin;
    this.end    = end ?? limit;
    if (this.start < origin || this.end < this.start || this.end > limit) {
      throw new RangeError(
        `Invalid sequence bounds [${this.start}, ${this.end}) for data [${origin}, ${limit})`,
      );
    }
  }

  static from(...chunks: Uint8Array[]): ByteSequence {
    return new ByteSequence(chunks);
  }

  get length(): number { return this.end - this.start; }

  get isEmpty(): boolean { return this.end === this.start; }

  /** First contiguous span of the view (empty when the view is empty) */
  get first(): Uint8Array {
    for (const span of this.spans()) return span;
    return new Uint8Array(0);
  }

  /** Sub-view *[offset, offset + length)* relative to `start` */
  slice(offset: number, length: number = this.length - offset): ByteSequence {
    if (offset < 0 || length < 0 || offset + length > this.length) {
      throw new RangeError('slice() exceeds sequence bounds');
    }
    const from = this.start + offset;
    return new ByteSequence(this.segments, this.origin, from, from + length);
  }

  /** Copy the whole view into the head of `destination` */
  copyTo(destination: Uint8Array): void {
    if (destination.byteLength < this.length) {
      throw new RangeError(
        `Destination too small: ${destination.byteLength} < ${this.length}`,
      );
    }
    let offset = 0;
    for (const span of this.spans()) {
      destination.set(span, offset);
      offset += span.byteLength;
    }
  }

  /** Fresh, independently owned copy of the viewed bytes */
  toArray(): Uint8Array {
    const out = new Uint8Array(this.length);
    this.copyTo(out);
    return out;
  }

  /** Contiguous spans clipped to *[start, end)*, in stream order */
  *spans(): IterableIterator<Uint8Array> {
    let pos = this.origin;
    for (const seg of this.segments) {
      const segStart = pos;
      const segEnd   = pos + seg.byteLength;
      pos = segEnd;

      if (segEnd <= this.start) continue;
      if (segStart >= this.end) break;

      const from = Math.max(this.start, segStart) - segStart;
      const to   = Math.min(this.end, segEnd) - segStart;
      if (to > from) yield seg.subarray(from, to);
    }
  }
}
