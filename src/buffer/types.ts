/**
 * Core types for the byte buffer.
 *
 * Offsets are plain byte indices into one rope version. A range is
 * half-open: `[start, end)`.
 */

// =============================================================================
// Ranges
// =============================================================================

/** A half-open byte range `[start, end)` within one buffer version. */
export interface ByteRange {
  readonly start: number;
  readonly end: number;
}

/** Replace `[start, end)` with `bytes`. */
export interface Splice {
  readonly start: number;
  readonly end: number;
  readonly bytes: Uint8Array;
}

// =============================================================================
// Errors
// =============================================================================

/**
 * An offset or range outside `[0, length]` was passed to the rope.
 *
 * Public editor operations clamp before calling into the rope, so this is
 * only ever a programming error.
 */
export class OutOfBoundsError extends Error {
  readonly start: number;
  readonly end: number;
  readonly length: number;

  constructor(start: number, end: number, length: number) {
    super(`range [${start}, ${end}) is out of bounds for length ${length}`);
    this.name = "OutOfBoundsError";
    this.start = start;
    this.end = end;
    this.length = length;
  }
}
