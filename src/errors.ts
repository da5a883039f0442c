/**
 * Error types thrown by RingBuffer.
 */

/**
 * Region, offset and capacity do not describe a valid window.
 */
export class SizeError extends RangeError {
  readonly regionLength: number;
  readonly offset: number;
  readonly capacity: number;

  constructor(message: string, dims: { regionLength: number; offset: number; capacity: number }) {
    super(message);
    this.name = "SizeError";
    this.regionLength = dims.regionLength;
    this.offset = dims.offset;
    this.capacity = dims.capacity;
  }
}

/**
 * Cursor state is corrupted. Always a bug, never bad input.
 */
export class CursorError extends Error {
  readonly cursor: number;
  readonly capacity: number;

  constructor(cursor: number, capacity: number) {
    super(`Read cursor ${cursor} outside window [0, ${capacity})`);
    this.name = "CursorError";
    this.cursor = cursor;
    this.capacity = capacity;
  }
}
