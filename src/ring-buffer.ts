/**
 * Fixed-size circular byte buffer over a borrowed region.
 *
 * The caller owns the memory (a plain Buffer, a view over an ArrayBuffer
 * or SharedArrayBuffer, a mapped file segment). The buffer interprets
 * `region[offset .. offset + capacity)` as a circular log and never touches
 * the bytes before `offset`, which stay free for caller metadata.
 *
 * Writes keep only the most recent `capacity` bytes. Reads are raw: they
 * stream the window's physical contents from an independent cursor and know
 * nothing about how much has been written.
 */

import { CursorError, SizeError } from "./errors.js";

/** Default window size for allocate(): 1 MB */
export const DEFAULT_CAPACITY = 1024 * 1024;

export interface ByteWriter {
  /** Consume all of `data`; returns the number of bytes accepted. */
  write(data: Uint8Array): number;
}

export interface ByteReader {
  /** Fill `dest`; returns the number of bytes produced. */
  read(dest: Uint8Array): number;
}

export interface RingBufferOptions {
  /**
   * Also move the read cursor back to the window start on reset().
   * Off by default: reset() only empties the logical contents.
   */
  resetReadCursor?: boolean;
}

/**
 * Throws SizeError unless offset and capacity are valid and, when a region
 * length is given, fit inside it.
 */
function checkDimensions(regionLength: number | null, offset: number, capacity: number): void {
  const dims = { regionLength: regionLength ?? offset + capacity, offset, capacity };
  if (!Number.isSafeInteger(offset) || offset < 0) {
    throw new SizeError(`RingBuffer offset must be a non-negative integer, got ${offset}`, dims);
  }
  if (!Number.isSafeInteger(capacity) || capacity <= 0) {
    throw new SizeError(`RingBuffer capacity must be positive, got ${capacity}`, dims);
  }
  if (regionLength !== null && regionLength < offset + capacity) {
    throw new SizeError(
      `RingBuffer region too small: need ${offset + capacity} bytes (offset ${offset} + capacity ${capacity}), got ${regionLength}`,
      dims,
    );
  }
}

export class RingBuffer implements ByteWriter, ByteReader {
  readonly region: Uint8Array;
  readonly offset: number;
  readonly capacity: number;

  /** region[offset .. offset + capacity), sharing the caller's memory */
  private readonly window: Uint8Array;
  private readonly resetReadCursor: boolean;

  /** Next write position (mod capacity) */
  private head = 0;

  /** Next read position (mod capacity) */
  private cursor = 0;

  /** Total bytes ever written (used to detect wrap) */
  private written = 0;

  /**
   * Wrap `region`. The window defaults to everything after `offset`.
   *
   * @throws {SizeError} if the offset or capacity is not a valid integer,
   *   or the region is shorter than `offset + capacity`
   */
  constructor(
    region: Uint8Array,
    offset = 0,
    capacity: number = region.length - offset,
    options: RingBufferOptions = {},
  ) {
    checkDimensions(region.length, offset, capacity);

    this.region = region;
    this.offset = offset;
    this.capacity = capacity;
    this.window = region.subarray(offset, offset + capacity);
    this.resetReadCursor = options.resetReadCursor ?? false;
  }

  /**
   * Allocate a zero-filled region of `offset + capacity` bytes and wrap it.
   */
  static allocate(
    capacity: number = DEFAULT_CAPACITY,
    offset = 0,
    options: RingBufferOptions = {},
  ): RingBuffer {
    checkDimensions(null, offset, capacity);
    return new RingBuffer(Buffer.alloc(offset + capacity), offset, capacity, options);
  }

  /**
   * Write data into the window, overwriting the oldest bytes if it wraps.
   * Never fails: always reports the full input length as written.
   */
  write(data: Uint8Array): number {
    const n = data.length;
    this.written += n;

    // Only the tail of an oversized write can survive
    const input = n > this.capacity ? data.subarray(n - this.capacity) : data;
    const len = input.length;
    if (len === 0) return n;

    const spaceToEnd = this.capacity - this.head;
    if (len <= spaceToEnd) {
      this.window.set(input, this.head);
    } else {
      this.window.set(input.subarray(0, spaceToEnd), this.head);
      this.window.set(input.subarray(spaceToEnd), 0);
    }

    this.head = (this.head + len) % this.capacity;
    return n;
  }

  /**
   * Fill `dest` from the read cursor, wrapping at the end of the window as
   * many times as needed. Always produces `dest.length` bytes, including
   * slots that were never written (whatever the region holds there).
   *
   * @throws {CursorError} if the read cursor was found outside the window
   */
  read(dest: Uint8Array): number {
    if (!Number.isInteger(this.cursor) || this.cursor < 0 || this.cursor >= this.capacity) {
      throw new CursorError(this.cursor, this.capacity);
    }

    let produced = 0;
    while (produced < dest.length) {
      const chunk = Math.min(dest.length - produced, this.capacity - this.cursor);
      dest.set(this.window.subarray(this.cursor, this.cursor + chunk), produced);
      produced += chunk;
      this.cursor = (this.cursor + chunk) % this.capacity;
    }
    return produced;
  }

  /**
   * Read `length` bytes into a freshly allocated Buffer.
   */
  readBytes(length: number): Buffer {
    const out = Buffer.alloc(length);
    this.read(out);
    return out;
  }

  /**
   * Move the read cursor back to the start of the window.
   */
  rewind(): void {
    this.cursor = 0;
  }

  /**
   * Retained bytes, oldest first. Does not move any cursor.
   *
   * When the data is already contiguous in the window, the result is a view
   * over the caller's region: later writes change it, and it must not be
   * written to. Once the data wraps mid-window, the result is a fresh copy.
   * Use copy() for a result that is always detached.
   */
  snapshot(): Buffer {
    if (this.written >= this.capacity && this.head === 0) {
      return this.view(0, this.capacity);
    }

    if (this.written > this.capacity) {
      // head points to the oldest surviving byte
      const result = Buffer.alloc(this.capacity);
      const firstChunk = this.capacity - this.head;
      result.set(this.window.subarray(this.head), 0);
      result.set(this.window.subarray(0, this.head), firstChunk);
      return result;
    }

    return this.view(0, this.head);
  }

  /**
   * Retained bytes, oldest first, as a copy that no later write affects.
   */
  copy(): Buffer {
    return Buffer.from(this.snapshot());
  }

  /**
   * Logically empty the buffer. Region bytes are left as they are.
   */
  reset(): void {
    this.head = 0;
    this.written = 0;
    if (this.resetReadCursor) {
      this.cursor = 0;
    }
  }

  /**
   * Number of retained bytes: min(totalWritten, capacity).
   */
  get size(): number {
    return Math.min(this.written, this.capacity);
  }

  /**
   * Total bytes written since creation or the last reset (may exceed capacity).
   */
  get totalWritten(): number {
    return this.written;
  }

  get writeCursor(): number {
    return this.head;
  }

  get readCursor(): number {
    return this.cursor;
  }

  private view(start: number, end: number): Buffer {
    const slice = this.window.subarray(start, end);
    return Buffer.from(slice.buffer, slice.byteOffset, slice.length);
  }
}
