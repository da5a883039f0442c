export {
  RingBuffer,
  DEFAULT_CAPACITY,
  type RingBufferOptions,
  type ByteWriter,
  type ByteReader,
} from "./ring-buffer.js";
export { SizeError, CursorError } from "./errors.js";
