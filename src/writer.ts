import { ShortWriteError } from "./errors";

const INITIAL_CAPACITY = 256;
const GROWTH_FACTOR = 2;

/**
 * Destination for encoded bytes.
 */
export interface Sink {
  /**
   * Writes as much of chunk as the sink accepts and returns the number of
   * bytes taken. Returning less than chunk.length is a short write.
   */
  write(chunk: Uint8Array): number;
}

/**
 * Options for Writer configuration.
 */
export interface WriterOptions {
  /** Initial buffer capacity. Default: 256 */
  initialCapacity?: number;
  /** Maximum number of bytes accepted; writes past it are cut short. Default: unbounded */
  limit?: number;
}

/**
 * Writer collects encoded bytes in a growable in-memory buffer.
 */
export class Writer implements Sink {
  private buffer: Uint8Array;
  private pos: number;
  private readonly limit: number | undefined;

  constructor(options: WriterOptions = {}) {
    this.buffer = new Uint8Array(options.initialCapacity ?? INITIAL_CAPACITY);
    this.pos = 0;
    this.limit = options.limit;
  }

  /**
   * Returns the current position in the buffer.
   */
  get position(): number {
    return this.pos;
  }

  /**
   * Returns the encoded bytes.
   */
  bytes(): Uint8Array {
    return this.buffer.subarray(0, this.pos);
  }

  /**
   * Resets the writer for reuse.
   */
  reset(): void {
    this.pos = 0;
  }

  /**
   * Ensures the buffer has at least the specified capacity.
   */
  private ensureCapacity(needed: number): void {
    const required = this.pos + needed;
    if (required <= this.buffer.length) {
      return;
    }

    let newCapacity = Math.max(this.buffer.length, 1) * GROWTH_FACTOR;
    while (newCapacity < required) {
      newCapacity *= GROWTH_FACTOR;
    }

    const newBuffer = new Uint8Array(newCapacity);
    newBuffer.set(this.buffer.subarray(0, this.pos));
    this.buffer = newBuffer;
  }

  write(chunk: Uint8Array): number {
    const accepted =
      this.limit === undefined ? chunk.length : Math.max(0, Math.min(chunk.length, this.limit - this.pos));
    this.ensureCapacity(accepted);
    this.buffer.set(chunk.subarray(0, accepted), this.pos);
    this.pos += accepted;
    return accepted;
  }
}

/**
 * Writes all of data to sink.
 *
 * @throws ShortWriteError if the sink takes fewer bytes than offered
 */
export function writeAll(sink: Sink, data: Uint8Array): number {
  const written = sink.write(data);
  if (written !== data.length) {
    throw new ShortWriteError(written, data.length);
  }
  return written;
}
