/**
 * Origin of bytes to decode.
 */
export interface Source {
  /**
   * Copies up to into.length bytes into `into` and returns how many were
   * copied. Returning 0 means no further bytes are available.
   */
  read(into: Uint8Array): number;
}

/**
 * Options for Reader configuration.
 */
export interface ReaderOptions {
  /** Maximum bytes handed out per read call. Default: unlimited */
  chunkSize?: number;
}

/**
 * Reader serves bytes from an in-memory buffer.
 */
export class Reader implements Source {
  private readonly buffer: Uint8Array;
  private readonly chunkSize: number;
  private pos: number;

  constructor(data: Uint8Array, options: ReaderOptions = {}) {
    this.buffer = data;
    this.chunkSize = options.chunkSize ?? Number.POSITIVE_INFINITY;
    this.pos = 0;
  }

  /**
   * Returns the current position in the buffer.
   */
  get position(): number {
    return this.pos;
  }

  /**
   * Returns the number of bytes remaining.
   */
  get remaining(): number {
    return this.buffer.length - this.pos;
  }

  /**
   * Returns true if there is more data to read.
   */
  get hasMore(): boolean {
    return this.pos < this.buffer.length;
  }

  read(into: Uint8Array): number {
    const n = Math.min(into.length, this.remaining, this.chunkSize);
    into.set(this.buffer.subarray(this.pos, this.pos + n));
    this.pos += n;
    return n;
  }

  /**
   * Resets the reader to the beginning of the buffer.
   */
  reset(): void {
    this.pos = 0;
  }
}

/**
 * Result of readFull.
 */
export interface ReadResult {
  /** Always `length` bytes long; anything past `count` is zero */
  bytes: Uint8Array;
  /** Bytes actually delivered by the source */
  count: number;
}

/**
 * Reads `length` bytes, calling source.read until enough bytes arrived or a
 * read returns 0. Running out of input is not an error here: callers compare
 * count against length.
 */
export function readFull(source: Source, length: number): ReadResult {
  const bytes = new Uint8Array(length);
  let count = 0;
  while (count < length) {
    const n = source.read(bytes.subarray(count));
    if (n === 0) {
      break;
    }
    count += n;
  }
  return { bytes, count };
}
