/**
 * Base error class for structpack errors.
 */
export class StructpackError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StructpackError";
  }
}

/**
 * Error thrown when encoding fails.
 */
export class EncodeError extends StructpackError {
  constructor(message: string) {
    super(message);
    this.name = "EncodeError";
  }
}

/**
 * Error thrown when decoding fails.
 */
export class DecodeError extends StructpackError {
  constructor(message: string) {
    super(message);
    this.name = "DecodeError";
  }
}

/**
 * Error thrown when a value, element, key or field belongs to a kind
 * the engine refuses to serialize.
 */
export class UnsupportedKindError extends StructpackError {
  readonly kind: string;

  constructor(kind: string) {
    super(`Unsupported kind: ${kind}`);
    this.name = "UnsupportedKindError";
    this.kind = kind;
  }
}

/**
 * Error thrown when a decode target is not a Ref.
 */
export class NotAPointerError extends DecodeError {
  constructor() {
    super("Can only decode into a Ref");
    this.name = "NotAPointerError";
  }
}

/**
 * Error thrown when a sink accepts fewer bytes than it was given.
 */
export class ShortWriteError extends EncodeError {
  readonly written: number;
  readonly requested: number;

  constructor(written: number, requested: number) {
    super(`Short write: only ${written} of ${requested} bytes written`);
    this.name = "ShortWriteError";
    this.written = written;
    this.requested = requested;
  }
}

/**
 * Error thrown in strict mode when the source ends before a value is complete.
 */
export class TruncatedInputError extends DecodeError {
  readonly needed: number;
  readonly available: number;

  constructor(needed: number, available: number) {
    super(`Truncated input: needed ${needed} bytes, only ${available} available`);
    this.name = "TruncatedInputError";
    this.needed = needed;
    this.available = available;
  }
}

/**
 * Error thrown when a length prefix, written or read, exceeds the configured
 * maximum.
 */
export class LengthLimitExceededError extends StructpackError {
  constructor(length: bigint | number, max: number) {
    super(`Length ${length} exceeds maximum of ${max}`);
    this.name = "LengthLimitExceededError";
  }
}

/**
 * Error thrown when decoded string bytes are not valid UTF-8.
 */
export class MalformedStringError extends DecodeError {
  constructor() {
    super("String bytes are not valid UTF-8");
    this.name = "MalformedStringError";
  }
}

/**
 * Error thrown when a value does not have the shape its descriptor describes.
 */
export class ValueMismatchError extends StructpackError {
  constructor(expected: string, actual: string) {
    super(`Value mismatch: expected ${expected}, got ${actual}`);
    this.name = "ValueMismatchError";
  }
}

/**
 * Error thrown in strict mode when a custom hook reports a byte count
 * different from what it actually wrote or read.
 */
export class HookSizeMismatchError extends StructpackError {
  constructor(reported: number, actual: number) {
    super(`Hook reported ${reported} bytes but ${actual} were transferred`);
    this.name = "HookSizeMismatchError";
  }
}

/**
 * Error thrown when a type is not registered.
 */
export class TypeNotRegisteredError extends StructpackError {
  constructor(typeName: string) {
    super(`Type not registered: ${typeName}`);
    this.name = "TypeNotRegisteredError";
  }
}
