import { ValueMismatchError } from "./errors";
import { ByteOrder, Complex, Kind, ScalarKind } from "./types";

/**
 * Width in bytes of a length prefix.
 */
export type LengthPrefixWidth = 4 | 8;

export const DEFAULT_LENGTH_PREFIX: LengthPrefixWidth = 8;

/**
 * Byte width of every scalar kind on the wire.
 */
export const SCALAR_WIDTHS: Readonly<Record<ScalarKind, number>> = Object.freeze({
  [Kind.Bool]: 1,
  [Kind.Int8]: 1,
  [Kind.Uint8]: 1,
  [Kind.Int16]: 2,
  [Kind.Uint16]: 2,
  [Kind.Int32]: 4,
  [Kind.Uint32]: 4,
  [Kind.Int64]: 8,
  [Kind.Uint64]: 8,
  [Kind.Int]: 8,
  [Kind.Uint]: 8,
  [Kind.Float32]: 4,
  [Kind.Float64]: 8,
  [Kind.Complex64]: 8,
  [Kind.Complex128]: 16,
});

const NUMBER_RANGES: Readonly<Partial<Record<ScalarKind, readonly [number, number]>>> = {
  [Kind.Int8]: [-0x80, 0x7f],
  [Kind.Uint8]: [0, 0xff],
  [Kind.Int16]: [-0x8000, 0x7fff],
  [Kind.Uint16]: [0, 0xffff],
  [Kind.Int32]: [-0x80000000, 0x7fffffff],
  [Kind.Uint32]: [0, 0xffffffff],
};

export const MinInt64 = BigInt("-9223372036854775808"); // -2^63
export const MaxInt64 = BigInt("9223372036854775807"); // 2^63 - 1
export const MaxUint64 = BigInt("0xffffffffffffffff");

const BIGINT_RANGES: Readonly<Partial<Record<ScalarKind, readonly [bigint, bigint]>>> = {
  [Kind.Int64]: [MinInt64, MaxInt64],
  [Kind.Int]: [MinInt64, MaxInt64],
  [Kind.Uint64]: [0n, MaxUint64],
  [Kind.Uint]: [0n, MaxUint64],
};

/**
 * Short description of a runtime value for error messages.
 */
export function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return `array(${value.length})`;
  if (value instanceof Map) return "Map";
  if (value instanceof Uint8Array) return "Uint8Array";
  if (typeof value === "object") {
    const ctor: unknown = Reflect.get(value, "constructor");
    return typeof ctor === "function" && ctor.name !== "" ? ctor.name : "object";
  }
  return typeof value;
}

function isComplex(value: unknown): value is Complex {
  return (
    typeof value === "object" &&
    value !== null &&
    "real" in value &&
    "imag" in value &&
    typeof value.real === "number" &&
    typeof value.imag === "number"
  );
}

/**
 * Reports whether a runtime value can be written as the given scalar kind.
 */
export function scalarMatches(kind: ScalarKind, value: unknown): boolean {
  switch (kind) {
    case Kind.Bool:
      return typeof value === "boolean";
    case Kind.Float32:
    case Kind.Float64:
      return typeof value === "number";
    case Kind.Complex64:
    case Kind.Complex128:
      return isComplex(value);
    case Kind.Int64:
    case Kind.Int:
    case Kind.Uint64:
    case Kind.Uint: {
      const range = BIGINT_RANGES[kind];
      return typeof value === "bigint" && range !== undefined && value >= range[0] && value <= range[1];
    }
    default: {
      const range = NUMBER_RANGES[kind];
      return (
        typeof value === "number" &&
        Number.isInteger(value) &&
        range !== undefined &&
        value >= range[0] &&
        value <= range[1]
      );
    }
  }
}

function checkNumber(kind: ScalarKind, value: unknown): number {
  if (typeof value !== "number") {
    throw new ValueMismatchError(kind, describeValue(value));
  }
  const range = NUMBER_RANGES[kind];
  if (range !== undefined && !(Number.isInteger(value) && value >= range[0] && value <= range[1])) {
    throw new RangeError(`${value} is not a valid ${kind} (range [${range[0]}, ${range[1]}])`);
  }
  return value;
}

function checkBigInt(kind: ScalarKind, value: unknown): bigint {
  if (typeof value !== "bigint") {
    throw new ValueMismatchError(kind, describeValue(value));
  }
  const range = BIGINT_RANGES[kind];
  if (range !== undefined && (value < range[0] || value > range[1])) {
    throw new RangeError(`BigInt value ${value} is outside valid ${kind} range [${range[0]}, ${range[1]}]`);
  }
  return value;
}

function checkComplex(kind: ScalarKind, value: unknown): Complex {
  if (!isComplex(value)) {
    throw new ValueMismatchError(kind, describeValue(value));
  }
  return value;
}

/**
 * Encodes a scalar into its fixed-width representation.
 *
 * @throws ValueMismatchError if the value has the wrong JavaScript type
 * @throws RangeError if an integer is outside the kind's range
 */
export function encodeScalar(kind: ScalarKind, value: unknown, order: ByteOrder): Uint8Array {
  const bytes = new Uint8Array(SCALAR_WIDTHS[kind]);
  const view = new DataView(bytes.buffer);
  const little = order === ByteOrder.LittleEndian;

  switch (kind) {
    case Kind.Bool:
      if (typeof value !== "boolean") {
        throw new ValueMismatchError(kind, describeValue(value));
      }
      bytes[0] = value ? 1 : 0;
      break;
    case Kind.Int8:
      view.setInt8(0, checkNumber(kind, value));
      break;
    case Kind.Uint8:
      view.setUint8(0, checkNumber(kind, value));
      break;
    case Kind.Int16:
      view.setInt16(0, checkNumber(kind, value), little);
      break;
    case Kind.Uint16:
      view.setUint16(0, checkNumber(kind, value), little);
      break;
    case Kind.Int32:
      view.setInt32(0, checkNumber(kind, value), little);
      break;
    case Kind.Uint32:
      view.setUint32(0, checkNumber(kind, value), little);
      break;
    case Kind.Int64:
    case Kind.Int:
      view.setBigInt64(0, checkBigInt(kind, value), little);
      break;
    case Kind.Uint64:
    case Kind.Uint:
      view.setBigUint64(0, checkBigInt(kind, value), little);
      break;
    case Kind.Float32:
      view.setFloat32(0, checkNumber(kind, value), little);
      break;
    case Kind.Float64:
      view.setFloat64(0, checkNumber(kind, value), little);
      break;
    case Kind.Complex64: {
      const c = checkComplex(kind, value);
      view.setFloat32(0, c.real, little);
      view.setFloat32(4, c.imag, little);
      break;
    }
    case Kind.Complex128: {
      const c = checkComplex(kind, value);
      view.setFloat64(0, c.real, little);
      view.setFloat64(8, c.imag, little);
      break;
    }
  }
  return bytes;
}

/**
 * Decodes a scalar from exactly SCALAR_WIDTHS[kind] bytes.
 */
export function decodeScalar(
  kind: ScalarKind,
  bytes: Uint8Array,
  order: ByteOrder
): number | bigint | boolean | Complex {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const little = order === ByteOrder.LittleEndian;

  switch (kind) {
    case Kind.Bool:
      return bytes[0] !== 0;
    case Kind.Int8:
      return view.getInt8(0);
    case Kind.Uint8:
      return view.getUint8(0);
    case Kind.Int16:
      return view.getInt16(0, little);
    case Kind.Uint16:
      return view.getUint16(0, little);
    case Kind.Int32:
      return view.getInt32(0, little);
    case Kind.Uint32:
      return view.getUint32(0, little);
    case Kind.Int64:
    case Kind.Int:
      return view.getBigInt64(0, little);
    case Kind.Uint64:
    case Kind.Uint:
      return view.getBigUint64(0, little);
    case Kind.Float32:
      return view.getFloat32(0, little);
    case Kind.Float64:
      return view.getFloat64(0, little);
    case Kind.Complex64:
      return { real: view.getFloat32(0, little), imag: view.getFloat32(4, little) };
    case Kind.Complex128:
      return { real: view.getFloat64(0, little), imag: view.getFloat64(8, little) };
  }
}

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/**
 * Reports whether a string has no unpaired surrogates, i.e. converts to
 * UTF-8 and back unchanged.
 */
export function isWellFormed(value: string): boolean {
  return !LONE_SURROGATE.test(value);
}

/**
 * Encodes an unsigned length prefix (byte count or element count).
 */
export function encodeLength(length: number, width: LengthPrefixWidth, order: ByteOrder): Uint8Array {
  const bytes = new Uint8Array(width);
  const view = new DataView(bytes.buffer);
  const little = order === ByteOrder.LittleEndian;
  if (width === 4) {
    if (length > 0xffffffff) {
      throw new RangeError(`Length ${length} does not fit a 4-byte prefix`);
    }
    view.setUint32(0, length, little);
  } else {
    view.setBigUint64(0, BigInt(length), little);
  }
  return bytes;
}

/**
 * Decodes an unsigned length prefix. Returns a bigint since an 8-byte
 * prefix may exceed Number.MAX_SAFE_INTEGER.
 */
export function decodeLength(bytes: Uint8Array, width: LengthPrefixWidth, order: ByteOrder): bigint {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const little = order === ByteOrder.LittleEndian;
  return width === 4 ? BigInt(view.getUint32(0, little)) : view.getBigUint64(0, little);
}

/**
 * Lexicographic byte comparison, used to order map entries by encoded key.
 */
export function compareBytes(a: Uint8Array, b: Uint8Array): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    if (a[i] !== b[i]) {
      return a[i] - b[i];
    }
  }
  return a.length - b.length;
}
