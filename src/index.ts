/**
 * structpack - binary serialization of typed values
 *
 * Values are described once with type descriptors; the engine walks them
 * and writes a compact, fixed-layout encoding with no field markers.
 *
 * @example
 * ```typescript
 * import { t, marshal, unmarshal, refOf } from 'structpack';
 *
 * const Point = t.struct("Point", { x: t.int32, y: t.int32 });
 *
 * // Encoding
 * const data = marshal({ x: 1, y: -2 }, Point);
 *
 * // Decoding
 * const point = refOf(Point);
 * const consumed = unmarshal(data, point, Point);
 * ```
 */

import { Decoder } from "./decoder";
import { Encoder } from "./encoder";
import { Reader } from "./reader";
import type { Ref } from "./ref";
import type { Type } from "./types";
import { Writer } from "./writer";

// Core types
export {
  Kind,
  ByteOrder,
  DEFAULT_TAG,
  EXCLUDE_TAG,
  DEFAULT_BYTE_ORDER,
} from "./types";
export type {
  Complex,
  Tags,
  Type,
  Infer,
  TypeDescriptor,
  ConcreteDescriptor,
  ForbiddenKind,
  ScalarKind,
  StructDescriptor,
  FieldDefinition,
} from "./types";

// Errors
export {
  StructpackError,
  EncodeError,
  DecodeError,
  UnsupportedKindError,
  NotAPointerError,
  ShortWriteError,
  TruncatedInputError,
  LengthLimitExceededError,
  MalformedStringError,
  ValueMismatchError,
  HookSizeMismatchError,
  TypeNotRegisteredError,
} from "./errors";

// Schema
export {
  t,
  bool,
  int8,
  int16,
  int32,
  int64,
  int,
  uint8,
  uint16,
  uint32,
  uint64,
  uint,
  float32,
  float64,
  complex64,
  complex128,
  string,
  bytes,
  invalid,
  any,
  address,
  rawPointer,
  func,
  chan,
  array,
  slice,
  map,
  pointer,
  lazy,
  custom,
  struct,
  field,
  zero,
  is,
} from "./schema";
export type { FieldSpec, FieldInput, StructValue } from "./schema";

// Classification and field tables
export { classify, classifyValue, isForbiddenKind } from "./classify";
export { resolveFields, includedFields, isIncluded, lookupTag } from "./fields";
export type { FieldDescriptor } from "./fields";

// Wire format
export {
  isWellFormed,
  SCALAR_WIDTHS,
  DEFAULT_LENGTH_PREFIX,
  MinInt64,
  MaxInt64,
  MaxUint64,
} from "./wire";
export type { LengthPrefixWidth } from "./wire";

// Hooks
export { isMarshaler, isUnmarshaler } from "./hooks";
export type { BinaryMarshaler, BinaryUnmarshaler } from "./hooks";

// Sink and source
export { Writer, writeAll } from "./writer";
export type { Sink, WriterOptions } from "./writer";
export { Reader, readFull } from "./reader";
export type { Source, ReaderOptions, ReadResult } from "./reader";

// Sessions
export { DEFAULT_OPTIONS, resolveOptions } from "./options";
export type { SessionOptions, ResolvedOptions } from "./options";
export { Encoder, newEncoderWithTags } from "./encoder";
export { Decoder, newDecoderWithTags } from "./decoder";
export { Ref, ref, refOf, isRef } from "./ref";

// Registry
export { Registry, defaultRegistry, register } from "./registry";
export type { Constructor } from "./registry";

/**
 * Library version.
 */
export const VERSION = "1.0.0";

/**
 * Marshal encodes a value with the default session options.
 */
export function marshal<T>(value: T, type?: Type<T>): Uint8Array {
  const writer = new Writer();
  new Encoder(writer).encode(value, type);
  return writer.bytes();
}

/**
 * MarshalOnly encodes only the struct fields tagged with `tag`.
 */
export function marshalOnly<T>(value: T, tag: string, type?: Type<T>): Uint8Array {
  const writer = new Writer();
  new Encoder(writer, { tag, onlyTagged: true }).encode(value, type);
  return writer.bytes();
}

/**
 * Unmarshal decodes data into target and returns the number of bytes used.
 */
export function unmarshal<T>(data: Uint8Array, target: Ref<T> | null, type?: Type<T>): number {
  const reader = new Reader(data);
  new Decoder(reader).decode(target, type);
  return reader.position;
}

/**
 * UnmarshalOnly decodes only the struct fields tagged with `tag`.
 */
export function unmarshalOnly<T>(data: Uint8Array, target: Ref<T> | null, tag: string, type?: Type<T>): number {
  const reader = new Reader(data);
  new Decoder(reader, { tag, onlyTagged: true }).decode(target, type);
  return reader.position;
}
