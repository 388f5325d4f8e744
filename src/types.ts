/**
 * Kinds of values a type descriptor can describe.
 *
 * The first group is refused by the engine wherever it appears; the rest map
 * onto a fixed wire representation.
 */
export enum Kind {
  /** No type at all */
  Invalid = "invalid",
  /** Dynamically typed: could be anything */
  Any = "any",
  /** Address-sized raw integer */
  Address = "address",
  /** Raw memory address */
  RawPointer = "rawPointer",
  /** Concurrency channel */
  Channel = "channel",
  /** Callable */
  Function = "function",

  Bool = "bool",
  Int8 = "int8",
  Int16 = "int16",
  Int32 = "int32",
  Int64 = "int64",
  /** Platform-width signed integer, always 8 bytes on the wire */
  Int = "int",
  Uint8 = "uint8",
  Uint16 = "uint16",
  Uint32 = "uint32",
  Uint64 = "uint64",
  /** Platform-width unsigned integer, always 8 bytes on the wire */
  Uint = "uint",
  Float32 = "float32",
  Float64 = "float64",
  Complex64 = "complex64",
  Complex128 = "complex128",

  String = "string",
  Bytes = "bytes",
  Array = "array",
  Slice = "slice",
  Map = "map",
  Struct = "struct",
  Pointer = "pointer",
  Custom = "custom",
  Lazy = "lazy",
}

/**
 * Byte order for multi-byte values. Uniform for one encode or decode call.
 */
export enum ByteOrder {
  BigEndian = "big",
  LittleEndian = "little",
}

/**
 * Tag looked up on struct fields when only-tagged mode is on.
 */
export const DEFAULT_TAG = "bin";

/**
 * Tag value marking a field as excluded in only-tagged mode.
 */
export const EXCLUDE_TAG = "-";

export const DEFAULT_BYTE_ORDER = ByteOrder.BigEndian;

/**
 * Complex number, stored as two floats of the kind's half width.
 */
export interface Complex {
  real: number;
  imag: number;
}

export type ForbiddenKind =
  | Kind.Invalid
  | Kind.Any
  | Kind.Address
  | Kind.RawPointer
  | Kind.Channel
  | Kind.Function;

export type NumberKind =
  | Kind.Int8
  | Kind.Int16
  | Kind.Int32
  | Kind.Uint8
  | Kind.Uint16
  | Kind.Uint32
  | Kind.Float32
  | Kind.Float64;

export type BigIntKind = Kind.Int64 | Kind.Int | Kind.Uint64 | Kind.Uint;

export type ComplexKind = Kind.Complex64 | Kind.Complex128;

export type ScalarKind = NumberKind | BigIntKind | ComplexKind | Kind.Bool;

/**
 * Struct field tags, keyed by tag name: `{ bin: "id", json: "-" }`.
 */
export type Tags = Readonly<Record<string, string>>;

export interface ForbiddenDescriptor {
  readonly kind: ForbiddenKind;
  /** Element type of a channel, kept for diagnostics only */
  readonly elem?: TypeDescriptor;
}

export interface ScalarDescriptor {
  readonly kind: ScalarKind;
}

export interface StringDescriptor {
  readonly kind: Kind.String;
}

export interface BytesDescriptor {
  readonly kind: Kind.Bytes;
}

export interface ArrayDescriptor {
  readonly kind: Kind.Array;
  readonly elem: TypeDescriptor;
  readonly length: number;
}

export interface SliceDescriptor {
  readonly kind: Kind.Slice;
  readonly elem: TypeDescriptor;
}

export interface MapDescriptor {
  readonly kind: Kind.Map;
  readonly key: TypeDescriptor;
  readonly value: TypeDescriptor;
}

export interface FieldDefinition {
  readonly name: string;
  readonly type: TypeDescriptor;
  readonly tags: Tags;
}

export interface StructDescriptor {
  readonly kind: Kind.Struct;
  readonly name: string;
  /** Declaration order; this is the wire order */
  readonly fields: readonly FieldDefinition[];
  /** Creates the empty object fields are decoded into */
  readonly create: () => unknown;
}

export interface PointerDescriptor {
  readonly kind: Kind.Pointer;
  readonly elem: TypeDescriptor;
}

export interface CustomDescriptor {
  readonly kind: Kind.Custom;
  readonly name: string;
  /** Creates an instance to call unmarshalBinary on */
  readonly create: () => unknown;
  /** Whether a value is an instance of this type */
  readonly accepts: (value: unknown) => boolean;
}

export interface LazyDescriptor {
  readonly kind: Kind.Lazy;
  readonly resolve: () => TypeDescriptor;
}

/**
 * Classification of a value's static type.
 */
export type TypeDescriptor =
  | ForbiddenDescriptor
  | ScalarDescriptor
  | StringDescriptor
  | BytesDescriptor
  | ArrayDescriptor
  | SliceDescriptor
  | MapDescriptor
  | StructDescriptor
  | PointerDescriptor
  | CustomDescriptor
  | LazyDescriptor;

/**
 * Descriptors the engine can encode, after lazy resolution.
 */
export type ConcreteDescriptor = Exclude<TypeDescriptor, ForbiddenDescriptor | LazyDescriptor>;

declare const valueType: unique symbol;

/**
 * A type descriptor carrying the TypeScript type of the values it describes.
 */
export type Type<T> = TypeDescriptor & { readonly [valueType]?: T };

/**
 * Infer the TypeScript value type from a descriptor.
 */
export type Infer<D> = D extends { readonly [valueType]?: infer T } ? T : never;
