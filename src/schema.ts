import { UnsupportedKindError, ValueMismatchError } from "./errors";
import { isMarshaler, isUnmarshaler } from "./hooks";
import type { BinaryMarshaler, BinaryUnmarshaler } from "./hooks";
import {
  Kind,
  type ArrayDescriptor,
  type Complex,
  type CustomDescriptor,
  type FieldDefinition,
  type ForbiddenDescriptor,
  type Infer,
  type LazyDescriptor,
  type MapDescriptor,
  type PointerDescriptor,
  type ScalarDescriptor,
  type SliceDescriptor,
  type StructDescriptor,
  type Tags,
  type Type,
  type TypeDescriptor,
} from "./types";
import { describeValue, scalarMatches } from "./wire";

/**
 * Freezes a descriptor in place. Descriptors are shared and cached by
 * identity, so they never change after construction.
 */
function define<D extends TypeDescriptor>(descriptor: D): D {
  Object.freeze(descriptor);
  return descriptor;
}

// ============================================================================
// Scalars
// ============================================================================

export const bool: Type<boolean> = define<ScalarDescriptor>({ kind: Kind.Bool });
export const int8: Type<number> = define<ScalarDescriptor>({ kind: Kind.Int8 });
export const int16: Type<number> = define<ScalarDescriptor>({ kind: Kind.Int16 });
export const int32: Type<number> = define<ScalarDescriptor>({ kind: Kind.Int32 });
export const int64: Type<bigint> = define<ScalarDescriptor>({ kind: Kind.Int64 });
export const int: Type<bigint> = define<ScalarDescriptor>({ kind: Kind.Int });
export const uint8: Type<number> = define<ScalarDescriptor>({ kind: Kind.Uint8 });
export const uint16: Type<number> = define<ScalarDescriptor>({ kind: Kind.Uint16 });
export const uint32: Type<number> = define<ScalarDescriptor>({ kind: Kind.Uint32 });
export const uint64: Type<bigint> = define<ScalarDescriptor>({ kind: Kind.Uint64 });
export const uint: Type<bigint> = define<ScalarDescriptor>({ kind: Kind.Uint });
export const float32: Type<number> = define<ScalarDescriptor>({ kind: Kind.Float32 });
export const float64: Type<number> = define<ScalarDescriptor>({ kind: Kind.Float64 });
export const complex64: Type<Complex> = define<ScalarDescriptor>({ kind: Kind.Complex64 });
export const complex128: Type<Complex> = define<ScalarDescriptor>({ kind: Kind.Complex128 });

export const string: Type<string> = define({ kind: Kind.String });

/** Byte slice; same wire layout as a slice of uint8 */
export const bytes: Type<Uint8Array> = define({ kind: Kind.Bytes });

// ============================================================================
// Kinds the engine refuses
// ============================================================================

export const invalid: Type<unknown> = define<ForbiddenDescriptor>({ kind: Kind.Invalid });
export const any: Type<unknown> = define<ForbiddenDescriptor>({ kind: Kind.Any });
export const address: Type<unknown> = define<ForbiddenDescriptor>({ kind: Kind.Address });
export const rawPointer: Type<unknown> = define<ForbiddenDescriptor>({ kind: Kind.RawPointer });
export const func: Type<unknown> = define<ForbiddenDescriptor>({ kind: Kind.Function });

export function chan(elem: TypeDescriptor): Type<unknown> {
  return define<ForbiddenDescriptor>({ kind: Kind.Channel, elem });
}

// ============================================================================
// Containers
// ============================================================================

/**
 * Fixed-size sequence. Written without a length prefix.
 */
export function array<T>(elem: Type<T>, length: number): Type<T[]> {
  if (!Number.isInteger(length) || length < 0) {
    throw new RangeError(`Invalid array length: ${length}`);
  }
  return define<ArrayDescriptor>({ kind: Kind.Array, elem, length });
}

/**
 * Variable-size sequence. Written with an element-count prefix.
 */
export function slice<T>(elem: Type<T>): Type<T[]> {
  return define<SliceDescriptor>({ kind: Kind.Slice, elem });
}

/**
 * Associative container. Written with an entry-count prefix.
 */
export function map<K, V>(key: Type<K>, value: Type<V>): Type<Map<K, V>> {
  return define<MapDescriptor>({ kind: Kind.Map, key, value });
}

/**
 * Nilable value. A nil pointer contributes no bytes when encoded.
 */
export function pointer<T>(elem: Type<T>): Type<T | null> {
  return define<PointerDescriptor>({ kind: Kind.Pointer, elem });
}

/**
 * Deferred descriptor, for recursive types.
 *
 * @example
 * ```typescript
 * interface ListNode { value: number; next: ListNode | null }
 * const ListNode: Type<ListNode> = t.struct("ListNode", {
 *   value: t.int32,
 *   next: t.pointer(t.lazy(() => ListNode)),
 * });
 * ```
 */
export function lazy<T>(resolve: () => Type<T>): Type<T> {
  return define<LazyDescriptor>({ kind: Kind.Lazy, resolve });
}

/**
 * Type that reads and writes its own representation through
 * marshalBinary/unmarshalBinary.
 */
export function custom<T extends BinaryMarshaler & BinaryUnmarshaler>(ctor: new () => T, name: string = ctor.name): Type<T> {
  return define<CustomDescriptor>({
    kind: Kind.Custom,
    name,
    create: () => new ctor(),
    accepts: (value) => value instanceof ctor,
  });
}

// ============================================================================
// Structs
// ============================================================================

/**
 * A struct field with tags.
 */
export interface FieldSpec<T> {
  readonly type: Type<T>;
  readonly tags: Tags;
}

export type FieldInput = TypeDescriptor | FieldSpec<unknown>;

/**
 * Value type of a struct built from the given fields.
 */
export type StructValue<F extends Record<string, FieldInput>> = {
  [K in keyof F]: F[K] extends { readonly type: infer D } ? Infer<D> : Infer<F[K]>;
};

/**
 * Attaches tags to a struct field.
 *
 * @example
 * ```typescript
 * const User = t.struct("User", {
 *   id: t.field(t.int64, { bin: "id" }),
 *   password: t.field(t.string, { bin: "-" }),
 * });
 * ```
 */
export function field<T>(type: Type<T>, tags: Tags = {}): FieldSpec<T> {
  return Object.freeze({ type, tags: Object.freeze({ ...tags }) });
}

const INDEX_LIKE = /^(0|[1-9][0-9]*)$/;

const NO_TAGS: Tags = {};
Object.freeze(NO_TAGS);

/**
 * Struct with fields in declaration order.
 *
 * Field names that look like array indices are rejected: object key order
 * puts them first, which would break declaration order.
 *
 * @param create - Factory for the object decoded fields are assigned to,
 *                 e.g. `() => new Point()`. Default: a plain object.
 */
export function struct<F extends Record<string, FieldInput>>(
  name: string,
  fields: F,
  create?: () => StructValue<F>
): Type<StructValue<F>> {
  const definitions: FieldDefinition[] = Object.keys(fields).map((key) => {
    if (INDEX_LIKE.test(key)) {
      throw new TypeError(`Struct ${name}: field name "${key}" looks like an array index`);
    }
    const input: FieldInput = fields[key];
    if ("kind" in input) {
      return Object.freeze({ name: key, type: input, tags: NO_TAGS });
    }
    return Object.freeze({ name: key, type: input.type, tags: input.tags });
  });

  return define<StructDescriptor>({
    kind: Kind.Struct,
    name,
    fields: Object.freeze(definitions),
    create: create ?? (() => ({})),
  });
}

// ============================================================================
// Zero values and conformance
// ============================================================================

function resolve(type: TypeDescriptor): Exclude<TypeDescriptor, LazyDescriptor> {
  let current: TypeDescriptor = type;
  while (current.kind === Kind.Lazy) {
    current = current.resolve();
  }
  return current;
}

function isObject(value: unknown): value is object {
  return typeof value === "object" && value !== null;
}

/**
 * Builds the zero value of a struct: the factory's object with every field
 * set to its own zero value.
 */
export function zeroStruct(type: StructDescriptor): object {
  const target = type.create();
  if (!isObject(target)) {
    throw new ValueMismatchError(`object for struct ${type.name}`, describeValue(target));
  }
  for (const def of type.fields) {
    Reflect.set(target, def.name, zeroValue(def.type));
  }
  return target;
}

function zeroValue(type: TypeDescriptor): unknown {
  const concrete = resolve(type);
  switch (concrete.kind) {
    case Kind.Invalid:
    case Kind.Any:
    case Kind.Address:
    case Kind.RawPointer:
    case Kind.Channel:
    case Kind.Function:
      throw new UnsupportedKindError(concrete.kind);
    case Kind.Bool:
      return false;
    case Kind.Int64:
    case Kind.Int:
    case Kind.Uint64:
    case Kind.Uint:
      return 0n;
    case Kind.Complex64:
    case Kind.Complex128:
      return { real: 0, imag: 0 };
    case Kind.String:
      return "";
    case Kind.Bytes:
      return new Uint8Array(0);
    case Kind.Array:
      return Array.from({ length: concrete.length }, () => zeroValue(concrete.elem));
    case Kind.Slice:
      return [];
    case Kind.Map:
      return new Map();
    case Kind.Struct:
      return zeroStruct(concrete);
    case Kind.Pointer:
      return null;
    case Kind.Custom:
      return concrete.create();
    default:
      return 0;
  }
}

/**
 * Reports whether value has the shape type describes. Values carrying their
 * own marshal/unmarshal hooks conform to any encodable descriptor.
 */
export function matches(type: TypeDescriptor, value: unknown): boolean {
  const concrete = resolve(type);
  const hooked = isMarshaler(value) || isUnmarshaler(value);
  switch (concrete.kind) {
    case Kind.Invalid:
    case Kind.Any:
    case Kind.Address:
    case Kind.RawPointer:
    case Kind.Channel:
    case Kind.Function:
      return false;
    case Kind.Custom:
      return concrete.accepts(value);
    case Kind.Pointer:
      return value === null || value === undefined || matches(concrete.elem, value);
    case Kind.String:
      return hooked || typeof value === "string";
    case Kind.Bytes:
      return hooked || value instanceof Uint8Array;
    case Kind.Array:
      return (
        hooked ||
        (Array.isArray(value) &&
          value.length === concrete.length &&
          value.every((elem: unknown) => matches(concrete.elem, elem)))
      );
    case Kind.Slice:
      return hooked || (Array.isArray(value) && value.every((elem: unknown) => matches(concrete.elem, elem)));
    case Kind.Map:
      return hooked || (value instanceof Map && mapMatches(concrete, value));
    case Kind.Struct:
      return (
        hooked ||
        (isObject(value) && concrete.fields.every((def) => matches(def.type, Reflect.get(value, def.name))))
      );
    default:
      return hooked || scalarMatches(concrete.kind, value);
  }
}

function mapMatches(type: MapDescriptor, value: Map<unknown, unknown>): boolean {
  for (const [k, v] of value) {
    if (!matches(type.key, k) || !matches(type.value, v)) {
      return false;
    }
  }
  return true;
}

/**
 * Type guard form of matches.
 */
export function is<T>(type: Type<T>, value: unknown): value is T {
  return matches(type, value);
}

/**
 * Returns the zero value of a type: 0, 0n, "", false, empty containers,
 * null for pointers, a fresh instance for custom types.
 *
 * @throws UnsupportedKindError for kinds the engine refuses
 */
export function zero<T>(type: Type<T>): T {
  const value = zeroValue(type);
  if (!is(type, value)) {
    throw new ValueMismatchError(`zero value of ${resolve(type).kind}`, describeValue(value));
  }
  return value;
}

/**
 * Schema builders, grouped for `t.struct(...)`-style use.
 */
export const t = {
  // Scalars
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

  // Refused kinds
  invalid,
  any,
  address,
  rawPointer,
  func,
  chan,

  // Containers
  array,
  slice,
  map,
  pointer,
  lazy,
  custom,

  // Structs
  struct,
  field,

  // Helpers
  zero,
  is,
} as const;
