import { UnsupportedKindError } from "./errors";
import { isMarshaler, isUnmarshaler } from "./hooks";
import { defaultRegistry, Registry } from "./registry";
import * as schema from "./schema";
import {
  ConcreteDescriptor,
  CustomDescriptor,
  ForbiddenKind,
  Kind,
  PointerDescriptor,
  TypeDescriptor,
} from "./types";
import { describeValue } from "./wire";

const FORBIDDEN_KINDS: ReadonlySet<Kind> = new Set<Kind>([
  Kind.Invalid,
  Kind.Any,
  Kind.Address,
  Kind.RawPointer,
  Kind.Channel,
  Kind.Function,
]);

/** Descriptor of an untyped nil: encodes to nothing, cannot be decoded into. */
const NIL: PointerDescriptor = { kind: Kind.Pointer, elem: schema.invalid };
Object.freeze(NIL);

/**
 * Checks whether a kind is one the engine refuses to serialize.
 */
export function isForbiddenKind(kind: Kind): kind is ForbiddenKind {
  return FORBIDDEN_KINDS.has(kind);
}

/**
 * Resolves lazy descriptors and rejects forbidden kinds.
 *
 * @throws UnsupportedKindError naming the refused kind
 */
export function classify(type: TypeDescriptor): ConcreteDescriptor {
  switch (type.kind) {
    case Kind.Lazy:
      return classify(type.resolve());
    case Kind.Invalid:
    case Kind.Any:
    case Kind.Address:
    case Kind.RawPointer:
    case Kind.Channel:
    case Kind.Function:
      throw new UnsupportedKindError(type.kind);
    default:
      return type;
  }
}

function passthrough(value: object): CustomDescriptor {
  const descriptor: CustomDescriptor = {
    kind: Kind.Custom,
    name: describeValue(value),
    create: () => value,
    accepts: (candidate) => candidate === value,
  };
  return Object.freeze(descriptor);
}

/**
 * Infers a descriptor from a runtime value, for callers that pass no
 * descriptor.
 *
 * JavaScript numbers are float64 and bigints int64. Instances of registered
 * classes get their registered descriptor, values with marshal hooks a
 * passthrough descriptor. null and undefined are untyped nil pointers.
 * Functions are refused as such; anything else whose element or field types
 * cannot be known from the value (plain objects, arrays, maps, symbols)
 * classifies as Kind.Any.
 */
export function classifyValue(value: unknown, registry: Registry = defaultRegistry): TypeDescriptor {
  if (value === null || value === undefined) {
    return NIL;
  }
  switch (typeof value) {
    case "boolean":
      return schema.bool;
    case "string":
      return schema.string;
    case "bigint":
      return schema.int64;
    case "number":
      return schema.float64;
    case "function":
      return schema.func;
    case "symbol":
      return schema.any;
    default:
      break;
  }
  if (value instanceof Uint8Array) {
    return schema.bytes;
  }
  const registered = registry.lookup(value);
  if (registered !== undefined) {
    return registered;
  }
  if (typeof value === "object" && (isMarshaler(value) || isUnmarshaler(value))) {
    return passthrough(value);
  }
  return schema.any;
}
