import type { Source } from "./reader";
import type { Sink } from "./writer";

/**
 * Implemented by values that write their own representation.
 *
 * The engine calls marshalBinary instead of its built-in rules, whatever
 * the value's descriptor says.
 */
export interface BinaryMarshaler {
  /** Returns the number of bytes written */
  marshalBinary(sink: Sink): number;
}

/**
 * Implemented by values that read their own representation.
 */
export interface BinaryUnmarshaler {
  /** Returns the number of bytes consumed */
  unmarshalBinary(source: Source): number;
}

export function isMarshaler(value: unknown): value is BinaryMarshaler {
  return (
    typeof value === "object" &&
    value !== null &&
    "marshalBinary" in value &&
    typeof value.marshalBinary === "function"
  );
}

export function isUnmarshaler(value: unknown): value is BinaryUnmarshaler {
  return (
    typeof value === "object" &&
    value !== null &&
    "unmarshalBinary" in value &&
    typeof value.unmarshalBinary === "function"
  );
}
