import { zero } from "./schema";
import type { Type } from "./types";

/**
 * Mutable box a decoder stores its result in.
 */
export class Ref<T> {
  value: T;

  constructor(value: T) {
    this.value = value;
  }
}

export function ref<T>(value: T): Ref<T> {
  return new Ref(value);
}

/**
 * Creates a Ref holding the zero value of a type.
 */
export function refOf<T>(type: Type<T>): Ref<T> {
  return new Ref(zero(type));
}

export function isRef(value: unknown): value is Ref<unknown> {
  return value instanceof Ref;
}
