import { classify, classifyValue } from "./classify";
import {
  HookSizeMismatchError,
  LengthLimitExceededError,
  MalformedStringError,
  NotAPointerError,
  TruncatedInputError,
  ValueMismatchError,
} from "./errors";
import { includedFields } from "./fields";
import { BinaryUnmarshaler, isUnmarshaler } from "./hooks";
import { ResolvedOptions, resolveOptions, SessionOptions } from "./options";
import { readFull, Source } from "./reader";
import { isRef, Ref } from "./ref";
import { matches, zeroStruct } from "./schema";
import {
  ArrayDescriptor,
  ByteOrder,
  Kind,
  MapDescriptor,
  PointerDescriptor,
  StructDescriptor,
  Type,
  TypeDescriptor,
} from "./types";
import { decodeLength, decodeScalar, describeValue, SCALAR_WIDTHS } from "./wire";

// Module-level singleton to avoid repeated instantiation
const textDecoder = new TextDecoder("utf-8", { fatal: true });

/**
 * Counts the bytes a source delivered.
 */
class CountingSource implements Source {
  count = 0;

  constructor(private readonly inner: Source) {}

  read(into: Uint8Array): number {
    const n = this.inner.read(into);
    this.count += n;
    return n;
  }
}

function isObject(value: unknown): value is object {
  return typeof value === "object" && value !== null;
}

/**
 * Decoder reads values from a source, one after another.
 *
 * Input that ends early is zero-filled unless `strict` is set; check
 * bytesRead against the input length to detect truncation otherwise.
 *
 * @example
 * ```typescript
 * const decoder = new Decoder(new Reader(data));
 * const user = refOf(User);
 * decoder.decode(user, User);
 * ```
 */
export class Decoder {
  readonly options: ResolvedOptions;
  private readonly source: CountingSource;

  constructor(source: Source, options: SessionOptions = {}) {
    this.source = new CountingSource(source);
    this.options = resolveOptions(options);
  }

  get byteOrder(): ByteOrder {
    return this.options.byteOrder;
  }

  get tag(): string {
    return this.options.tag;
  }

  get onlyTagged(): boolean {
    return this.options.onlyTagged;
  }

  /**
   * Total bytes consumed through this decoder.
   */
  get bytesRead(): number {
    return this.source.count;
  }

  /**
   * Decodes into target. Without a descriptor, one is inferred from the
   * target's current value.
   *
   * A null target is a no-op. Structs already in the target are decoded
   * into, so fields a session skips keep their values.
   *
   * @throws NotAPointerError if target is not a Ref
   * @throws UnsupportedKindError if the type or anything inside it has a refused kind
   */
  decode<T>(target: Ref<T> | null | undefined, type?: Type<T>): void {
    if (target === null || target === undefined) {
      return;
    }
    if (!isRef(target)) {
      throw new NotAPointerError();
    }
    const descriptor = type ?? classifyValue(target.value, this.options.registry);
    this.decodeInto(target, descriptor);
  }

  private decodeInto(target: Ref<unknown>, type: TypeDescriptor): void {
    const decoded = this.decodeValue(type, target.value, false);
    if (!matches(type, decoded)) {
      throw new ValueMismatchError(classify(type).kind, describeValue(decoded));
    }
    target.value = decoded;
  }

  private read(length: number): Uint8Array {
    const { bytes, count } = readFull(this.source, length);
    if (count < length) {
      if (this.options.strict) {
        throw new TruncatedInputError(length, count);
      }
      if (this.options.warnOnTruncation) {
        console.warn(
          `structpack: input ended after ${count} of ${length} bytes, ` +
          `treating the rest as zero. Set strict to fail instead.`
        );
      }
    }
    return bytes;
  }

  private readLength(): number {
    const length = decodeLength(
      this.read(this.options.lengthPrefix),
      this.options.lengthPrefix,
      this.options.byteOrder
    );
    if (length > BigInt(this.options.maxLength)) {
      throw new LengthLimitExceededError(length, this.options.maxLength);
    }
    return Number(length);
  }

  private unmarshalHook(value: BinaryUnmarshaler): void {
    const before = this.source.count;
    const reported = value.unmarshalBinary(this.source);
    const actual = this.source.count - before;
    if (this.options.strict && reported !== actual) {
      throw new HookSizeMismatchError(reported, actual);
    }
  }

  /**
   * Decodes one value. `current` is what the destination holds now
   * (undefined for fresh storage); structs and hook-bearing values are
   * decoded into it, everything else is replaced.
   */
  private decodeValue(type: TypeDescriptor, current: unknown, nested: boolean): unknown {
    const concrete = classify(type);

    // Pointer markers precede any hook input.
    if (concrete.kind === Kind.Pointer) {
      return this.decodePointer(concrete, current, nested);
    }

    if (isUnmarshaler(current)) {
      this.unmarshalHook(current);
      return current;
    }

    switch (concrete.kind) {
      case Kind.String:
        return this.decodeString(this.read(this.readLength()));

      case Kind.Bytes:
        return this.read(this.readLength());

      case Kind.Array:
        return this.decodeArray(concrete, current);

      case Kind.Slice: {
        classify(concrete.elem);
        const length = this.readLength();
        const out: unknown[] = [];
        for (let i = 0; i < length; i++) {
          out.push(this.decodeValue(concrete.elem, undefined, true));
        }
        return out;
      }

      case Kind.Map:
        return this.decodeMap(concrete);

      case Kind.Struct:
        return this.decodeStruct(concrete, current);

      case Kind.Custom: {
        const instance = concrete.create();
        if (!isUnmarshaler(instance)) {
          throw new ValueMismatchError(`${concrete.name} with unmarshalBinary`, describeValue(instance));
        }
        this.unmarshalHook(instance);
        return instance;
      }

      default:
        return decodeScalar(concrete.kind, this.read(SCALAR_WIDTHS[concrete.kind]), this.options.byteOrder);
    }
  }

  private decodePointer(type: PointerDescriptor, current: unknown, nested: boolean): unknown {
    if (nested && this.options.presenceMarkers && this.read(1)[0] === 0) {
      return null;
    }
    // Always given storage: nil becomes a fresh zero value.
    const storage = current === null ? undefined : current;
    return this.decodeValue(type.elem, storage, true);
  }

  private decodeString(data: Uint8Array): string {
    try {
      return textDecoder.decode(data);
    } catch (e) {
      if (e instanceof TypeError) {
        throw new MalformedStringError();
      }
      throw e;
    }
  }

  private decodeArray(type: ArrayDescriptor, current: unknown): unknown[] {
    classify(type.elem);
    const out: unknown[] =
      Array.isArray(current) && current.length === type.length ? current : new Array<unknown>(type.length);
    for (let i = 0; i < type.length; i++) {
      out[i] = this.decodeValue(type.elem, undefined, true);
    }
    return out;
  }

  private decodeMap(type: MapDescriptor): Map<unknown, unknown> {
    classify(type.key);
    classify(type.value);
    const size = this.readLength();
    const out = new Map<unknown, unknown>();
    for (let i = 0; i < size; i++) {
      const key = this.decodeValue(type.key, undefined, true);
      const value = this.decodeValue(type.value, undefined, true);
      out.set(key, value);
    }
    return out;
  }

  private decodeStruct(type: StructDescriptor, current: unknown): object {
    const target = isObject(current) ? current : zeroStruct(type);
    for (const field of includedFields(type, this.options.tag, this.options.onlyTagged)) {
      field.set(target, this.decodeValue(field.type, field.get(target), true));
    }
    return target;
  }
}

/**
 * Creates a decoder that only reads fields carrying a non-empty, non-"-"
 * value for the given tag name.
 */
export function newDecoderWithTags(source: Source, tag: string, onlyTagged: boolean = true): Decoder {
  return new Decoder(source, { tag, onlyTagged });
}
