import { classify, classifyValue } from "./classify";
import { HookSizeMismatchError, LengthLimitExceededError, ValueMismatchError } from "./errors";
import { includedFields } from "./fields";
import { BinaryMarshaler, isMarshaler } from "./hooks";
import { ResolvedOptions, resolveOptions, SessionOptions } from "./options";
import { ByteOrder, Kind, MapDescriptor, PointerDescriptor, Type, TypeDescriptor } from "./types";
import { compareBytes, describeValue, encodeLength, encodeScalar, isWellFormed } from "./wire";
import { Sink, writeAll, Writer } from "./writer";

// Module-level singleton to avoid repeated instantiation
const textEncoder = new TextEncoder();

const PRESENT = new Uint8Array([1]);
const ABSENT = new Uint8Array([0]);

/**
 * Counts the bytes a sink accepted.
 */
class CountingSink implements Sink {
  count = 0;

  constructor(private readonly inner: Sink) {}

  write(chunk: Uint8Array): number {
    const n = this.inner.write(chunk);
    this.count += n;
    return n;
  }
}

/**
 * Encoder writes values to a sink, one after another.
 *
 * @example
 * ```typescript
 * const writer = new Writer();
 * const encoder = new Encoder(writer, { tag: "wire", onlyTagged: true });
 * encoder.encode(user, User);
 * const data = writer.bytes();
 * ```
 */
export class Encoder {
  readonly options: ResolvedOptions;
  private readonly sink: CountingSink;

  constructor(sink: Sink, options: SessionOptions = {}) {
    this.sink = new CountingSink(sink);
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
   * Total bytes written through this encoder.
   */
  get bytesWritten(): number {
    return this.sink.count;
  }

  /**
   * Encodes a value. Without a descriptor, one is inferred from the value.
   *
   * A nil (null or undefined) top-level value writes nothing.
   *
   * @throws UnsupportedKindError if the value or anything inside it has a refused kind
   * @throws ShortWriteError if the sink stops accepting bytes
   * @throws LengthLimitExceededError if a string, byte slice, slice or map is
   *         longer than maxLength, which decoders enforce too
   */
  encode<T>(value: T, type?: Type<T>): void {
    const descriptor = type ?? classifyValue(value, this.options.registry);
    this.encodeValue(descriptor, value, false);
  }

  private write(data: Uint8Array): void {
    writeAll(this.sink, data);
  }

  private writeLength(length: number): void {
    if (length > this.options.maxLength) {
      throw new LengthLimitExceededError(length, this.options.maxLength);
    }
    this.write(encodeLength(length, this.options.lengthPrefix, this.options.byteOrder));
  }

  private marshalHook(value: BinaryMarshaler): void {
    const before = this.sink.count;
    const reported = value.marshalBinary(this.sink);
    const actual = this.sink.count - before;
    if (this.options.strict && reported !== actual) {
      throw new HookSizeMismatchError(reported, actual);
    }
  }

  private encodeValue(type: TypeDescriptor, value: unknown, nested: boolean): void {
    const concrete = classify(type);

    // Pointer markers precede any hook output.
    if (concrete.kind === Kind.Pointer) {
      this.encodePointer(concrete, value, nested);
      return;
    }

    if (isMarshaler(value)) {
      this.marshalHook(value);
      return;
    }

    switch (concrete.kind) {
      case Kind.String: {
        if (typeof value !== "string") {
          throw new ValueMismatchError(concrete.kind, describeValue(value));
        }
        if (!isWellFormed(value)) {
          throw new ValueMismatchError("well-formed string", "string with a lone surrogate");
        }
        const data = textEncoder.encode(value);
        this.writeLength(data.length);
        this.write(data);
        return;
      }

      case Kind.Bytes:
        if (!(value instanceof Uint8Array)) {
          throw new ValueMismatchError(concrete.kind, describeValue(value));
        }
        this.writeLength(value.length);
        this.write(value);
        return;

      case Kind.Array:
        classify(concrete.elem);
        if (!Array.isArray(value) || value.length !== concrete.length) {
          throw new ValueMismatchError(`array(${concrete.length})`, describeValue(value));
        }
        for (const elem of value) {
          this.encodeValue(concrete.elem, elem, true);
        }
        return;

      case Kind.Slice:
        classify(concrete.elem);
        if (!Array.isArray(value)) {
          throw new ValueMismatchError(concrete.kind, describeValue(value));
        }
        this.writeLength(value.length);
        for (const elem of value) {
          this.encodeValue(concrete.elem, elem, true);
        }
        return;

      case Kind.Map:
        this.encodeMap(concrete, value);
        return;

      case Kind.Struct: {
        if (typeof value !== "object" || value === null) {
          throw new ValueMismatchError(`struct ${concrete.name}`, describeValue(value));
        }
        for (const field of includedFields(concrete, this.options.tag, this.options.onlyTagged)) {
          this.encodeValue(field.type, field.get(value), true);
        }
        return;
      }

      case Kind.Custom:
        // Reaching here means the value has no marshalBinary of its own.
        throw new ValueMismatchError(concrete.name, describeValue(value));

      default:
        this.write(encodeScalar(concrete.kind, value, this.options.byteOrder));
    }
  }

  private encodePointer(type: PointerDescriptor, value: unknown, nested: boolean): void {
    const markers = nested && this.options.presenceMarkers;
    if (value === null || value === undefined) {
      if (markers) {
        this.write(ABSENT);
      }
      return;
    }
    if (markers) {
      this.write(PRESENT);
    }
    this.encodeValue(type.elem, value, true);
  }

  private encodeMap(type: MapDescriptor, value: unknown): void {
    classify(type.key);
    classify(type.value);
    if (!(value instanceof Map)) {
      throw new ValueMismatchError(type.kind, describeValue(value));
    }
    this.writeLength(value.size);

    if (!this.options.sortMapKeys) {
      for (const [k, v] of value) {
        this.encodeValue(type.key, k, true);
        this.encodeValue(type.value, v, true);
      }
      return;
    }

    const entries: { key: Uint8Array; value: unknown }[] = [];
    for (const [k, v] of value) {
      const keyWriter = new Writer();
      new Encoder(keyWriter, this.options).encodeValue(type.key, k, true);
      entries.push({ key: keyWriter.bytes(), value: v });
    }
    entries.sort((a, b) => compareBytes(a.key, b.key));
    for (const entry of entries) {
      this.write(entry.key);
      this.encodeValue(type.value, entry.value, true);
    }
  }
}

/**
 * Creates an encoder that only writes fields carrying a non-empty,
 * non-"-" value for the given tag name.
 */
export function newEncoderWithTags(sink: Sink, tag: string, onlyTagged: boolean = true): Encoder {
  return new Encoder(sink, { tag, onlyTagged });
}
