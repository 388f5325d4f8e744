import { defaultRegistry, Registry } from "./registry";
import { ByteOrder, DEFAULT_BYTE_ORDER, DEFAULT_TAG } from "./types";
import { DEFAULT_LENGTH_PREFIX, LengthPrefixWidth } from "./wire";

/** Default maximum decoded length prefix (64 MiB). */
const DEFAULT_MAX_LENGTH = 64 * 1024 * 1024;

/**
 * Options for Encoder and Decoder sessions.
 */
export interface SessionOptions {
  /** Byte order of multi-byte values. Default: big-endian */
  byteOrder?: ByteOrder;
  /** Tag name looked up on struct fields. Default: "bin" */
  tag?: string;
  /** Only include fields with a non-empty, non-"-" tag. Default: false */
  onlyTagged?: boolean;
  /** Width of string, slice and map length prefixes. Default: 8 */
  lengthPrefix?: LengthPrefixWidth;
  /**
   * Write a one-byte presence marker before every nested pointer, so nil
   * pointers inside structs and containers round-trip. Default: false
   */
  presenceMarkers?: boolean;
  /** Order map entries by encoded key bytes. Default: false (iteration order) */
  sortMapKeys?: boolean;
  /**
   * Fail on truncated input instead of zero-filling, and check the byte
   * counts custom hooks report. Default: false
   */
  strict?: boolean;
  /** Largest length prefix an encoder writes or a decoder accepts. Default: 64 MiB */
  maxLength?: number;
  /** Log a warning when truncated input is zero-filled. Default: false */
  warnOnTruncation?: boolean;
  /** Registry consulted when no descriptor is given. Default: defaultRegistry */
  registry?: Registry;
}

export type ResolvedOptions = Readonly<Required<SessionOptions>>;

/**
 * Defaults for every session option. Frozen: sessions copy from it, never
 * write to it.
 */
export const DEFAULT_OPTIONS: ResolvedOptions = Object.freeze({
  byteOrder: DEFAULT_BYTE_ORDER,
  tag: DEFAULT_TAG,
  onlyTagged: false,
  lengthPrefix: DEFAULT_LENGTH_PREFIX,
  presenceMarkers: false,
  sortMapKeys: false,
  strict: false,
  maxLength: DEFAULT_MAX_LENGTH,
  warnOnTruncation: false,
  registry: defaultRegistry,
});

/**
 * Merges options over the defaults.
 *
 * @throws RangeError for an unknown byte order, a prefix width other than
 *         4 or 8, or a negative/non-integer maxLength
 */
export function resolveOptions(options: SessionOptions = {}): ResolvedOptions {
  const resolved: ResolvedOptions = Object.freeze({
    byteOrder: options.byteOrder ?? DEFAULT_OPTIONS.byteOrder,
    tag: options.tag ?? DEFAULT_OPTIONS.tag,
    onlyTagged: options.onlyTagged ?? DEFAULT_OPTIONS.onlyTagged,
    lengthPrefix: options.lengthPrefix ?? DEFAULT_OPTIONS.lengthPrefix,
    presenceMarkers: options.presenceMarkers ?? DEFAULT_OPTIONS.presenceMarkers,
    sortMapKeys: options.sortMapKeys ?? DEFAULT_OPTIONS.sortMapKeys,
    strict: options.strict ?? DEFAULT_OPTIONS.strict,
    maxLength: options.maxLength ?? DEFAULT_OPTIONS.maxLength,
    warnOnTruncation: options.warnOnTruncation ?? DEFAULT_OPTIONS.warnOnTruncation,
    registry: options.registry ?? DEFAULT_OPTIONS.registry,
  });

  if (resolved.byteOrder !== ByteOrder.BigEndian && resolved.byteOrder !== ByteOrder.LittleEndian) {
    throw new RangeError(`Unknown byte order: ${resolved.byteOrder}`);
  }
  if (resolved.lengthPrefix !== 4 && resolved.lengthPrefix !== 8) {
    throw new RangeError(`Length prefix must be 4 or 8 bytes, got ${resolved.lengthPrefix}`);
  }
  if (!Number.isInteger(resolved.maxLength) || resolved.maxLength < 0) {
    throw new RangeError(`Invalid maxLength: ${resolved.maxLength}`);
  }
  return resolved;
}
