/**
 * fixpack - fixed-size binary serialization for TypeScript
 *
 * Every supported type has a maximum encoded size known without looking at
 * any value, so one buffer of `maxSize` bytes always suffices. Integers are
 * fixed-width little-endian; there are no varints, length prefixes or tags.
 *
 * @example
 * ```typescript
 * import { struct, bool, u16, serialize, deserialize } from 'fixpack';
 *
 * const Status = struct({ flag: bool, count: u16 });
 * const buf = new Uint8Array(Status.maxSize); // 3
 *
 * const n = serialize(Status, { flag: true, count: 300 }, buf); // 3
 * const { value, rest } = deserialize(Status, buf);
 * ```
 */

import type { Codec } from "./codec";
import { TrailingBytesError } from "./errors";
import { Reader } from "./reader";
import { Writer } from "./writer";

// Core types
export {
  ScalarType,
  SCALAR_WIDTHS,
  MAX_VARIANTS,
  MinInt64,
  MaxInt64,
  MaxUint64,
  MinInt128,
  MaxInt128,
  MaxUint128,
} from "./types";

// Errors
export {
  ErrorKind,
  FixpackError,
  EncodeError,
  DecodeError,
  BufferOverflowError,
  BufferUnderflowError,
  InvalidValueError,
  InvalidBoolError,
  InvalidDiscriminantError,
  TrailingBytesError,
  TooManyVariantsError,
} from "./errors";

// Codec contract
export { defineCodec } from "./codec";
export type { Codec, CodecDefinition, Encoder, Decoder, Infer } from "./codec";

// Size oracle
export {
  maxSize,
  sumMaxSize,
  arrayMaxSize,
  optionMaxSize,
  unionMaxSize,
} from "./size";
export type { Sized } from "./size";

// Primitive codecs
export {
  unit,
  bool,
  u8,
  u16,
  u32,
  u64,
  u128,
  i8,
  i16,
  i32,
  i64,
  i128,
  f32,
  f64,
} from "./primitives";

// Composite codecs
export { array, bytes, tuple, struct, option, result, transform } from "./composite";
export type { TupleValue, FieldMap, StructValue, Result, Transform } from "./composite";
export { taggedUnion, unitEnum } from "./union";
export type { VariantMap, UnionValue } from "./union";

// Writer and Reader
export { Writer, Reader };

/**
 * Library version.
 */
export const VERSION = "0.1.0";

/**
 * Options for deserialize.
 */
export interface DeserializeOptions {
  /** Reject input with bytes left after the value. Default: false */
  exact?: boolean;
}

/**
 * A decoded value and the unconsumed tail of the input.
 */
export interface Deserialized<T> {
  value: T;
  rest: Uint8Array;
}

/**
 * Serializes `value` into the front of `buffer`.
 *
 * @returns The number of bytes written, at most `codec.maxSize`
 * @throws BufferOverflowError if `buffer` is too short for this value
 * @throws InvalidValueError if `value` does not fit the codec's type
 */
export function serialize<T>(codec: Codec<T>, value: T, buffer: Uint8Array): number {
  const writer = new Writer(buffer);
  codec.encode(writer, value);
  return writer.position;
}

/**
 * Deserializes a value from the front of `data`. Trailing bytes are
 * returned as `rest` (a view into `data`) unless `options.exact` is set.
 *
 * @throws BufferUnderflowError if `data` ends before the value does
 * @throws DecodeError (kind Invalid) if the bytes are not a valid value
 */
export function deserialize<T>(
  codec: Codec<T>,
  data: Uint8Array,
  options: DeserializeOptions = {}
): Deserialized<T> {
  const reader = new Reader(data);
  const value = codec.decode(reader);
  if (options.exact && reader.hasMore) {
    throw new TrailingBytesError(reader.remaining);
  }
  return { value, rest: reader.rest() };
}

/**
 * Marshal encodes a value into a freshly allocated buffer of
 * `codec.maxSize` bytes and returns the written prefix.
 */
export function marshal<T>(codec: Codec<T>, value: T): Uint8Array {
  const buffer = new Uint8Array(codec.maxSize);
  const written = serialize(codec, value, buffer);
  return buffer.subarray(0, written);
}

/**
 * Unmarshal decodes a value that must occupy all of `data`.
 */
export function unmarshal<T>(codec: Codec<T>, data: Uint8Array): T {
  return deserialize(codec, data, { exact: true }).value;
}
