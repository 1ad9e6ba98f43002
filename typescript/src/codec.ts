import type { Reader } from "./reader";
import type { Writer } from "./writer";
import { checkSize } from "./size";

/**
 * Encoder function for a fixed-size type.
 */
export type Encoder<T> = (writer: Writer, value: T) => void;

/**
 * Decoder function for a fixed-size type.
 */
export type Decoder<T> = (reader: Reader) => T;

/**
 * A codec is the capability every encodable shape implements: a
 * value-independent size bound plus the encode and decode walks.
 *
 * `encode` must never write more than `maxSize` bytes, and `decode` must
 * accept everything `encode` produces.
 */
export interface Codec<T> {
  /** Maximum number of bytes any value of this type encodes to. */
  readonly maxSize: number;
  encode(writer: Writer, value: T): void;
  decode(reader: Reader): T;
}

/**
 * Extracts the value type of a codec.
 */
export type Infer<C> = C extends Codec<infer T> ? T : never;

/**
 * Definition accepted by {@link defineCodec}.
 */
export interface CodecDefinition<T> {
  maxSize: number;
  encode: Encoder<T>;
  decode: Decoder<T>;
}

/**
 * Wraps hand-written (or generated) encode and decode functions as a codec.
 *
 * This is the seam for code generators: whatever they emit for a record or
 * union must concatenate fields in declaration order, prefix unions with a
 * one-byte ordinal, and declare a `maxSize` derived from its parts.
 *
 * @throws RangeError if maxSize is not a non-negative safe integer
 */
export function defineCodec<T>(definition: CodecDefinition<T>): Codec<T> {
  return {
    maxSize: checkSize(definition.maxSize),
    encode: definition.encode,
    decode: definition.decode,
  };
}
