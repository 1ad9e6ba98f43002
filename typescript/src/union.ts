import type { Codec, Infer } from "./codec";
import { InvalidValueError, TooManyVariantsError } from "./errors";
import { unionMaxSize } from "./size";
import { INTEGER_KEY, MAX_VARIANTS } from "./types";

export type VariantMap = { [tag: string]: Codec<unknown> };

/**
 * Value of a tagged union: the variant's tag plus its payload. Variants
 * whose payload codec is `unit` may leave `value` out.
 */
export type UnionValue<V extends VariantMap> = {
  [K in keyof V & string]: Infer<V[K]> extends undefined
    ? { tag: K; value?: undefined }
    : { tag: K; value: Infer<V[K]> };
}[keyof V & string];

/**
 * Tagged union (enum with payloads). Variant ordinals follow the order the
 * tags are declared in `variants`, starting at 0. Encodes as the ordinal
 * byte followed by the active variant's payload only, so the written size
 * depends on the variant while `maxSize` covers the largest one.
 *
 * @example
 * ```typescript
 * const Command = taggedUnion({ Stop: unit, Move: struct({ x: i16, y: i16 }) });
 * serialize(Command, { tag: "Move", value: { x: 1, y: -1 } }, buf); // 5
 * ```
 *
 * @throws TooManyVariantsError if more than 256 variants are declared
 * @throws RangeError if a tag looks like an array index (object key order
 *                    would not match declaration order)
 */
export function taggedUnion<V extends VariantMap>(variants: V): Codec<UnionValue<V>> {
  const tags: Extract<keyof V, string>[] = [];
  for (const tag in variants) {
    if (INTEGER_KEY.test(tag)) {
      throw new RangeError(`Variant tag "${tag}" must not be an integer`);
    }
    tags.push(tag);
  }
  if (tags.length > MAX_VARIANTS) {
    throw new TooManyVariantsError(tags.length);
  }

  const ordinals = new Map<string, number>();
  tags.forEach((tag, ordinal) => ordinals.set(tag, ordinal));

  return {
    maxSize: unionMaxSize(tags.map((tag) => variants[tag])),
    encode(writer, value) {
      const ordinal = ordinals.get(value.tag);
      if (ordinal === undefined) {
        throw new InvalidValueError(`Unknown variant tag: ${String(value.tag)}`);
      }
      writer.writeVariant(ordinal);
      variants[tags[ordinal]].encode(writer, value.value);
    },
    decode(reader) {
      const tag = tags[reader.readVariant(tags.length)];
      const decoded: unknown = { tag, value: variants[tag].decode(reader) };
      return decoded as UnionValue<V>;
    },
  };
}

/**
 * Enum whose variants carry no payload, represented by their names.
 * Encodes as the one-byte ordinal of the name in `names`.
 *
 * @throws TooManyVariantsError if more than 256 names are given
 * @throws RangeError if a name appears twice
 */
export function unitEnum<N extends string>(names: readonly N[]): Codec<N> {
  if (names.length > MAX_VARIANTS) {
    throw new TooManyVariantsError(names.length);
  }
  const ordinals = new Map<string, number>();
  names.forEach((name, ordinal) => {
    if (ordinals.has(name)) {
      throw new RangeError(`Duplicate enum name "${name}"`);
    }
    ordinals.set(name, ordinal);
  });

  return {
    maxSize: unionMaxSize([]),
    encode(writer, value) {
      const ordinal = ordinals.get(value);
      if (ordinal === undefined) {
        throw new InvalidValueError(`Unknown enum name: ${String(value)}`);
      }
      writer.writeVariant(ordinal);
    },
    decode: (reader) => names[reader.readVariant(names.length)],
  };
}
