import type { Codec, Infer } from "./codec";
import { InvalidBoolError, InvalidValueError } from "./errors";
import { arrayMaxSize, checkSize, optionMaxSize, sumMaxSize, unionMaxSize } from "./size";
import { INTEGER_KEY, OPTION_NONE, OPTION_SOME } from "./types";

/**
 * Fixed-length array of `count` elements, encoded back to back in index order.
 */
export function array<T>(element: Codec<T>, count: number): Codec<T[]> {
  return {
    maxSize: arrayMaxSize(element, count),
    encode(writer, value) {
      if (value.length !== count) {
        throw new InvalidValueError(`Expected array of length ${count}, got ${value.length}`);
      }
      for (const item of value) {
        element.encode(writer, item);
      }
    },
    decode(reader) {
      const out: T[] = [];
      for (let i = 0; i < count; i++) {
        out.push(element.decode(reader));
      }
      return out;
    },
  };
}

/**
 * Fixed-length raw byte array. Same wire form as `array(u8, length)`,
 * but the value is a Uint8Array.
 */
export function bytes(length: number): Codec<Uint8Array> {
  checkSize(length, "length");
  return {
    maxSize: length,
    encode(writer, value) {
      if (value.length !== length) {
        throw new InvalidValueError(`Expected ${length} bytes, got ${value.length}`);
      }
      writer.writeBytes(value);
    },
    decode: (reader) => reader.readBytes(length),
  };
}

export type TupleValue<C extends Codec<unknown>[]> = { [K in keyof C]: Infer<C[K]> } & unknown[];

/**
 * Positional record: each element encoded in order, nothing in between.
 */
export function tuple<C extends Codec<unknown>[]>(...codecs: C): Codec<TupleValue<C>> {
  return {
    maxSize: sumMaxSize(codecs),
    encode(writer, value) {
      if (value.length !== codecs.length) {
        throw new InvalidValueError(`Expected tuple of length ${codecs.length}, got ${value.length}`);
      }
      for (let i = 0; i < codecs.length; i++) {
        codecs[i].encode(writer, value[i]);
      }
    },
    decode(reader) {
      const out: unknown = codecs.map((codec) => codec.decode(reader));
      return out as TupleValue<C>;
    },
  };
}

export type FieldMap = { [field: string]: Codec<unknown> };

export type StructValue<S extends FieldMap> = { [K in keyof S]: Infer<S[K]> };

/**
 * Named record. Fields are encoded in declaration order with no tags,
 * padding or alignment.
 *
 * @throws RangeError if a field name is integer-like
 */
export function struct<S extends FieldMap>(fields: S): Codec<StructValue<S>> {
  const keys: Extract<keyof S, string>[] = [];
  for (const key in fields) {
    if (INTEGER_KEY.test(key)) {
      throw new RangeError(`Field name "${key}" must not be an integer`);
    }
    keys.push(key);
  }

  return {
    maxSize: sumMaxSize(keys.map((key) => fields[key])),
    encode(writer, value) {
      for (const key of keys) {
        fields[key].encode(writer, value[key]);
      }
    },
    decode(reader) {
      const out: { [field: string]: unknown } = {};
      for (const key of keys) {
        out[key] = fields[key].decode(reader);
      }
      const value: unknown = out;
      return value as StructValue<S>;
    },
  };
}

/**
 * Optional value: one presence byte (0 absent, 1 present), then the inner
 * encoding only when present. `null` means absent.
 */
export function option<T>(inner: Codec<T>): Codec<T | null> {
  return {
    maxSize: optionMaxSize(inner),
    encode(writer, value) {
      if (value === null) {
        writer.writeByte(OPTION_NONE);
        return;
      }
      writer.writeByte(OPTION_SOME);
      inner.encode(writer, value);
    },
    decode(reader) {
      const presence = reader.readByte();
      if (presence === OPTION_NONE) return null;
      if (presence === OPTION_SOME) return inner.decode(reader);
      throw new InvalidBoolError(presence);
    },
  };
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

/**
 * Success-or-failure value: a two-variant union with `ok` at ordinal 0
 * and `error` at ordinal 1.
 */
export function result<T, E>(ok: Codec<T>, err: Codec<E>): Codec<Result<T, E>> {
  return {
    maxSize: unionMaxSize([ok, err]),
    encode(writer, value) {
      if (value.ok) {
        writer.writeVariant(0);
        ok.encode(writer, value.value);
      } else {
        writer.writeVariant(1);
        err.encode(writer, value.error);
      }
    },
    decode(reader) {
      if (reader.readVariant(2) === 0) {
        return { ok: true, value: ok.decode(reader) };
      }
      return { ok: false, error: err.decode(reader) };
    },
  };
}

/**
 * Mapping between an application type and the type a codec already handles.
 */
export interface Transform<T, U> {
  /** Converts a decoded wire value into the application value. */
  decode: (inner: T) => U;
  /** Converts an application value into its wire value. */
  encode: (outer: U) => T;
}

/**
 * Reuses `inner`'s wire format (and bound) for another value type, e.g. to
 * decode a struct straight into a class instance.
 */
export function transform<T, U>(inner: Codec<T>, mapping: Transform<T, U>): Codec<U> {
  return {
    maxSize: inner.maxSize,
    encode: (writer, value) => inner.encode(writer, mapping.encode(value)),
    decode: (reader) => mapping.decode(inner.decode(reader)),
  };
}
