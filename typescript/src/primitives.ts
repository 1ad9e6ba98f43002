import type { Codec } from "./codec";
import { SCALAR_WIDTHS, ScalarType } from "./types";

/** Zero-sized value; encodes to nothing. */
export const unit: Codec<undefined> = {
  maxSize: 0,
  encode: () => {},
  decode: () => undefined,
};

export const bool: Codec<boolean> = {
  maxSize: SCALAR_WIDTHS[ScalarType.Bool],
  encode: (writer, value) => writer.writeBool(value),
  decode: (reader) => reader.readBool(),
};

export const u8: Codec<number> = {
  maxSize: SCALAR_WIDTHS[ScalarType.U8],
  encode: (writer, value) => writer.writeU8(value),
  decode: (reader) => reader.readU8(),
};

export const u16: Codec<number> = {
  maxSize: SCALAR_WIDTHS[ScalarType.U16],
  encode: (writer, value) => writer.writeU16(value),
  decode: (reader) => reader.readU16(),
};

export const u32: Codec<number> = {
  maxSize: SCALAR_WIDTHS[ScalarType.U32],
  encode: (writer, value) => writer.writeU32(value),
  decode: (reader) => reader.readU32(),
};

export const u64: Codec<bigint> = {
  maxSize: SCALAR_WIDTHS[ScalarType.U64],
  encode: (writer, value) => writer.writeU64(value),
  decode: (reader) => reader.readU64(),
};

export const u128: Codec<bigint> = {
  maxSize: SCALAR_WIDTHS[ScalarType.U128],
  encode: (writer, value) => writer.writeU128(value),
  decode: (reader) => reader.readU128(),
};

export const i8: Codec<number> = {
  maxSize: SCALAR_WIDTHS[ScalarType.I8],
  encode: (writer, value) => writer.writeI8(value),
  decode: (reader) => reader.readI8(),
};

export const i16: Codec<number> = {
  maxSize: SCALAR_WIDTHS[ScalarType.I16],
  encode: (writer, value) => writer.writeI16(value),
  decode: (reader) => reader.readI16(),
};

export const i32: Codec<number> = {
  maxSize: SCALAR_WIDTHS[ScalarType.I32],
  encode: (writer, value) => writer.writeI32(value),
  decode: (reader) => reader.readI32(),
};

export const i64: Codec<bigint> = {
  maxSize: SCALAR_WIDTHS[ScalarType.I64],
  encode: (writer, value) => writer.writeI64(value),
  decode: (reader) => reader.readI64(),
};

export const i128: Codec<bigint> = {
  maxSize: SCALAR_WIDTHS[ScalarType.I128],
  encode: (writer, value) => writer.writeI128(value),
  decode: (reader) => reader.readI128(),
};

export const f32: Codec<number> = {
  maxSize: SCALAR_WIDTHS[ScalarType.F32],
  encode: (writer, value) => writer.writeF32(value),
  decode: (reader) => reader.readF32(),
};

export const f64: Codec<number> = {
  maxSize: SCALAR_WIDTHS[ScalarType.F64],
  encode: (writer, value) => writer.writeF64(value),
  decode: (reader) => reader.readF64(),
};
