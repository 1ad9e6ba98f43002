import { InvalidValueError } from "./errors";

/**
 * Scalar types supported by the primitive codec.
 *
 * Every scalar has a fixed width and is laid out little-endian,
 * regardless of the host's native byte order.
 */
export enum ScalarType {
  Bool = "bool",
  U8 = "u8",
  U16 = "u16",
  U32 = "u32",
  U64 = "u64",
  U128 = "u128",
  I8 = "i8",
  I16 = "i16",
  I32 = "i32",
  I64 = "i64",
  I128 = "i128",
  F32 = "f32",
  F64 = "f64",
}

/**
 * Encoded width, in bytes, of each scalar type.
 */
export const SCALAR_WIDTHS: Readonly<Record<ScalarType, number>> = {
  [ScalarType.Bool]: 1,
  [ScalarType.U8]: 1,
  [ScalarType.U16]: 2,
  [ScalarType.U32]: 4,
  [ScalarType.U64]: 8,
  [ScalarType.U128]: 16,
  [ScalarType.I8]: 1,
  [ScalarType.I16]: 2,
  [ScalarType.I32]: 4,
  [ScalarType.I64]: 8,
  [ScalarType.I128]: 16,
  [ScalarType.F32]: 4,
  [ScalarType.F64]: 8,
};

/**
 * A union or enum discriminant is a single byte.
 */
export const MAX_VARIANTS = 256;

/**
 * Discriminant values for option presence.
 */
export const OPTION_NONE = 0x00;
export const OPTION_SOME = 0x01;

/**
 * Property names that JS enumerates ahead of all others, whatever their
 * declaration order. Order-sensitive schemas reject them.
 */
export const INTEGER_KEY = /^(0|[1-9][0-9]*)$/;

/**
 * Integer bounds for the number-valued scalars.
 */
const NUMBER_RANGES = {
  [ScalarType.U8]: [0, 0xff],
  [ScalarType.U16]: [0, 0xffff],
  [ScalarType.U32]: [0, 0xffffffff],
  [ScalarType.I8]: [-0x80, 0x7f],
  [ScalarType.I16]: [-0x8000, 0x7fff],
  [ScalarType.I32]: [-0x80000000, 0x7fffffff],
} as const;

export type NumberIntType = keyof typeof NUMBER_RANGES;

/**
 * Signed and unsigned 64/128-bit integer bounds.
 */
export const MinInt64 = -(1n << 63n);
export const MaxInt64 = (1n << 63n) - 1n;
export const MaxUint64 = (1n << 64n) - 1n;
export const MinInt128 = -(1n << 127n);
export const MaxInt128 = (1n << 127n) - 1n;
export const MaxUint128 = (1n << 128n) - 1n;

const BIGINT_RANGES = {
  [ScalarType.U64]: [0n, MaxUint64],
  [ScalarType.U128]: [0n, MaxUint128],
  [ScalarType.I64]: [MinInt64, MaxInt64],
  [ScalarType.I128]: [MinInt128, MaxInt128],
} as const;

export type BigIntType = keyof typeof BIGINT_RANGES;

/**
 * Checks that a number is an integer within the range of the given type.
 * @throws InvalidValueError if it is not
 */
export function checkNumberRange(type: NumberIntType, value: number): void {
  const [min, max] = NUMBER_RANGES[type];
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new InvalidValueError(`Value ${value} is not a valid ${type} (expected integer in [${min}, ${max}])`);
  }
}

/**
 * Checks that a bigint is within the range of the given type.
 * @throws InvalidValueError if it is not
 */
export function checkBigIntRange(type: BigIntType, value: bigint): void {
  const [min, max] = BIGINT_RANGES[type];
  if (typeof value !== "bigint" || value < min || value > max) {
    throw new InvalidValueError(`Value ${String(value)} is not a valid ${type} (expected bigint in [${min}, ${max}])`);
  }
}
