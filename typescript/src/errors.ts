/**
 * Broad classification of a fixpack failure.
 */
export enum ErrorKind {
  /** The destination or source buffer ran out of bytes. */
  BufferTooSmall = "BufferTooSmall",
  /** The bytes (or the value) do not form a valid instance of the type. */
  Invalid = "Invalid",
  /** A union or enum declares more variants than one discriminant byte holds. */
  TooManyVariants = "TooManyVariants",
}

/**
 * Base error class for fixpack errors.
 */
export class FixpackError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string) {
    super(message);
    this.name = "FixpackError";
    this.kind = kind;
  }
}

/**
 * Error thrown when encoding fails.
 */
export class EncodeError extends FixpackError {
  constructor(kind: ErrorKind, message: string) {
    super(kind, message);
    this.name = "EncodeError";
  }
}

/**
 * Error thrown when decoding fails.
 */
export class DecodeError extends FixpackError {
  constructor(kind: ErrorKind, message: string) {
    super(kind, message);
    this.name = "DecodeError";
  }
}

/**
 * Error thrown when the destination buffer is too small during encoding.
 */
export class BufferOverflowError extends EncodeError {
  readonly needed: number;
  readonly available: number;

  constructor(needed: number, available: number) {
    super(
      ErrorKind.BufferTooSmall,
      `Buffer overflow: needed ${needed} bytes, only ${available} available`
    );
    this.name = "BufferOverflowError";
    this.needed = needed;
    this.available = available;
  }
}

/**
 * Error thrown when the source buffer is exhausted during decoding.
 */
export class BufferUnderflowError extends DecodeError {
  readonly needed: number;
  readonly available: number;

  constructor(needed: number, available: number) {
    super(
      ErrorKind.BufferTooSmall,
      `Buffer underflow: needed ${needed} bytes, only ${available} available`
    );
    this.name = "BufferUnderflowError";
    this.needed = needed;
    this.available = available;
  }
}

/**
 * Error thrown when a value handed to an encoder does not fit its type
 * (integer out of range, wrong array length, unknown union tag).
 */
export class InvalidValueError extends EncodeError {
  constructor(message: string) {
    super(ErrorKind.Invalid, message);
    this.name = "InvalidValueError";
  }
}

/**
 * Error thrown when a boolean (or presence) byte is neither 0 nor 1.
 */
export class InvalidBoolError extends DecodeError {
  readonly byte: number;

  constructor(byte: number) {
    super(ErrorKind.Invalid, `Invalid boolean byte: 0x${byte.toString(16).padStart(2, "0")}`);
    this.name = "InvalidBoolError";
    this.byte = byte;
  }
}

/**
 * Error thrown when a union discriminant names no declared variant.
 */
export class InvalidDiscriminantError extends DecodeError {
  readonly discriminant: number;
  readonly variantCount: number;

  constructor(discriminant: number, variantCount: number) {
    super(
      ErrorKind.Invalid,
      `Invalid discriminant: ${discriminant} (type has ${variantCount} variants)`
    );
    this.name = "InvalidDiscriminantError";
    this.discriminant = discriminant;
    this.variantCount = variantCount;
  }
}

/**
 * Error thrown by an exact decode when bytes are left over.
 */
export class TrailingBytesError extends DecodeError {
  readonly trailing: number;

  constructor(trailing: number) {
    super(ErrorKind.Invalid, `Trailing bytes: ${trailing} left after decoding`);
    this.name = "TrailingBytesError";
    this.trailing = trailing;
  }
}

/**
 * Error thrown when a type has more variants than the format supports.
 */
export class TooManyVariantsError extends FixpackError {
  constructor(count: number) {
    super(
      ErrorKind.TooManyVariants,
      `Too many variants: ${count} (format only supports 256)`
    );
    this.name = "TooManyVariantsError";
  }
}
