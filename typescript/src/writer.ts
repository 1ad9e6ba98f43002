import { BufferOverflowError, InvalidValueError, TooManyVariantsError } from "./errors";
import { MAX_VARIANTS, ScalarType, checkBigIntRange, checkNumberRange } from "./types";

const U64_MASK = (1n << 64n) - 1n;

/**
 * Writer encodes fixpack data into a caller-supplied buffer.
 *
 * The buffer never grows. Every write checks the remaining capacity first
 * and throws BufferOverflowError without touching the buffer when it is
 * short, so nothing is ever written past the end of the slice.
 */
export class Writer {
  private buffer: Uint8Array;
  private view: DataView;
  private pos: number;

  constructor(buffer: Uint8Array) {
    this.buffer = buffer;
    this.view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
    this.pos = 0;
  }

  /**
   * Returns the current position in the buffer (bytes written so far).
   */
  get position(): number {
    return this.pos;
  }

  /**
   * Returns the number of bytes that can still be written.
   */
  get remaining(): number {
    return this.buffer.length - this.pos;
  }

  /**
   * Returns the bytes written so far.
   */
  bytes(): Uint8Array {
    return this.buffer.subarray(0, this.pos);
  }

  private ensureCapacity(needed: number): void {
    if (this.pos + needed > this.buffer.length) {
      throw new BufferOverflowError(needed, this.remaining);
    }
  }

  /**
   * Writes a raw byte.
   */
  writeByte(value: number): void {
    this.ensureCapacity(1);
    this.buffer[this.pos++] = value & 0xff;
  }

  /**
   * Writes raw bytes, with no length prefix.
   */
  writeBytes(data: Uint8Array): void {
    this.ensureCapacity(data.length);
    this.buffer.set(data, this.pos);
    this.pos += data.length;
  }

  /**
   * Writes a boolean as a single 0 or 1 byte.
   */
  writeBool(value: boolean): void {
    if (typeof value !== "boolean") {
      throw new InvalidValueError(`Value ${String(value)} is not a valid bool`);
    }
    this.writeByte(value ? 1 : 0);
  }

  /**
   * Writes a union discriminant.
   */
  writeVariant(index: number): void {
    if (index >= MAX_VARIANTS) {
      throw new TooManyVariantsError(index + 1);
    }
    checkNumberRange(ScalarType.U8, index);
    this.writeByte(index);
  }

  writeU8(value: number): void {
    checkNumberRange(ScalarType.U8, value);
    this.writeByte(value);
  }

  writeI8(value: number): void {
    checkNumberRange(ScalarType.I8, value);
    this.writeByte(value);
  }

  writeU16(value: number): void {
    checkNumberRange(ScalarType.U16, value);
    this.ensureCapacity(2);
    this.view.setUint16(this.pos, value, true);
    this.pos += 2;
  }

  writeI16(value: number): void {
    checkNumberRange(ScalarType.I16, value);
    this.ensureCapacity(2);
    this.view.setInt16(this.pos, value, true);
    this.pos += 2;
  }

  writeU32(value: number): void {
    checkNumberRange(ScalarType.U32, value);
    this.ensureCapacity(4);
    this.view.setUint32(this.pos, value, true);
    this.pos += 4;
  }

  writeI32(value: number): void {
    checkNumberRange(ScalarType.I32, value);
    this.ensureCapacity(4);
    this.view.setInt32(this.pos, value, true);
    this.pos += 4;
  }

  writeU64(value: bigint): void {
    checkBigIntRange(ScalarType.U64, value);
    this.ensureCapacity(8);
    this.view.setBigUint64(this.pos, value, true);
    this.pos += 8;
  }

  writeI64(value: bigint): void {
    checkBigIntRange(ScalarType.I64, value);
    this.ensureCapacity(8);
    this.view.setBigInt64(this.pos, value, true);
    this.pos += 8;
  }

  /**
   * Writes a 128-bit unsigned integer as two little-endian 64-bit halves,
   * low half first.
   */
  writeU128(value: bigint): void {
    checkBigIntRange(ScalarType.U128, value);
    this.writeWide(value);
  }

  /**
   * Writes a 128-bit signed integer in two's complement.
   */
  writeI128(value: bigint): void {
    checkBigIntRange(ScalarType.I128, value);
    this.writeWide(BigInt.asUintN(128, value));
  }

  private writeWide(bits: bigint): void {
    this.ensureCapacity(16);
    this.view.setBigUint64(this.pos, bits & U64_MASK, true);
    this.view.setBigUint64(this.pos + 8, bits >> 64n, true);
    this.pos += 16;
  }

  /**
   * Writes a 32-bit float (IEEE 754).
   */
  writeF32(value: number): void {
    if (typeof value !== "number") {
      throw new InvalidValueError(`Value ${String(value)} is not a valid f32`);
    }
    this.ensureCapacity(4);
    this.view.setFloat32(this.pos, value, true); // Little-endian
    this.pos += 4;
  }

  /**
   * Writes a 64-bit float (IEEE 754).
   */
  writeF64(value: number): void {
    if (typeof value !== "number") {
      throw new InvalidValueError(`Value ${String(value)} is not a valid f64`);
    }
    this.ensureCapacity(8);
    this.view.setFloat64(this.pos, value, true); // Little-endian
    this.pos += 8;
  }
}
