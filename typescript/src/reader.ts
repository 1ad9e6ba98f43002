import {
  BufferUnderflowError,
  InvalidBoolError,
  InvalidDiscriminantError,
} from "./errors";

/**
 * Reader decodes fixpack data from the front of a binary buffer.
 */
export class Reader {
  private buffer: Uint8Array;
  private view: DataView;
  private pos: number;
  private end: number;

  constructor(data: Uint8Array) {
    this.buffer = data;
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    this.pos = 0;
    this.end = data.length;
  }

  /**
   * Returns the current position in the buffer.
   */
  get position(): number {
    return this.pos;
  }

  /**
   * Returns the number of bytes remaining.
   */
  get remaining(): number {
    return this.end - this.pos;
  }

  /**
   * Returns true if there is more data to read.
   */
  get hasMore(): boolean {
    return this.pos < this.end;
  }

  /**
   * Returns the unconsumed tail of the input. This is a view over the
   * caller's buffer, not a copy.
   */
  rest(): Uint8Array {
    return this.buffer.subarray(this.pos, this.end);
  }

  /**
   * Checks if there are enough bytes available.
   */
  private checkAvailable(needed: number): void {
    if (this.pos + needed > this.end) {
      throw new BufferUnderflowError(needed, this.remaining);
    }
  }

  /**
   * Reads a raw byte.
   */
  readByte(): number {
    this.checkAvailable(1);
    return this.buffer[this.pos++];
  }

  /**
   * Reads raw bytes. The result is a copy, so decoded values never alias
   * the input buffer.
   */
  readBytes(length: number): Uint8Array {
    this.checkAvailable(length);
    const bytes = this.buffer.slice(this.pos, this.pos + length);
    this.pos += length;
    return bytes;
  }

  /**
   * Reads a boolean. Only 0 and 1 are accepted.
   */
  readBool(): boolean {
    const b = this.readByte();
    if (b === 0) return false;
    if (b === 1) return true;
    throw new InvalidBoolError(b);
  }

  /**
   * Reads a union discriminant for a type with `count` variants.
   * An out-of-range discriminant fails after consuming that one byte only.
   */
  readVariant(count: number): number {
    const b = this.readByte();
    if (b >= count) {
      throw new InvalidDiscriminantError(b, count);
    }
    return b;
  }

  readU8(): number {
    return this.readByte();
  }

  readI8(): number {
    this.checkAvailable(1);
    return this.view.getInt8(this.pos++);
  }

  readU16(): number {
    this.checkAvailable(2);
    const value = this.view.getUint16(this.pos, true);
    this.pos += 2;
    return value;
  }

  readI16(): number {
    this.checkAvailable(2);
    const value = this.view.getInt16(this.pos, true);
    this.pos += 2;
    return value;
  }

  readU32(): number {
    this.checkAvailable(4);
    const value = this.view.getUint32(this.pos, true);
    this.pos += 4;
    return value;
  }

  readI32(): number {
    this.checkAvailable(4);
    const value = this.view.getInt32(this.pos, true);
    this.pos += 4;
    return value;
  }

  readU64(): bigint {
    this.checkAvailable(8);
    const value = this.view.getBigUint64(this.pos, true);
    this.pos += 8;
    return value;
  }

  readI64(): bigint {
    this.checkAvailable(8);
    const value = this.view.getBigInt64(this.pos, true);
    this.pos += 8;
    return value;
  }

  readU128(): bigint {
    this.checkAvailable(16);
    const low = this.view.getBigUint64(this.pos, true);
    const high = this.view.getBigUint64(this.pos + 8, true);
    this.pos += 16;
    return (high << 64n) | low;
  }

  readI128(): bigint {
    return BigInt.asIntN(128, this.readU128());
  }

  /**
   * Reads a 64-bit unsigned integer as a JavaScript number.
   *
   * WARNING: JavaScript numbers can only safely represent integers
   * up to Number.MAX_SAFE_INTEGER (2^53-1). Values larger than this
   * will lose precision. Use readU64() for full precision.
   *
   * @param warnOnPrecisionLoss - If true (default), logs a warning when
   *                              precision loss occurs
   */
  readU64AsNumber(warnOnPrecisionLoss: boolean = true): number {
    const value = this.readU64();
    if (warnOnPrecisionLoss && value > BigInt(Number.MAX_SAFE_INTEGER)) {
      console.warn(
        `fixpack: u64 value ${value} exceeds safe integer range ` +
        `(max ${Number.MAX_SAFE_INTEGER}), precision may be lost. ` +
        `Use readU64() for full precision.`
      );
    }
    return Number(value);
  }

  /**
   * Reads a 64-bit signed integer as a JavaScript number.
   * See readU64AsNumber() for the precision caveat.
   */
  readI64AsNumber(warnOnPrecisionLoss: boolean = true): number {
    const value = this.readI64();
    if (warnOnPrecisionLoss) {
      if (value > BigInt(Number.MAX_SAFE_INTEGER) ||
          value < BigInt(Number.MIN_SAFE_INTEGER)) {
        console.warn(
          `fixpack: i64 value ${value} exceeds safe integer range ` +
          `(${Number.MIN_SAFE_INTEGER} to ${Number.MAX_SAFE_INTEGER}), ` +
          `precision may be lost. Use readI64() for full precision.`
        );
      }
    }
    return Number(value);
  }

  /**
   * Reads a 32-bit float (IEEE 754).
   */
  readF32(): number {
    this.checkAvailable(4);
    const value = this.view.getFloat32(this.pos, true); // Little-endian
    this.pos += 4;
    return value;
  }

  /**
   * Reads a 64-bit float (IEEE 754).
   */
  readF64(): number {
    this.checkAvailable(8);
    const value = this.view.getFloat64(this.pos, true); // Little-endian
    this.pos += 8;
    return value;
  }
}
