import { describe, it, expect } from 'vitest';
import {
  BufferOverflowError,
  BufferUnderflowError,
  DecodeError,
  EncodeError,
  ErrorKind,
  FixpackError,
  InvalidBoolError,
  InvalidDiscriminantError,
  InvalidValueError,
  TooManyVariantsError,
  TrailingBytesError,
} from './errors';

describe('error hierarchy', () => {
  it('classifies buffer errors as BufferTooSmall', () => {
    const overflow = new BufferOverflowError(4, 1);
    expect(overflow).toBeInstanceOf(EncodeError);
    expect(overflow).toBeInstanceOf(FixpackError);
    expect(overflow.kind).toBe(ErrorKind.BufferTooSmall);
    expect(overflow.name).toBe('BufferOverflowError');
    expect(overflow.message).toBe('Buffer overflow: needed 4 bytes, only 1 available');

    const underflow = new BufferUnderflowError(2, 0);
    expect(underflow).toBeInstanceOf(DecodeError);
    expect(underflow.kind).toBe(ErrorKind.BufferTooSmall);
  });

  it('classifies validity errors as Invalid', () => {
    expect(new InvalidValueError('bad').kind).toBe(ErrorKind.Invalid);
    expect(new InvalidBoolError(7).kind).toBe(ErrorKind.Invalid);
    expect(new InvalidDiscriminantError(3, 2).kind).toBe(ErrorKind.Invalid);
    expect(new TrailingBytesError(1).kind).toBe(ErrorKind.Invalid);
  });

  it('formats decode errors', () => {
    expect(new InvalidBoolError(7).message).toBe('Invalid boolean byte: 0x07');
    expect(new InvalidDiscriminantError(3, 2).message).toBe(
      'Invalid discriminant: 3 (type has 2 variants)'
    );
    expect(new TrailingBytesError(2).message).toBe('Trailing bytes: 2 left after decoding');
  });

  it('reports too many variants', () => {
    const error = new TooManyVariantsError(300);
    expect(error).toBeInstanceOf(FixpackError);
    expect(error).not.toBeInstanceOf(EncodeError);
    expect(error.kind).toBe(ErrorKind.TooManyVariants);
    expect(error.message).toBe('Too many variants: 300 (format only supports 256)');
  });
});
