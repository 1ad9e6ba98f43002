/**
 * Reasoning about the maximum encoded size of types.
 *
 * Bounds compose arithmetically: sequences sum, unions take the largest
 * payload plus one discriminant byte, fixed arrays multiply. Composite codecs
 * compute their bound once, at construction, from codecs that already exist,
 * so a type can never contain itself and every bound is finite.
 */

import type { Codec } from "./codec";

/**
 * Anything carrying a size bound.
 */
export interface Sized {
  readonly maxSize: number;
}

/**
 * Validates a size bound or element count.
 * @throws RangeError if n is not a non-negative safe integer
 */
export function checkSize(n: number, what: string = "maxSize"): number {
  if (!Number.isSafeInteger(n) || n < 0) {
    throw new RangeError(`${what} must be a non-negative safe integer, got ${n}`);
  }
  return n;
}

/**
 * Maximum encoded size of a codec, in bytes.
 */
export function maxSize<T>(codec: Codec<T>): number {
  return codec.maxSize;
}

/**
 * Bound of fields encoded one after another: the sum of their bounds.
 */
export function sumMaxSize(parts: readonly Sized[]): number {
  let total = 0;
  for (const part of parts) {
    total += part.maxSize;
  }
  return checkSize(total);
}

/**
 * Bound of N elements of the same type.
 */
export function arrayMaxSize(element: Sized, count: number): number {
  return checkSize(checkSize(count, "count") * element.maxSize);
}

/**
 * Bound of an optional value: presence byte plus the inner bound.
 */
export function optionMaxSize(inner: Sized): number {
  return checkSize(1 + inner.maxSize);
}

/**
 * Bound of a tagged union: discriminant byte plus the largest payload.
 * A variant without payload counts as 0.
 */
export function unionMaxSize(variants: readonly Sized[]): number {
  let largest = 0;
  for (const variant of variants) {
    if (variant.maxSize > largest) {
      largest = variant.maxSize;
    }
  }
  return checkSize(1 + largest);
}
