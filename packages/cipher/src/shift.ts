/**
 * Shift Reduction
 *
 * Normalizes a signed, user-supplied shift into a rotation offset for a
 * single alphabet, and performs the circular rotation itself.
 *
 * @module shift
 */

import { DIGITS, LETTER_MODULUS, PUNCTUATION } from './alphabets.js';
import type { Alphabet, CipherOptions, ReducedShifts } from './types.js';

/**
 * Reduce a shift into [0, modulus).
 *
 * Negative shifts are walked up by whole moduli rather than passed through
 * `%`, which keeps the sign of the dividend in JavaScript.
 *
 * Callers must pass `modulus > 0`; every call site in this package passes an
 * alphabet length.
 *
 * @example
 * ```typescript
 * reduceShift(-3, 26); // 23
 * reduceShift(31, 26); // 5
 * ```
 */
export function reduceShift(original: number, modulus: number): number {
  if (original < 0) {
    // Same result as adding `modulus` until non-negative
    return original + Math.ceil(-original / modulus) * modulus;
  }
  return original % modulus;
}

/**
 * Compute the rotation offset for every enabled character class
 */
export function reduceShifts(
  options: Pick<CipherOptions, 'shift' | 'includeDigits' | 'includePunctuation'>
): ReducedShifts {
  return {
    letters: reduceShift(options.shift, LETTER_MODULUS),
    digits: options.includeDigits ? reduceShift(options.shift, DIGITS.length) : null,
    punctuation: options.includePunctuation
      ? reduceShift(options.shift, PUNCTUATION.length)
      : null,
  };
}

/**
 * Circularly rotate an alphabet left by `k` positions, so that
 * `rotated[i] === alphabet[(i + k) % length]`.
 *
 * `k` is expected to be already reduced.
 */
export function rotateLeft(alphabet: Alphabet, k: number): string[] {
  if (alphabet.length === 0 || k === 0) {
    return [...alphabet];
  }
  return [...alphabet.slice(k), ...alphabet.slice(0, k)];
}
