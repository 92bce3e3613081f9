/**
 * Shift Reduction Tests
 */

import { describe, it, expect } from 'vitest';
import { reduceShift, reduceShifts, rotateLeft } from './shift.js';
import { DIGITS, UPPERCASE } from './alphabets.js';

describe('reduceShift', () => {
  it('returns non-negative shifts modulo the alphabet size', () => {
    expect(reduceShift(0, 26)).toBe(0);
    expect(reduceShift(5, 26)).toBe(5);
    expect(reduceShift(26, 26)).toBe(0);
    expect(reduceShift(31, 26)).toBe(5);
    expect(reduceShift(1000, 10)).toBe(0);
  });

  it('wraps negative shifts into [0, modulus)', () => {
    expect(reduceShift(-3, 26)).toBe(23);
    expect(reduceShift(-3, 10)).toBe(7);
    expect(reduceShift(-26, 26)).toBe(0);
    expect(reduceShift(-27, 26)).toBe(25);
    expect(reduceShift(-80, 32)).toBe(16);
  });

  it('handles the extremes of the 32-bit range', () => {
    expect(reduceShift(-2147483648, 26)).toBe(2);
    expect(reduceShift(2147483647, 26)).toBe(23);
  });

  it('stays in range and congruent for a sweep of inputs', () => {
    for (const modulus of [10, 26, 32]) {
      for (let s = -100; s <= 100; s++) {
        const r = reduceShift(s, modulus);
        expect(r).toBeGreaterThanOrEqual(0);
        expect(r).toBeLessThan(modulus);
        expect((((s - r) % modulus) + modulus) % modulus).toBe(0);
      }
    }
  });
});

describe('reduceShifts', () => {
  it('leaves disabled classes null', () => {
    expect(reduceShifts({ shift: 5, includeDigits: false, includePunctuation: false })).toEqual({
      letters: 5,
      digits: null,
      punctuation: null,
    });
  });

  it('reduces each enabled class by its own length', () => {
    expect(reduceShifts({ shift: -3, includeDigits: true, includePunctuation: true })).toEqual({
      letters: 23,
      digits: 7,
      punctuation: 29,
    });
  });
});

describe('rotateLeft', () => {
  it('moves the element at k to the front', () => {
    const rotated = rotateLeft(UPPERCASE, 5);
    expect(rotated[0]).toBe('F');
    expect(rotated[20]).toBe('Z');
    expect(rotated[21]).toBe('A');
    expect(rotated.join('')).toBe('FGHIJKLMNOPQRSTUVWXYZABCDE');
  });

  it('returns an equal copy for a zero shift', () => {
    const rotated = rotateLeft(DIGITS, 0);
    expect(rotated).toEqual([...DIGITS]);
    expect(rotated).not.toBe(DIGITS);
  });

  it('satisfies rotated[i] === alphabet[(i + k) % length]', () => {
    const rotated = rotateLeft(DIGITS, 7);
    for (let i = 0; i < DIGITS.length; i++) {
      expect(rotated[i]).toBe(DIGITS[(i + 7) % DIGITS.length]);
    }
  });
});
