/**
 * Alphabet Tables
 *
 * The four fixed character classes the cipher rotates. Each table is in
 * canonical order; rotation positions are indices into these arrays.
 *
 * @module alphabets
 */

import type { Alphabet, CharacterClass } from './types.js';

export const UPPERCASE: Alphabet = Object.freeze([...'ABCDEFGHIJKLMNOPQRSTUVWXYZ']);

export const LOWERCASE: Alphabet = Object.freeze([...'abcdefghijklmnopqrstuvwxyz']);

export const DIGITS: Alphabet = Object.freeze([...'0123456789']);

/**
 * Printable ASCII punctuation in code-point order (32 symbols)
 */
export const PUNCTUATION: Alphabet = Object.freeze([...'!"#$%&\'()*+,-./:;<=>?@[\\]^_`{|}~']);

/**
 * Letter alphabets share one modulus
 */
export const LETTER_MODULUS = UPPERCASE.length;

/**
 * Character classes in the order they are added to a mapping.
 * Letters cannot be disabled.
 */
export const CHARACTER_CLASSES: readonly CharacterClass[] = [
  { name: 'uppercase', alphabet: UPPERCASE, enabled: () => true },
  { name: 'lowercase', alphabet: LOWERCASE, enabled: () => true },
  { name: 'digits', alphabet: DIGITS, enabled: (options) => options.includeDigits },
  {
    name: 'punctuation',
    alphabet: PUNCTUATION,
    enabled: (options) => options.includePunctuation,
  },
];
