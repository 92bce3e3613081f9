/**
 * Cipher Dictionary Builder
 *
 * Builds the character substitution table for one run. Encipher and
 * decipher share the same rotation; they differ only in which side of the
 * (original, rotated) pair becomes the key.
 *
 * @module dictionary
 */

import { CHARACTER_CLASSES } from './alphabets.js';
import { reduceShifts, rotateLeft } from './shift.js';
import type {
  CharacterClassName,
  CipherMapping,
  CipherOptions,
  MappingEntry,
  ReducedShifts,
} from './types.js';

/**
 * Offset for a class, or null when the class is left out of the mapping
 */
function shiftFor(name: CharacterClassName, shifts: ReducedShifts): number | null {
  switch (name) {
    case 'uppercase':
    case 'lowercase':
      return shifts.letters;
    case 'digits':
      return shifts.digits;
    case 'punctuation':
      return shifts.punctuation;
  }
}

/**
 * Build the substitution mapping for the given options.
 *
 * - encipher: `original[i] -> rotated[i]`
 * - decipher: `rotated[i] -> original[i]`
 *
 * Disabled classes contribute no keys, so their characters pass through the
 * transform unchanged. The result is a pure function of `options`.
 */
export function buildCipherMapping(options: CipherOptions): CipherMapping {
  const shifts = reduceShifts(options);
  const mapping = new Map<string, string>();

  for (const characterClass of CHARACTER_CLASSES) {
    const shift = shiftFor(characterClass.name, shifts);
    if (shift === null || !characterClass.enabled(options)) continue;

    const original = characterClass.alphabet;
    const rotated = rotateLeft(original, shift);

    for (let i = 0; i < original.length; i++) {
      if (options.mode === 'encipher') {
        mapping.set(original[i], rotated[i]);
      } else {
        mapping.set(rotated[i], original[i]);
      }
    }
  }

  return mapping;
}

/**
 * Take up to `count` entries in key order, starting at `from`.
 * Keys are ordered by code point, so a sample from 'A' walks A, B, C, ...
 */
export function sampleMapping(
  mapping: CipherMapping,
  from = 'A',
  count = 10
): MappingEntry[] {
  return [...mapping.keys()]
    .filter((key) => key >= from)
    .sort()
    .slice(0, count)
    .map((key) => ({ from: key, to: mapping.get(key) ?? key }));
}

/**
 * Check that a mapping is a bijection over its keys
 */
export function isBijective(mapping: CipherMapping): boolean {
  return new Set(mapping.values()).size === mapping.size;
}
