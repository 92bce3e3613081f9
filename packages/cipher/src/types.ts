/**
 * Shift Cipher Types
 *
 * @module types
 */

/**
 * Ordered, fixed-length sequence of distinct single characters
 */
export type Alphabet = readonly string[];

/**
 * Direction of the substitution. Encipher maps plain to shifted,
 * decipher maps shifted back to plain.
 */
export type CipherMode = 'encipher' | 'decipher';

export const CIPHER_MODES: readonly CipherMode[] = ['encipher', 'decipher'];

export type CharacterClassName = 'uppercase' | 'lowercase' | 'digits' | 'punctuation';

/**
 * Resolved configuration consumed by the dictionary builder
 */
export interface CipherOptions {
  /** Signed rotation amount as entered by the user */
  readonly shift: number;
  readonly includeDigits: boolean;
  readonly includePunctuation: boolean;
  readonly mode: CipherMode;
}

export interface CharacterClass {
  readonly name: CharacterClassName;
  readonly alphabet: Alphabet;
  readonly enabled: (options: Pick<CipherOptions, 'includeDigits' | 'includePunctuation'>) => boolean;
}

/**
 * Per-alphabet shifts normalized into [0, length).
 * `null` marks a character class that is not enciphered.
 */
export interface ReducedShifts {
  readonly letters: number;
  readonly digits: number | null;
  readonly punctuation: number | null;
}

/**
 * Character substitution table, built once per run
 */
export type CipherMapping = ReadonlyMap<string, string>;

export interface MappingEntry {
  readonly from: string;
  readonly to: string;
}

export interface TransformStats {
  /** Lines read (and written) */
  readonly linesProcessed: number;
  /** Characters read, excluding line terminators */
  readonly charsProcessed: number;
}

export interface TransformResult extends TransformStats {
  readonly lines: string[];
}
