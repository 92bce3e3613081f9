/**
 * @shift-cipher/cipher
 *
 * Circular-shift substitution cipher: alphabet tables, shift reduction,
 * dictionary construction and the line transform. No I/O.
 */

// Alphabets
export {
  UPPERCASE,
  LOWERCASE,
  DIGITS,
  PUNCTUATION,
  LETTER_MODULUS,
  CHARACTER_CLASSES,
} from './alphabets.js';

// Types
export { CIPHER_MODES } from './types.js';
export type {
  Alphabet,
  CipherMode,
  CharacterClass,
  CharacterClassName,
  CipherOptions,
  ReducedShifts,
  CipherMapping,
  MappingEntry,
  TransformStats,
  TransformResult,
} from './types.js';

// Runtime (pure functions)
export { reduceShift, reduceShifts, rotateLeft } from './shift.js';
export { buildCipherMapping, sampleMapping, isBijective } from './dictionary.js';
export {
  substituteLine,
  transformLines,
  transformStream,
  createCipher,
} from './transform.js';
export type { LineSink, Cipher } from './transform.js';

// Errors
export {
  CipherError,
  ConfigurationError,
  ResourceError,
  isCipherError,
} from './errors.js';
export type { CipherErrorCode, ResourceErrorReason } from './errors.js';
