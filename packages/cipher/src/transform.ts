/**
 * Text Transform Engine
 *
 * Applies a cipher mapping line by line. Characters without a key in the
 * mapping (spaces, disabled classes, anything outside the alphabets) are
 * emitted unchanged, so the transform never fails on input content.
 *
 * Line terminators are not part of a line: they are neither substituted nor
 * counted.
 *
 * @module transform
 */

import { buildCipherMapping } from './dictionary.js';
import { reduceShifts } from './shift.js';
import type {
  CipherMapping,
  CipherOptions,
  ReducedShifts,
  TransformResult,
  TransformStats,
} from './types.js';

/**
 * Receives each transformed line. May be async (e.g. a file write).
 */
export type LineSink = (line: string) => void | Promise<void>;

interface SubstitutedLine {
  readonly text: string;
  /** Code points read, so a surrogate pair counts once */
  readonly chars: number;
}

function substitute(line: string, mapping: CipherMapping): SubstitutedLine {
  let text = '';
  let chars = 0;
  for (const ch of line) {
    text += mapping.get(ch) ?? ch;
    chars++;
  }
  return { text, chars };
}

/**
 * Substitute every character of a single line
 */
export function substituteLine(line: string, mapping: CipherMapping): string {
  return substitute(line, mapping).text;
}

/**
 * Transform an in-memory sequence of lines
 */
export function transformLines(
  lines: Iterable<string>,
  mapping: CipherMapping
): TransformResult {
  const output: string[] = [];
  let charsProcessed = 0;

  for (const line of lines) {
    const { text, chars } = substitute(line, mapping);
    output.push(text);
    charsProcessed += chars;
  }

  return { lines: output, linesProcessed: output.length, charsProcessed };
}

/**
 * Streaming form: pull one line at a time from `lines` and push its
 * substitution into `sink` before reading the next.
 */
export async function transformStream(
  lines: AsyncIterable<string> | Iterable<string>,
  mapping: CipherMapping,
  sink: LineSink
): Promise<TransformStats> {
  let linesProcessed = 0;
  let charsProcessed = 0;

  for await (const line of lines) {
    const { text, chars } = substitute(line, mapping);
    await sink(text);
    linesProcessed++;
    charsProcessed += chars;
  }

  return { linesProcessed, charsProcessed };
}

/**
 * A mapping bound to the options it was built from
 */
export interface Cipher {
  readonly options: CipherOptions;
  readonly shifts: ReducedShifts;
  readonly mapping: CipherMapping;
  /** Transform a multi-line string, keeping its `\n` line breaks */
  encode(text: string): string;
}

/**
 * Build the mapping once and return a reusable cipher
 *
 * @example
 * ```typescript
 * const cipher = createCipher({
 *   shift: 5,
 *   includeDigits: false,
 *   includePunctuation: false,
 *   mode: 'encipher',
 * });
 * cipher.encode('Hello, World!'); // 'Mjqqt, Btwqi!'
 * ```
 */
export function createCipher(options: CipherOptions): Cipher {
  const mapping = buildCipherMapping(options);
  return {
    options,
    shifts: reduceShifts(options),
    mapping,
    encode(text: string): string {
      return transformLines(text.split('\n'), mapping).lines.join('\n');
    },
  };
}
