import { describe, expect, it } from 'vitest';
import { buildCipherMapping, reduceShifts, type CipherOptions } from '@shift-cipher/cipher';
import {
  buildRunReport,
  formatCharacterSummary,
  formatRunReport,
  type RunReport,
} from './diagnostics.js';

const options: CipherOptions = {
  shift: -3,
  includeDigits: true,
  includePunctuation: false,
  mode: 'encipher',
};

describe('buildRunReport', () => {
  it('snapshots options, shifts, counts and a dictionary sample', () => {
    const report = buildRunReport({
      program: 'shift-cipher encipher',
      options,
      shifts: reduceShifts(options),
      mapping: buildCipherMapping(options),
      inputPath: 'notes.txt',
      outputPath: 'notes.txt.ciph',
      defaultOutputName: true,
      stats: { linesProcessed: 1, charsProcessed: 7 },
    });

    expect(report.reducedShifts).toEqual({ letters: 23, digits: 7, punctuation: null });
    expect(report.charsProcessed).toBe(7);
    expect(report.mappingSample).toHaveLength(10);
    expect(report.mappingSample[0]).toEqual({ from: 'A', to: 'X' });
    expect(report.mappingSample[3]).toEqual({ from: 'D', to: 'A' });
  });
});

describe('formatRunReport', () => {
  const report: RunReport = {
    program: 'shift-cipher encipher',
    mode: 'encipher',
    inputPath: 'notes.txt',
    outputPath: 'notes.txt.ciph',
    defaultOutputName: true,
    shift: -3,
    reducedShifts: { letters: 23, digits: 7, punctuation: null },
    includeDigits: true,
    includePunctuation: false,
    linesProcessed: 1,
    charsProcessed: 7,
    mappingSample: [
      { from: 'A', to: 'X' },
      { from: 'B', to: 'Y' },
    ],
  };

  it('renders an aligned block', () => {
    const rule = '='.repeat(34);
    expect(formatRunReport(report).split('\n')).toEqual([
      rule,
      'Cipher run options',
      rule,
      'Program:             shift-cipher encipher',
      'Mode:                encipher',
      'Input file:          notes.txt',
      'Output file:         notes.txt.ciph',
      'Default output name: true',
      'Shift amount:        -3',
      'Letter shift:        23',
      'Shift digits:        true',
      'Digit shift:         7',
      'Shift punctuation:   false',
      'Punctuation shift:   0',
      'Dictionary sample:   {(A,X), (B,Y), ...}',
      'Lines processed:     1',
      'Characters read:     7',
      rule,
    ]);
  });

  it('shows an elided sample for an empty dictionary', () => {
    const lines = formatRunReport({ ...report, mappingSample: [] }).split('\n');
    expect(lines[14]).toBe('Dictionary sample:   {...}');
  });
});

describe('formatCharacterSummary', () => {
  it('reports the characters read', () => {
    expect(formatCharacterSummary({ linesProcessed: 2, charsProcessed: 13 })).toBe(
      'Read 13 characters from the input file.'
    );
  });
});
