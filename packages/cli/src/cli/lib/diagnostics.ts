/**
 * Run Diagnostics
 *
 * Read-only snapshot of a finished cipher run, printed with --show-log.
 *
 * @module cli/lib/diagnostics
 */

import {
  sampleMapping,
  type CipherMapping,
  type CipherMode,
  type CipherOptions,
  type MappingEntry,
  type ReducedShifts,
  type TransformStats,
} from '@shift-cipher/cipher';

export interface RunReport {
  readonly program: string;
  readonly mode: CipherMode;
  readonly inputPath: string;
  readonly outputPath: string;
  /** True when the output path was derived from the input path */
  readonly defaultOutputName: boolean;
  readonly shift: number;
  readonly reducedShifts: ReducedShifts;
  readonly includeDigits: boolean;
  readonly includePunctuation: boolean;
  readonly linesProcessed: number;
  readonly charsProcessed: number;
  readonly mappingSample: readonly MappingEntry[];
}

export interface RunReportInput {
  readonly program: string;
  readonly options: CipherOptions;
  readonly shifts: ReducedShifts;
  readonly mapping: CipherMapping;
  readonly inputPath: string;
  readonly outputPath: string;
  readonly defaultOutputName: boolean;
  readonly stats: TransformStats;
}

/** Number of mapping entries shown in the report */
export const MAPPING_SAMPLE_SIZE = 10;

export function buildRunReport(input: RunReportInput): RunReport {
  return {
    program: input.program,
    mode: input.options.mode,
    inputPath: input.inputPath,
    outputPath: input.outputPath,
    defaultOutputName: input.defaultOutputName,
    shift: input.options.shift,
    reducedShifts: input.shifts,
    includeDigits: input.options.includeDigits,
    includePunctuation: input.options.includePunctuation,
    linesProcessed: input.stats.linesProcessed,
    charsProcessed: input.stats.charsProcessed,
    mappingSample: sampleMapping(input.mapping, 'A', MAPPING_SAMPLE_SIZE),
  };
}

const RULE = '='.repeat(34);

/**
 * Render a report as the boxed text block shown on the terminal
 */
export function formatRunReport(report: RunReport): string {
  const sample = report.mappingSample.map((entry) => `(${entry.from},${entry.to})`).join(', ');
  const rows: Array<[string, string | number | boolean]> = [
    ['Program', report.program],
    ['Mode', report.mode],
    ['Input file', report.inputPath],
    ['Output file', report.outputPath],
    ['Default output name', report.defaultOutputName],
    ['Shift amount', report.shift],
    ['Letter shift', report.reducedShifts.letters],
    ['Shift digits', report.includeDigits],
    ['Digit shift', report.reducedShifts.digits ?? 0],
    ['Shift punctuation', report.includePunctuation],
    ['Punctuation shift', report.reducedShifts.punctuation ?? 0],
    ['Dictionary sample', `{${sample}${sample ? ', ' : ''}...}`],
    ['Lines processed', report.linesProcessed],
    ['Characters read', report.charsProcessed],
  ];

  const width = Math.max(...rows.map(([label]) => label.length)) + 2;
  return [
    RULE,
    'Cipher run options',
    RULE,
    ...rows.map(([label, value]) => `${`${label}:`.padEnd(width)}${String(value)}`),
    RULE,
  ].join('\n');
}

/**
 * One-line summary printed when the full report is not requested
 */
export function formatCharacterSummary(stats: TransformStats): string {
  return `Read ${stats.charsProcessed} characters from the input file.`;
}
