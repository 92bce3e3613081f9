/**
 * Cipher Commands
 *
 * Registers `encipher` and `decipher`. Both run the same handler; the mode
 * only selects the direction of the dictionary.
 *
 * Usage:
 *   shift-cipher encipher -i <IFILE> [-o <OFILE>] [-s <SHIFT>] [-npal]
 *   shift-cipher decipher -i <IFILE> [-o <OFILE>] [-s <SHIFT>] [-npal]
 *
 * Options:
 *   -i, --ifile <IFILE>         Input file (required)
 *   -o, --ofile <OFILE>         Output file (default: IFILE + .ciph / .dec)
 *   -s, --shift-amount <SHIFT>  Positions to rotate each alphabet (default: 5)
 *   -n, --shift-nums            Include digits
 *   -p, --shift-puncts          Include punctuation
 *   -a, --shift-all             Include digits and punctuation
 *   -l, --show-log              Print the run report
 */

import type { Command } from 'commander';
import { CIPHER_MODES, createCipher, type CipherMode } from '@shift-cipher/cipher';
import {
  resolveCipherOptions,
  resolveOutputPath,
  type CipherFlags,
  type CLIConfig,
} from '../lib/config.js';
import {
  buildRunReport,
  formatCharacterSummary,
  formatRunReport,
  type RunReport,
} from '../lib/diagnostics.js';
import { processFile } from '../lib/file-io.js';
import type { CLILogger } from '../lib/logger.js';

/**
 * Options from CLI
 */
export interface CipherCommandOptions extends CipherFlags {
  readonly ifile: string;
  readonly ofile?: string;
  readonly showLog?: boolean;
}

/**
 * What a command needs from the program it runs in
 */
export interface CommandContext {
  readonly config: CLIConfig;
  readonly logger: CLILogger;
  /** Program name shown in the run report */
  readonly program: string;
}

const DESCRIPTIONS: Record<CipherMode, string> = {
  encipher: 'Encipher a text file by rotating each alphabet forward',
  decipher: 'Decipher a text file produced by encipher with the same options',
};

/**
 * Run one cipher command end to end and return its report
 *
 * @throws ConfigurationError for an invalid shift or output path
 * @throws ResourceError when the input or output file is unavailable
 */
export async function runCipherCommand(
  mode: CipherMode,
  options: CipherCommandOptions,
  context: CommandContext
): Promise<RunReport> {
  const { config, logger } = context;
  logger.commandStart(mode, { ifile: options.ifile, ofile: options.ofile });

  const cipherOptions = resolveCipherOptions(config, mode, options);
  const outputPath = resolveOutputPath(config, mode, options.ifile, options.ofile);
  const { shifts, mapping } = createCipher(cipherOptions);

  logger.debug('Cipher dictionary built', { entries: mapping.size, shifts });

  const stats = await processFile({
    inputPath: options.ifile,
    outputPath,
    mapping,
    encoding: config.io.encoding,
  });

  const report = buildRunReport({
    program: `${context.program} ${mode}`,
    options: cipherOptions,
    shifts,
    mapping,
    inputPath: options.ifile,
    outputPath,
    defaultOutputName: !options.ofile,
    stats,
  });

  if (options.showLog) {
    if (logger.isJson) {
      logger.info('Run report', { ...report });
    } else {
      console.log(formatRunReport(report));
    }
  } else if (logger.isJson) {
    logger.info('Transform complete', { outputPath, ...stats });
  } else {
    console.log(formatCharacterSummary(stats));
  }

  logger.commandEnd(true, { charsProcessed: stats.charsProcessed });
  return report;
}

/**
 * Register one cipher subcommand
 */
function registerCipherCommand(
  parent: Command,
  mode: CipherMode,
  getContext: () => CommandContext
): void {
  parent
    .command(mode)
    .description(DESCRIPTIONS[mode])
    .requiredOption('-i, --ifile <IFILE>', 'Input text file to read')
    .option(
      '-o, --ofile <OFILE>',
      'Output file to write, overwritten if it exists (default: IFILE with a mode suffix)'
    )
    .option('-s, --shift-amount <SHIFT>', 'Number of positions to shift each alphabet')
    .option('-n, --shift-nums', 'Include digits in the shifted alphabets')
    .option('-p, --shift-puncts', 'Include punctuation in the shifted alphabets')
    .option('-a, --shift-all', 'Include both digits and punctuation')
    .option('-l, --show-log', 'Print the run report after processing')
    .action(async (options: CipherCommandOptions) => {
      await runCipherCommand(mode, options, getContext());
    });
}

/**
 * Register the encipher and decipher subcommands
 *
 * @param program - Commander program instance
 * @param getContext - Supplies the context initialized by the program's preAction hook
 */
export function registerCipherCommands(
  program: Command,
  getContext: () => CommandContext
): void {
  for (const mode of CIPHER_MODES) {
    registerCipherCommand(program, mode, getContext);
  }
}
