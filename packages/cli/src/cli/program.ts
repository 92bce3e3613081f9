/**
 * Shift Cipher CLI Program
 *
 * Builds the commander program, loads configuration in a preAction hook,
 * and maps failures to exit codes.
 *
 * @module cli/program
 */

import { Command, CommanderError } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { ConfigurationError, ResourceError } from '@shift-cipher/cipher';

import { loadConfig } from './lib/config.js';
import { createCLILogger } from './lib/logger.js';
import { registerCipherCommands, type CommandContext } from './commands/cipher.js';

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES = {
  SUCCESS: 0,
  ERRORS: 1,
  CONFIG_ERROR: 2,
  RESOURCE_ERROR: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export const CLI_NAME = 'shift-cipher';

// ============================================================================
// Global State
// ============================================================================

/**
 * Environment the program runs against; defaults to the current process
 */
export interface ProgramOptions {
  readonly env?: NodeJS.ProcessEnv;
  readonly cwd?: string;
}

type GlobalOptions = {
  verbose?: boolean;
  json?: boolean;
  config?: string;
};

export interface CLI {
  readonly program: Command;
  /** Context created by the preAction hook, null before a command runs */
  context(): CommandContext | null;
}

// ============================================================================
// CLI Setup
// ============================================================================

function getVersion(): string {
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '..', '..', 'package.json');
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
  } catch {
    return '0.0.0';
  }
  return '0.0.0';
}

export function createCLI(options: ProgramOptions = {}): CLI {
  let globalContext: CommandContext | null = null;

  const getContext = (): CommandContext => {
    if (!globalContext) {
      throw new Error('Command context not initialized: the preAction hook has not run');
    }
    return globalContext;
  };

  const program = new Command();

  program
    .name(CLI_NAME)
    .description('Circular-shift substitution cipher for text files')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .shift-cipherrc)')
    .exitOverride()
    .hook('preAction', async (thisCommand) => {
      const globals = thisCommand.opts<GlobalOptions>();
      const config = await loadConfig({
        configPath: globals.config,
        cwd: options.cwd,
        env: options.env,
        overrides: { verbose: globals.verbose, json: globals.json },
      });

      const logger = createCLILogger({
        level: config.verbose ? 'debug' : 'info',
        json: config.json,
      });
      logger.debug('Configuration loaded', { configPath: config.configPath });

      globalContext = { config, logger, program: CLI_NAME };
    });

  registerCipherCommands(program, getContext);

  return {
    program,
    context: () => globalContext,
  };
}

/**
 * Exit code for an error thrown out of a command
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof ConfigurationError) return EXIT_CODES.CONFIG_ERROR;
  if (error instanceof ResourceError) return EXIT_CODES.RESOURCE_ERROR;
  return EXIT_CODES.ERRORS;
}

function describeError(error: unknown): string {
  if (error instanceof ConfigurationError && error.issues.length > 0) {
    return `${error.message}\n  - ${error.issues.join('\n  - ')}`;
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Parse `argv` and run the selected command
 *
 * @returns the process exit code
 */
export async function runCLI(argv: readonly string[], options: ProgramOptions = {}): Promise<number> {
  const cli = createCLI(options);

  // Bare invocation prints usage and succeeds
  if (argv.length <= 2) {
    cli.program.outputHelp();
    return EXIT_CODES.SUCCESS;
  }

  try {
    await cli.program.parseAsync([...argv]);
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    // Help, version and usage errors; commander has already printed them
    if (error instanceof CommanderError) {
      return error.exitCode;
    }

    const exitCode = exitCodeFor(error);
    const context = cli.context();
    if (context) {
      if (exitCode === EXIT_CODES.ERRORS) {
        context.logger.error('Unexpected error encountered', {
          error: describeError(error),
        });
      } else {
        context.logger.error(describeError(error));
      }
      context.logger.commandEnd(false, { exitCode });
    } else if (exitCode === EXIT_CODES.CONFIG_ERROR) {
      console.error(`Configuration error: ${describeError(error)}`);
    } else {
      console.error(`Error: ${describeError(error)}`);
    }
    return exitCode;
  }
}
