/**
 * Shift Cipher CLI Configuration Management
 *
 * Loads configuration from .shift-cipherrc (YAML or JSON) with environment
 * variable overrides and defaults. Provides the typed configuration the
 * commands resolve into cipher options.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (SHIFT_CIPHER_*)
 * 3. Config file (.shift-cipherrc or --config path)
 * 4. Default values
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigurationError, type CipherMode, type CipherOptions } from '@shift-cipher/cipher';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Encodings the file collaborator reads and writes with.
 * `latin1` maps each byte to exactly one character.
 */
export type FileEncoding = 'latin1' | 'utf8';

export const FILE_ENCODINGS = ['latin1', 'utf8'] as const satisfies readonly FileEncoding[];

/**
 * Default cipher settings
 */
export interface CipherDefaults {
  readonly shift: number;
  readonly digits: boolean;
  readonly punctuation: boolean;
}

/**
 * File handling settings
 */
export interface IoConfig {
  readonly encoding: FileEncoding;
  /** Appended to the input path when no output path is given */
  readonly encipherSuffix: string;
  readonly decipherSuffix: string;
}

/**
 * Full CLI configuration
 */
export interface CLIConfig {
  /** Configuration file version */
  readonly version: number;

  readonly cipher: CipherDefaults;

  readonly io: IoConfig;

  // Runtime overrides (from CLI flags)
  /** Enable verbose output */
  readonly verbose: boolean;
  /** Output as JSON */
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

/**
 * Per-command flags that override the configured cipher defaults
 */
export interface CipherFlags {
  readonly shiftAmount?: string;
  readonly shiftNums?: boolean;
  readonly shiftPuncts?: boolean;
  readonly shiftAll?: boolean;
}

// ============================================================================
// Shift Parsing
// ============================================================================

export const MIN_SHIFT = -2147483648;
export const MAX_SHIFT = 2147483647;

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Parse a user-entered shift amount as a signed 32-bit integer
 *
 * @throws ConfigurationError for non-integer text or an out-of-range value
 */
export function parseShiftAmount(raw: string): number {
  const text = raw.trim();
  if (!INTEGER_PATTERN.test(text)) {
    throw new ConfigurationError(`Invalid shift amount: "${raw}" is not an integer`);
  }

  const value = Number(text);
  if (value < MIN_SHIFT || value > MAX_SHIFT) {
    throw new ConfigurationError(
      `Invalid shift amount: ${text} is outside ${MIN_SHIFT}..${MAX_SHIFT}`
    );
  }

  // Number('-0') is -0
  return value === 0 ? 0 : value;
}

// ============================================================================
// Config File Schema
// ============================================================================

const ShiftSchema = z.number().int().min(MIN_SHIFT).max(MAX_SHIFT);

const ConfigFileSchema = z
  .object({
    version: z.literal(1).optional(),
    cipher: z
      .object({
        shift: ShiftSchema.optional(),
        digits: z.boolean().optional(),
        punctuation: z.boolean().optional(),
      })
      .strict()
      .optional(),
    io: z
      .object({
        encoding: z.enum(FILE_ENCODINGS).optional(),
        encipherSuffix: z.string().min(1).optional(),
        decipherSuffix: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Omit<CLIConfig, 'verbose' | 'json' | 'configPath'> = {
  version: 1,

  cipher: {
    shift: 5,
    digits: false,
    punctuation: false,
  },

  io: {
    encoding: 'latin1',
    encipherSuffix: '.ciph',
    decipherSuffix: '.dec',
  },
};

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Standard config file names to search for
 */
export const CONFIG_FILE_NAMES = [
  '.shift-cipherrc',
  '.shift-cipherrc.yaml',
  '.shift-cipherrc.yml',
  '.shift-cipherrc.json',
];

const ENV_PREFIX = 'SHIFT_CIPHER_';

/**
 * Find config file in the start directory or its parents
 */
function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = resolve(dir, '..');
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Parse and validate config file content
 */
function parseConfigFile(filePath: string): ConfigFile {
  let raw: unknown;
  try {
    const content = readFileSync(filePath, 'utf-8');
    // YAML is a superset of JSON, so one parser covers every file name
    raw = parseYaml(content) ?? {};
  } catch (error) {
    throw new ConfigurationError(
      `Config file could not be read: ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const result = ConfigFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new ConfigurationError(`Invalid config file: ${filePath}`, issues);
  }
  return result.data;
}

/**
 * Typed view over SHIFT_CIPHER_* variables
 */
class EnvReader {
  constructor(private readonly env: NodeJS.ProcessEnv) {}

  string(name: string): string | undefined {
    const value = this.env[`${ENV_PREFIX}${name}`];
    return value === undefined || value === '' ? undefined : value;
  }

  bool(name: string): boolean | undefined {
    const value = this.string(name);
    if (value === undefined) return undefined;
    return value.toLowerCase() === 'true' || value === '1';
  }

  shift(name: string): number | undefined {
    const value = this.string(name);
    return value === undefined ? undefined : parseShiftAmount(value);
  }

  encoding(name: string): FileEncoding | undefined {
    const value = this.string(name);
    if (value === undefined) return undefined;
    const result = z.enum(FILE_ENCODINGS).safeParse(value);
    if (!result.success) {
      throw new ConfigurationError(
        `Invalid ${ENV_PREFIX}${name}: "${value}". Must be one of: ${FILE_ENCODINGS.join(', ')}`
      );
    }
    return result.data;
  }
}

/**
 * Load configuration options
 */
export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Directory to start the config file search from (default: cwd) */
  cwd?: string;
  /** Environment to read SHIFT_CIPHER_* from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Global CLI flag overrides */
  overrides?: {
    verbose?: boolean;
    json?: boolean;
  };
}

/**
 * Load and merge configuration from all sources
 *
 * @throws ConfigurationError when the config file is missing, unreadable or invalid
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<CLIConfig> {
  const env = new EnvReader(options.env ?? process.env);
  const cwd = options.cwd ?? process.cwd();

  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  const explicitPath = options.configPath ?? env.string('CONFIG');
  if (explicitPath) {
    configPath = resolve(cwd, explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigurationError(`Config file not found: ${configPath}`);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    configPath = findConfigFile(cwd);
    if (configPath) {
      fileConfig = parseConfigFile(configPath);
    }
  }

  return {
    version: fileConfig.version ?? DEFAULT_CONFIG.version,

    cipher: {
      shift: env.shift('SHIFT') ?? fileConfig.cipher?.shift ?? DEFAULT_CONFIG.cipher.shift,
      digits:
        env.bool('SHIFT_DIGITS') ?? fileConfig.cipher?.digits ?? DEFAULT_CONFIG.cipher.digits,
      punctuation:
        env.bool('SHIFT_PUNCTUATION') ??
        fileConfig.cipher?.punctuation ??
        DEFAULT_CONFIG.cipher.punctuation,
    },

    io: {
      encoding:
        env.encoding('ENCODING') ?? fileConfig.io?.encoding ?? DEFAULT_CONFIG.io.encoding,
      encipherSuffix: fileConfig.io?.encipherSuffix ?? DEFAULT_CONFIG.io.encipherSuffix,
      decipherSuffix: fileConfig.io?.decipherSuffix ?? DEFAULT_CONFIG.io.decipherSuffix,
    },

    // Runtime flags
    verbose: options.overrides?.verbose ?? env.bool('VERBOSE') ?? false,
    json: options.overrides?.json ?? env.bool('JSON') ?? false,
    configPath,
  };
}

// ============================================================================
// Resolution Helpers
// ============================================================================

/**
 * Merge command flags over the configured defaults into the struct the
 * cipher core consumes
 *
 * @throws ConfigurationError for an invalid --shift-amount
 */
export function resolveCipherOptions(
  config: CLIConfig,
  mode: CipherMode,
  flags: CipherFlags
): CipherOptions {
  return {
    mode,
    shift:
      flags.shiftAmount !== undefined
        ? parseShiftAmount(flags.shiftAmount)
        : config.cipher.shift,
    includeDigits: Boolean(flags.shiftAll || flags.shiftNums) || config.cipher.digits,
    includePunctuation:
      Boolean(flags.shiftAll || flags.shiftPuncts) || config.cipher.punctuation,
  };
}

/**
 * Output path: the explicit one, else the input path plus the mode's suffix
 */
export function resolveOutputPath(
  config: CLIConfig,
  mode: CipherMode,
  inputPath: string,
  outputPath?: string
): string {
  if (outputPath) return outputPath;
  const suffix = mode === 'encipher' ? config.io.encipherSuffix : config.io.decipherSuffix;
  return `${inputPath}${suffix}`;
}
