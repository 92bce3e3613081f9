/**
 * Shift Cipher CLI
 *
 * @module cli
 */

export * from './lib/config.js';
export * from './lib/logger.js';
export * from './lib/file-io.js';
export * from './lib/diagnostics.js';
export * from './commands/cipher.js';
export * from './program.js';
