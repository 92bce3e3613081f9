#!/usr/bin/env tsx
/**
 * Shift Cipher CLI Entry Point
 *
 * @module shift-cipher-cli
 */

import { runCLI, EXIT_CODES } from '../src/cli/program.js';

runCLI(process.argv)
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exitCode = EXIT_CODES.ERRORS;
  });
