/**
 * Shift Cipher Error Types
 *
 * Every failure the cipher reports is a CipherError subclass carrying a
 * `code`, so callers can map it to an exit status without string matching.
 * Anything that is not a CipherError is treated as unexpected.
 */

export type CipherErrorCode = 'CONFIGURATION' | 'RESOURCE';

export class CipherError extends Error {
  constructor(
    message: string,
    public readonly code: CipherErrorCode,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'CipherError';

    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Invalid shift value, malformed config file, or unusable option.
 * Raised before any file is opened.
 */
export class ConfigurationError extends CipherError {
  constructor(
    message: string,
    public readonly issues: readonly string[] = []
  ) {
    super(message, 'CONFIGURATION');
    this.name = 'ConfigurationError';
  }
}

export type ResourceErrorReason = 'input-not-found' | 'input-unreadable' | 'output-unwritable';

/**
 * Input or output file unavailable. Raised before the transform starts.
 */
export class ResourceError extends CipherError {
  constructor(
    public readonly reason: ResourceErrorReason,
    public readonly path: string,
    options?: ErrorOptions
  ) {
    super(describeResourceFailure(reason, path), 'RESOURCE', options);
    this.name = 'ResourceError';
  }
}

function describeResourceFailure(reason: ResourceErrorReason, path: string): string {
  switch (reason) {
    case 'input-not-found':
      return `Input file not found: ${path}`;
    case 'input-unreadable':
      return `Input file cannot be read: ${path}`;
    case 'output-unwritable':
      return `Output file cannot be written: ${path}`;
  }
}

export function isCipherError(error: unknown): error is CipherError {
  return error instanceof CipherError;
}
