import { describe, it, expect } from 'vitest';
import { CipherError, ConfigurationError, ResourceError, isCipherError } from './errors.js';

describe('errors', () => {
  it('tags configuration errors', () => {
    const error = new ConfigurationError('Invalid shift amount: "abc"', ['not an integer']);
    expect(error).toBeInstanceOf(CipherError);
    expect(error.code).toBe('CONFIGURATION');
    expect(error.name).toBe('ConfigurationError');
    expect(error.issues).toEqual(['not an integer']);
  });

  it('describes each resource failure', () => {
    expect(new ResourceError('input-not-found', 'in.txt').message).toBe(
      'Input file not found: in.txt'
    );
    expect(new ResourceError('output-unwritable', 'out.ciph').message).toBe(
      'Output file cannot be written: out.ciph'
    );
  });

  it('keeps the underlying cause', () => {
    const cause = new Error('EACCES');
    const error = new ResourceError('input-unreadable', 'in.txt', { cause });
    expect(error.cause).toBe(cause);
    expect(error.code).toBe('RESOURCE');
    expect(error.reason).toBe('input-unreadable');
  });

  it('recognises cipher errors only', () => {
    expect(isCipherError(new ResourceError('input-not-found', 'x'))).toBe(true);
    expect(isCipherError(new Error('boom'))).toBe(false);
    expect(isCipherError('boom')).toBe(false);
  });
});
