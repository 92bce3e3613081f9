import { afterEach, describe, expect, it, vi } from 'vitest';
import { createCLILogger, formatDuration } from './logger.js';

describe('CLILogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes structured JSON entries', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const logger = createCLILogger({ json: true });
    logger.setCommand('encipher');
    logger.info('Transform complete', { charsProcessed: 13 });

    expect(info).toHaveBeenCalledTimes(1);
    const entry: unknown = JSON.parse(String(info.mock.calls[0][0]));
    expect(entry).toMatchObject({
      level: 'info',
      message: 'Transform complete',
      service: 'shift-cipher',
      command: 'encipher',
      charsProcessed: 13,
    });
  });

  it('writes plain human-readable lines without colour', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = createCLILogger({ color: false });
    logger.warn('Careful', { shift: -3, classes: ['digits'] });

    const line = String(warn.mock.calls[0][0]);
    expect(line).toMatch(/^\d{4}-\d{2}-\d{2}T\S+Z WARN  Careful \(shift=-3 classes=\["digits"\]\)$/);
  });

  it('drops entries below the configured level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const logger = createCLILogger({ level: 'warn', color: false });
    logger.debug('hidden');
    logger.info('hidden');

    expect(debug).not.toHaveBeenCalled();
    expect(info).not.toHaveBeenCalled();
  });

  it('logs command failure with a duration', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createCLILogger({ json: true });
    logger.commandStart('decipher');
    logger.commandEnd(false, { exitCode: 3 });

    const entry: unknown = JSON.parse(String(error.mock.calls[0][0]));
    expect(entry).toMatchObject({ level: 'error', message: 'Command failed', exitCode: 3 });
    expect(entry).toHaveProperty('duration_ms');
  });
});

describe('formatDuration', () => {
  it('scales the unit', () => {
    expect(formatDuration(500)).toBe('500ms');
    expect(formatDuration(1500)).toBe('1.50s');
    expect(formatDuration(61000)).toBe('1m 1.0s');
  });
});
