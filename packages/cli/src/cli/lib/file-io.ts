/**
 * File I/O for the cipher commands
 *
 * Opens the input and output files, streams the input through the cipher
 * one line at a time, and closes both handles on every exit path.
 * Availability failures are reported as ResourceError before any line is
 * transformed.
 *
 * @module cli/lib/file-io
 */

import { open, stat, type FileHandle } from 'node:fs/promises';
import { resolve } from 'node:path';
import {
  ConfigurationError,
  ResourceError,
  transformStream,
  type CipherMapping,
  type TransformStats,
} from '@shift-cipher/cipher';
import type { FileEncoding } from './config.js';

export interface ProcessFileRequest {
  readonly inputPath: string;
  readonly outputPath: string;
  readonly mapping: CipherMapping;
  readonly encoding: FileEncoding;
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Split decoded chunks into lines on `\n` only. A `\r` stays part of the
 * line. A final line without a terminator is still yielded.
 */
export async function* splitLines(chunks: AsyncIterable<string>): AsyncGenerator<string> {
  let tail = '';
  for await (const chunk of chunks) {
    const parts = (tail + chunk).split('\n');
    tail = parts.pop() ?? '';
    yield* parts;
  }
  if (tail.length > 0) {
    yield tail;
  }
}

/**
 * Open the input for reading, classifying failures
 */
async function openInput(path: string): Promise<FileHandle> {
  try {
    const info = await stat(path);
    if (info.isDirectory()) {
      throw new ResourceError('input-unreadable', path);
    }
    return await open(path, 'r');
  } catch (error) {
    if (error instanceof ResourceError) throw error;
    const reason = errorCode(error) === 'ENOENT' ? 'input-not-found' : 'input-unreadable';
    throw new ResourceError(reason, path, { cause: error });
  }
}

/**
 * Create or truncate the output. Nothing is written if this fails.
 */
async function openOutput(path: string): Promise<FileHandle> {
  try {
    return await open(path, 'w');
  } catch (error) {
    throw new ResourceError('output-unwritable', path, { cause: error });
  }
}

/**
 * Encipher or decipher `inputPath` into `outputPath`.
 *
 * Lines end at `\n` only; each output line is written with a trailing
 * `\n`, including the last. A `\r` is ordinary content.
 *
 * @throws ConfigurationError if input and output are the same file
 * @throws ResourceError if either file is unavailable
 */
export async function processFile(request: ProcessFileRequest): Promise<TransformStats> {
  const { inputPath, outputPath, mapping, encoding } = request;

  if (resolve(inputPath) === resolve(outputPath)) {
    throw new ConfigurationError(`Output path must differ from input path: ${inputPath}`);
  }

  const input = await openInput(inputPath);
  let output: FileHandle | null = null;

  try {
    output = await openOutput(outputPath);
    const sink = output;

    const stream = input.createReadStream({ encoding, autoClose: false });

    try {
      return await transformStream(splitLines(stream), mapping, async (line) => {
        await sink.write(`${line}\n`, null, encoding);
      });
    } finally {
      stream.destroy();
    }
  } finally {
    try {
      await output?.close();
    } finally {
      await input.close();
    }
  }
}
