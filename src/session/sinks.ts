/**
 * Output sinks for the character-stream renderers
 */

import { closeSync, createWriteStream, openSync } from 'fs';
import type { Writable } from 'stream';
import { finished } from 'stream/promises';
import { OutputError, OutputSink, errorMessage } from '../types/index.js';

export interface ClosableSink extends OutputSink {
  close(): Promise<void>;
}

export interface StreamSinkOptions {
  /** End the stream on close; false for standard output */
  owned?: boolean;
  /** File path, for error messages */
  path?: string;
}

/**
 * Wraps a writable stream. A stream error is recorded when it happens and
 * raised as an OutputError from the next write or from close.
 */
export class StreamSink implements ClosableSink {
  private readonly stream: Writable;
  private readonly owned: boolean;
  private readonly path?: string;
  private failure?: Error;

  constructor(stream: Writable, options: StreamSinkOptions = {}) {
    this.stream = stream;
    this.owned = options.owned ?? true;
    this.path = options.path;
    this.stream.on('error', (error: Error) => {
      this.failure ??= error;
    });
  }

  /**
   * @throws OutputError once the underlying stream has failed
   */
  write(chunk: string): void {
    this.throwIfFailed();
    this.stream.write(chunk);
  }

  async close(): Promise<void> {
    if (this.owned) {
      this.stream.end();
      try {
        await finished(this.stream);
      } catch (error) {
        this.failure ??= error instanceof Error ? error : new Error(String(error));
      }
    }
    this.throwIfFailed();
  }

  private throwIfFailed(): void {
    if (this.failure === undefined) {
      return;
    }
    const target = this.path !== undefined ? `output file '${this.path}'` : 'output';
    throw new OutputError(`Could not write ${target}: ${this.failure.message}`, this.path, this.failure);
  }
}

/**
 * Open (truncate) an output file synchronously so a bad path fails before
 * any statement runs.
 * @throws OutputError if the file cannot be opened for writing
 */
export function openFileSink(path: string): StreamSink {
  let fd: number;
  try {
    fd = openSync(path, 'w');
  } catch (error) {
    throw new OutputError(`Could not open output file '${path}': ${errorMessage(error)}`, path, error);
  }
  try {
    return new StreamSink(createWriteStream(path, { fd }), { path });
  } catch (error) {
    closeSync(fd);
    throw new OutputError(`Could not open output file '${path}': ${errorMessage(error)}`, path, error);
  }
}

export function stdoutSink(): StreamSink {
  return new StreamSink(process.stdout, { owned: false });
}

/**
 * Collects output in memory
 */
export class MemorySink implements ClosableSink {
  private chunks: string[] = [];

  write(chunk: string): void {
    this.chunks.push(chunk);
  }

  toString(): string {
    return this.chunks.join('');
  }

  lines(): string[] {
    const text = this.toString();
    return text.length === 0 ? [] : text.replace(/\n$/, '').split('\n');
  }

  async close(): Promise<void> {}
}
