/**
 * Statement loop
 *
 * Reads one statement per input line and hands it to the export session.
 * Statement failures are reported and the loop continues; an OutputError
 * means the output can no longer be written and ends the loop.
 */

import { createInterface, type Interface } from 'readline/promises';
import type { Readable, Writable } from 'stream';
import { OutputError, errorMessage } from '../types/index.js';
import type { ExportSession } from '../session/exportSession.js';

/**
 * Line source shared by the password prompt and the statement loop, so
 * lines read ahead from piped input are never dropped between the two.
 */
export class LineReader {
  private readonly rl: Interface;
  private readonly output: Writable;
  private readonly lines: AsyncIterableIterator<string>;

  constructor(input: Readable, output: Writable) {
    this.rl = createInterface({ input, terminal: false });
    this.output = output;
    this.lines = this.rl[Symbol.asyncIterator]();
  }

  /**
   * Show the prompt (if any) and wait for the next line
   * @returns the line, or undefined at end of input
   */
  async readLine(prompt = ''): Promise<string | undefined> {
    if (prompt.length > 0) {
      this.output.write(prompt);
    }
    const next = await this.lines.next();
    return next.done ? undefined : next.value;
  }

  close(): void {
    this.rl.close();
  }
}

export interface StatementLoopOptions {
  prompt: string;
  quiet: boolean;
}

export function isExitCommand(line: string): boolean {
  const word = line.trim().toLowerCase();
  return word === 'quit' || word === 'exit';
}

/**
 * Run statements until end of input or quit/exit
 * @returns number of statements that failed
 */
export async function runStatementLoop(
  session: ExportSession,
  reader: LineReader,
  options: StatementLoopOptions
): Promise<number> {
  const prompt = options.quiet ? '' : options.prompt;
  let failures = 0;

  for (;;) {
    const line = await reader.readLine(prompt);
    if (line === undefined || isExitCommand(line)) {
      break;
    }
    const statement = line.trim();
    if (statement.length === 0) {
      continue;
    }
    try {
      await session.run(statement);
    } catch (error) {
      if (error instanceof OutputError) {
        throw error;
      }
      failures++;
      console.error(`Error: ${errorMessage(error)}`);
    }
  }
  return failures;
}
