#!/usr/bin/env node

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';

import { parseCliArgs, promptFor, USAGE, type CliCommand, type RunCommand } from './cli/options.js';
import { LineReader, runStatementLoop } from './cli/repl.js';
import { PgStatementExecutor } from './api/pgExecutor.js';
import { createRenderer } from './formatters/index.js';
import { ExportSession } from './session/exportSession.js';
import { openFileSink, stdoutSink, type ClosableSink } from './session/sinks.js';
import { errorMessage } from './types/index.js';

// Get package.json path
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJsonPath = join(__dirname, '..', 'package.json');

/** Process exit statuses */
export const EXIT_OK = 0;
export const EXIT_USAGE = 1;
export const EXIT_CONNECT = 2;
export const EXIT_RUNTIME = 3;
export const EXIT_CLOSE = 4;

function readVersion(): string {
  const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
  if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
    return String(packageJson.version);
  }
  return 'unknown';
}

async function main(argv: string[]): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (error) {
    console.error(`rowcast: ${errorMessage(error)}`);
    console.error(USAGE);
    return EXIT_USAGE;
  }

  if (command.kind === 'help') {
    console.log(USAGE);
    return EXIT_OK;
  }
  if (command.kind === 'version') {
    console.log(readVersion());
    return EXIT_OK;
  }

  const { config } = command;
  if (!config.quiet) {
    command.warnings.forEach(warning => console.error(`Warning: ${warning}`));
    config.configuredTabs.forEach(tab => console.error(`Tab: ${tab.name} (${tab.title ?? ''})`));
  }

  const reader = new LineReader(process.stdin, process.stderr);
  try {
    return await runCommand(command, reader);
  } finally {
    reader.close();
  }
}

async function runCommand(command: RunCommand, reader: LineReader): Promise<number> {
  const { config } = command;

  let password = command.password;
  if (command.promptPassword) {
    password = await reader.readLine('Enter password: ');
  }

  const executor = new PgStatementExecutor({
    connectionString: command.url,
    user: command.user,
    password,
  });
  try {
    await executor.connect();
  } catch (error) {
    console.error(errorMessage(error));
    return EXIT_CONNECT;
  }

  let sink: ClosableSink;
  try {
    sink = config.outputFile !== undefined && config.outputFormat !== 'xls'
      ? openFileSink(config.outputFile)
      : stdoutSink();
  } catch (error) {
    console.error(errorMessage(error));
    await executor.close();
    return EXIT_RUNTIME;
  }

  const session = new ExportSession(executor, createRenderer(config, { sink }), config);

  let status = EXIT_OK;
  try {
    await runStatementLoop(session, reader, {
      prompt: promptFor(command.url),
      quiet: config.quiet,
    });
  } catch (error) {
    console.error(errorMessage(error));
    status = EXIT_RUNTIME;
  }

  try {
    await sink.close();
  } catch (error) {
    if (status === EXIT_OK) {
      console.error(errorMessage(error));
    }
    status = EXIT_RUNTIME;
  }

  try {
    await executor.close();
  } catch (error) {
    console.error(`Error closing connection: ${errorMessage(error)}`);
    return status === EXIT_OK ? EXIT_CLOSE : status;
  }
  return status;
}

main(process.argv.slice(2)).then(
  code => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('Fatal error:', error);
    process.exitCode = EXIT_RUNTIME;
  }
);
