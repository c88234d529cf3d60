/**
 * Command-line options
 *
 * Turns argv (plus ROWCAST_* environment defaults) into a frozen
 * ExportConfig and the connection settings. Option letters follow the
 * classic tool: note `-h` switches headings off; help is `--help` only.
 */

import { parseArgs } from 'util';
import {
  ExportConfig,
  OUTPUT_FORMATS,
  OutputFormat,
  TabSpec,
  ValidationError,
  createExportConfig,
  errorMessage,
} from '../types/index.js';
import { decorateTitle } from '../parsers/styleDirective.js';
import { parseTabConfig } from '../parsers/tabConfig.js';
import { MAX_SHEET_NAME_LENGTH } from '../workbook/workbookSession.js';

export const USAGE = `
rowcast - render SQL query results as text, CSV, HTML or workbooks

Usage:
  rowcast [options] <postgres-url>

Options:
  -f, --format <fmt>     Output format: text (default), csv, html, or xls
                         (xls writes an .xlsx workbook to the -o file)
  -o, --output <file>    Write output to a file (required for xls)
  -t, --title <title>    Document title; may start with a {flags} style block
  -T, --tabs <spec>      Workbook tabs, e.g. "[Summary|{B2}Totals][Detail]"
  -S, --sheet <name>     Send every result set to this configured tab
  -s, --css <file>       Stylesheet inlined into HTML output
  -a, --append           Append to an existing workbook
  -i, --increment-tab    Keep advancing tabs across statements
  -h, --no-headings      Omit titles and column headings
  -r, --results-only     Do not print update counts
  -q, --quiet            No prompt, no informational messages
  -u, --user <name>      Database user
  -p, --password <pw>    Database password
  -P                     Prompt for the password
  --help                 Show this help message
  --version              Show version number

Environment Variables:
  ROWCAST_USER           Default database user
  ROWCAST_PASSWORD       Default database password

Statements are read one per line from standard input; "quit" or "exit" ends
the session.
`;

export interface RunCommand {
  kind: 'run';
  url: string;
  user?: string;
  password?: string;
  promptPassword: boolean;
  config: ExportConfig;
  /** Non-fatal problems found while reading options */
  warnings: string[];
}

export type CliCommand = { kind: 'help' } | { kind: 'version' } | RunCommand;

const INVALID_SHEET_NAME = /[*?:\\/[\]]/;

export function parseOutputFormat(value: string | undefined): OutputFormat | undefined {
  if (value === undefined) return undefined;
  const lowered = value.toLowerCase();
  return OUTPUT_FORMATS.find(format => format === lowered);
}

export function validateSheetName(name: string): void {
  if (name.length > MAX_SHEET_NAME_LENGTH) {
    throw new ValidationError(
      `Sheet name '${name}' is longer than ${MAX_SHEET_NAME_LENGTH} characters`,
      'tabs'
    );
  }
  if (INVALID_SHEET_NAME.test(name)) {
    throw new ValidationError(`Sheet name '${name}' contains one of * ? : \\ / [ ]`, 'tabs');
  }
}

/**
 * Parse command-line arguments
 * @throws ValidationError on unknown options, a missing URL or an unusable combination
 */
export function parseCliArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): CliCommand {
  let parsed: ReturnType<typeof parseRaw>;
  try {
    parsed = parseRaw(argv);
  } catch (error) {
    throw new ValidationError(errorMessage(error));
  }
  const { values, positionals } = parsed;

  if (values.help) return { kind: 'help' };
  if (values.version) return { kind: 'version' };

  const url = positionals[0];
  if (url === undefined) {
    throw new ValidationError('No database URL specified.', 'url');
  }

  const warnings: string[] = [];
  let outputFormat: OutputFormat = 'text';
  if (values.format !== undefined) {
    const format = parseOutputFormat(values.format);
    if (format === undefined) {
      warnings.push(`Unknown output format '${values.format}', using text`);
    } else {
      outputFormat = format;
    }
  }

  if (outputFormat === 'xls' && values.output === undefined) {
    throw new ValidationError('Workbook output (-f xls) needs an output file (-o)', 'output');
  }

  let configuredTabs: TabSpec[] = [];
  if (outputFormat === 'xls' && values.tabs !== undefined) {
    const tabConfig = parseTabConfig(values.tabs);
    if (tabConfig.valid) {
      tabConfig.tabs.forEach(tab => validateSheetName(tab.name));
      configuredTabs = tabConfig.tabs;
    } else {
      warnings.push(`Ignoring malformed tab configuration '${values.tabs}'`);
    }
  }

  const config = createExportConfig({
    outputFormat,
    headingsEnabled: !values['no-headings'],
    title: values.title !== undefined ? decorateTitle(values.title) : undefined,
    cssFilePath: values.css,
    appendMode: values.append ?? false,
    incrementTabMode: values['increment-tab'] ?? false,
    configuredTabs,
    pinnedSheetName: values.sheet,
    outputFile: values.output,
    showResultsOnly: values['results-only'] ?? false,
    quiet: values.quiet ?? false,
  });

  return {
    kind: 'run',
    url,
    user: values.user ?? env.ROWCAST_USER,
    password: values.password ?? env.ROWCAST_PASSWORD,
    promptPassword: values['prompt-password'] ?? false,
    config,
    warnings,
  };
}

function parseRaw(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      format: { type: 'string', short: 'f' },
      output: { type: 'string', short: 'o' },
      title: { type: 'string', short: 't' },
      tabs: { type: 'string', short: 'T' },
      sheet: { type: 'string', short: 'S' },
      css: { type: 'string', short: 's' },
      append: { type: 'boolean', short: 'a' },
      'increment-tab': { type: 'boolean', short: 'i' },
      'no-headings': { type: 'boolean', short: 'h' },
      'results-only': { type: 'boolean', short: 'r' },
      quiet: { type: 'boolean', short: 'q' },
      user: { type: 'string', short: 'u' },
      password: { type: 'string', short: 'p' },
      'prompt-password': { type: 'boolean', short: 'P' },
      help: { type: 'boolean' },
      version: { type: 'boolean' },
    },
  });
}

/** Prompt text: the URL without scheme or credentials */
export function promptFor(url: string): string {
  const bare = url.replace(/^[a-z][a-z0-9+.-]*:\/\//i, '').replace(/^[^@/]*@/, '');
  return (bare.length > 0 ? bare : 'rowcast') + '> ';
}
