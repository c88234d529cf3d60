/**
 * TypeScript type definitions for rowcast
 */

// ============================================================================
// Column & Row Types
// ============================================================================

/**
 * Coarse cell typing carried with every column.
 *
 * Only the workbook renderer distinguishes `integer` from `fractional`;
 * text, CSV and HTML output treat every value as an opaque string.
 */
export type ColumnTypeTag = 'integer' | 'fractional' | 'other';

export interface ColumnDescriptor {
  name: string;
  typeTag: ColumnTypeTag;
}

/** One cell string per column, positionally aligned with the column list */
export type Row = string[];

/** Literal standing in for SQL NULL in every rendered row */
export const NULL_MARKER = '<NULL>';

/** Maximum number of rows buffered per page */
export const PAGE_ROW_LIMIT = 50_000;

export function isNumericTag(tag: ColumnTypeTag): boolean {
  return tag === 'integer' || tag === 'fractional';
}

// ============================================================================
// Style Directive Types
// ============================================================================

/**
 * Parsed form of a `{flags}text` string.
 *
 * headingLevel drives the font size (20 - 2 * level points). mergeSpan is
 * the number of extra columns a styled cell spans to its right.
 */
export interface StyleDirective {
  bold: boolean;
  italic: boolean;
  underline: boolean;
  center: boolean;
  headingLevel: number;
  mergeSpan?: number;
  text: string;
}

// ============================================================================
// Configuration Types
// ============================================================================

export type OutputFormat = 'text' | 'csv' | 'html' | 'xls';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'csv', 'html', 'xls'];

export interface TabSpec {
  name: string;
  title?: string;
}

/**
 * Immutable export configuration, built once by the CLI and handed to the
 * renderers and the workbook session.
 */
export interface ExportConfig {
  readonly outputFormat: OutputFormat;
  readonly headingsEnabled: boolean;
  readonly title?: string;
  readonly cssFilePath?: string;
  readonly appendMode: boolean;
  readonly incrementTabMode: boolean;
  readonly configuredTabs: readonly TabSpec[];
  readonly pinnedSheetName?: string;
  readonly outputFile?: string;
  readonly showResultsOnly: boolean;
  readonly quiet: boolean;
}

export const DEFAULT_EXPORT_CONFIG: ExportConfig = Object.freeze({
  outputFormat: 'text',
  headingsEnabled: true,
  appendMode: false,
  incrementTabMode: false,
  configuredTabs: [],
  showResultsOnly: false,
  quiet: false,
});

/** Build a frozen ExportConfig from partial overrides */
export function createExportConfig(overrides: Partial<ExportConfig> = {}): ExportConfig {
  return Object.freeze({
    ...DEFAULT_EXPORT_CONFIG,
    ...overrides,
    configuredTabs: Object.freeze([...(overrides.configuredTabs ?? [])]),
  });
}

// ============================================================================
// Statement Execution Types
// ============================================================================

interface ResultBase {
  /** Driver warnings collected while producing this result */
  warnings?: string[];
}

export interface RowsResult extends ResultBase {
  kind: 'rows';
  columns: ColumnDescriptor[];
  rows: Iterable<Row> | AsyncIterable<Row>;
}

export interface UpdateResult extends ResultBase {
  kind: 'update';
  count: number;
}

export type StatementResult = RowsResult | UpdateResult;

/**
 * Database boundary. Implementations stringify every value and map driver
 * types onto ColumnTypeTag before handing results to the renderers.
 */
export interface StatementExecutor {
  execute(sql: string): Promise<StatementResult[]>;
  close(): Promise<void>;
}

/** Character sink for text, CSV and HTML output */
export interface OutputSink {
  write(chunk: string): void;
}

// ============================================================================
// Error Types
// ============================================================================

export class ValidationError extends Error {
  constructor(
    message: string,
    public field?: string
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class ResultMatrixOverflowError extends Error {
  constructor(public limit: number) {
    super(`Result page is full (${limit} rows); flush before appending more`);
    this.name = 'ResultMatrixOverflowError';
  }
}

/**
 * Output file could not be opened or written. Fatal: the CLI exits with a
 * dedicated status when this escapes the statement loop.
 */
export class OutputError extends Error {
  constructor(
    message: string,
    public path?: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'OutputError';
  }
}

export class StatementError extends Error {
  constructor(
    message: string,
    public sql: string,
    public code?: string
  ) {
    super(message);
    this.name = 'StatementError';
  }
}

export class ConnectionError extends Error {
  constructor(message: string, public url?: string) {
    super(message);
    this.name = 'ConnectionError';
  }
}

/** Extract a printable message from anything thrown */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
