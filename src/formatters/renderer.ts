/**
 * Renderer contract shared by every output format.
 *
 * The export session drives one renderer through a fixed call sequence per
 * executed statement:
 *
 *   beginDocument
 *     (beginResultSet emitRow* endResultSet)*   one triple per page
 *     emitUpdateCount*                          for statements without rows
 *   endDocument
 */

import type { ColumnDescriptor, OutputFormat, OutputSink, Row } from '../types/index.js';

export interface DocumentOptions {
  title?: string;
  headingsEnabled: boolean;
}

export interface Renderer {
  readonly format: OutputFormat;

  beginDocument(options: DocumentOptions): Promise<void>;

  /**
   * Open one page of a result set. `page` is 0 for the first page and
   * increases for every further block of rows the same result set spills into.
   */
  beginResultSet(columns: readonly ColumnDescriptor[], widths: readonly number[], page: number): void;

  emitRow(values: Row, columns: readonly ColumnDescriptor[]): void;

  endResultSet(widths: readonly number[]): void;

  emitUpdateCount(count: number): void;

  endDocument(): Promise<void>;
}

/**
 * Base for renderers that write characters to a sink (text, CSV, HTML).
 */
export abstract class StreamRenderer implements Renderer {
  abstract readonly format: OutputFormat;

  protected headingsEnabled = true;
  protected title?: string;

  constructor(protected readonly sink: OutputSink) {}

  async beginDocument(options: DocumentOptions): Promise<void> {
    this.headingsEnabled = options.headingsEnabled;
    this.title = options.title;
  }

  abstract beginResultSet(columns: readonly ColumnDescriptor[], widths: readonly number[], page: number): void;

  abstract emitRow(values: Row, columns: readonly ColumnDescriptor[]): void;

  abstract endResultSet(widths: readonly number[]): void;

  emitUpdateCount(count: number): void {
    this.line('');
    this.line(`Updated: ${count}`);
    this.line('');
  }

  async endDocument(): Promise<void> {}

  protected line(text: string): void {
    this.sink.write(text + '\n');
  }
}
