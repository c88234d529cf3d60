/**
 * CSV renderer
 *
 * Values are joined with commas exactly as received: no quoting, no
 * escaping. A value that contains a comma shifts the columns after it.
 */

import type { ColumnDescriptor, OutputFormat, Row } from '../types/index.js';
import { directiveText } from '../parsers/styleDirective.js';
import type { DocumentOptions } from './renderer.js';
import { StreamRenderer } from './renderer.js';

export function csvLine(values: readonly string[]): string {
  return values.join(',');
}

export class CsvRenderer extends StreamRenderer {
  readonly format: OutputFormat = 'csv';

  private titlePending = false;

  async beginDocument(options: DocumentOptions): Promise<void> {
    await super.beginDocument(options);
    this.titlePending = options.title !== undefined;
  }

  beginResultSet(columns: readonly ColumnDescriptor[]): void {
    if (!this.headingsEnabled) {
      return;
    }
    if (this.titlePending && this.title !== undefined) {
      this.line(directiveText(this.title));
      this.titlePending = false;
    }
    this.line(csvLine(columns.map(column => column.name)));
  }

  emitRow(values: Row): void {
    this.line(csvLine(values));
  }

  endResultSet(): void {}
}
