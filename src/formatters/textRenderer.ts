/**
 * Fixed-width text renderer
 *
 *   ---------------------
 *   | id | name        |
 *   ---------------------
 *   | 1  | Widget      |
 *   ---------------------
 */

import type { ColumnDescriptor, OutputFormat, Row } from '../types/index.js';
import { StreamRenderer } from './renderer.js';

/** Dashed divider: one leading dash plus width + 3 per column */
export function dividerLine(widths: readonly number[]): string {
  const length = widths.reduce((sum, width) => sum + width + 3, 1);
  return '-'.repeat(length);
}

/** Pipe-delimited row, each value left-aligned and space-padded to its column width */
export function fixedWidthRow(values: readonly string[], widths: readonly number[]): string {
  const cells = values.map((value, i) => ' ' + value.padEnd(widths[i]) + ' |');
  return '|' + cells.join('');
}

export class TextRenderer extends StreamRenderer {
  readonly format: OutputFormat = 'text';

  private pageWidths: readonly number[] = [];

  beginResultSet(columns: readonly ColumnDescriptor[], widths: readonly number[]): void {
    this.pageWidths = widths;
    if (!this.headingsEnabled) {
      return;
    }
    const divider = dividerLine(widths);
    this.line(divider);
    this.line(
      fixedWidthRow(
        columns.map(column => column.name),
        widths
      )
    );
    this.line(divider);
  }

  emitRow(values: Row): void {
    this.line(fixedWidthRow(values, this.pageWidths));
  }

  endResultSet(widths: readonly number[]): void {
    this.line(dividerLine(widths));
  }
}
