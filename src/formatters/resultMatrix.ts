/**
 * Result Matrix
 *
 * Buffers one page of a result set and computes per-column display widths
 * for that page. Widths are never carried across pages: each page of text
 * output is framed independently.
 */

import {
  ColumnDescriptor,
  PAGE_ROW_LIMIT,
  ResultMatrixOverflowError,
  Row,
  ValidationError,
} from '../types/index.js';

export class ResultMatrix {
  readonly columns: readonly ColumnDescriptor[];
  private readonly limit: number;
  private buffered: Row[] = [];
  private columnWidths: number[];

  constructor(columns: readonly ColumnDescriptor[], limit: number = PAGE_ROW_LIMIT) {
    this.columns = columns;
    this.limit = limit;
    this.columnWidths = this.headerWidths();
  }

  /**
   * Buffer a row for the current page
   * @throws ResultMatrixOverflowError when the page already holds `limit` rows
   * @throws ValidationError when the row's cell count differs from the column count
   */
  append(row: Row): void {
    if (this.buffered.length >= this.limit) {
      throw new ResultMatrixOverflowError(this.limit);
    }
    if (row.length !== this.columns.length) {
      throw new ValidationError(
        `Row has ${row.length} cells but the result has ${this.columns.length} columns`,
        'row'
      );
    }

    this.buffered.push(row);
    row.forEach((value, i) => {
      if (value.length > this.columnWidths[i]) {
        this.columnWidths[i] = value.length;
      }
    });
  }

  get rows(): readonly Row[] {
    return this.buffered;
  }

  get size(): number {
    return this.buffered.length;
  }

  get isFull(): boolean {
    return this.buffered.length >= this.limit;
  }

  get isEmpty(): boolean {
    return this.buffered.length === 0;
  }

  /** Per-column width: header length or longest buffered value, whichever is larger */
  widths(): number[] {
    return [...this.columnWidths];
  }

  /** Drop the buffered page; widths restart from the header lengths */
  clear(): void {
    this.buffered = [];
    this.columnWidths = this.headerWidths();
  }

  private headerWidths(): number[] {
    return this.columns.map(column => column.name.length);
  }
}
