/**
 * Workbook cell writing
 *
 * Rows are addressed by 0-based index (row 0 holds the title) and written
 * to the worksheet at index + 1. Every write moves the tab's row cursor.
 */

import type { Worksheet } from 'exceljs';
import {
  ColumnDescriptor,
  NULL_MARKER,
  Row,
  errorMessage,
  isNumericTag,
} from '../types/index.js';
import { parseStyleDirective } from '../parsers/styleDirective.js';
import type { StyleCache } from '../cache/styleCache.js';
import type { Tab } from './workbookSession.js';

/** Whole-number cells */
export const INTEGER_FORMAT = '###########0';

/** Fractional cells, thousands separated, two decimals */
export const DECIMAL_FORMAT = '###,###,###,##0.00';

interface PendingMerge {
  column: number;
  span: number;
}

export class CellWriter {
  private readonly styles: StyleCache;

  constructor(styles: StyleCache) {
    this.styles = styles;
  }

  /** Title goes in row 0, column 0 */
  writeTitle(tab: Tab, title: string): void {
    this.writeRow(tab, 0, row => this.writeStyled(tab.worksheet, row, 0, title));
  }

  /** Header names as plain text; names starting with `{` are styled */
  writeHeader(tab: Tab, columns: readonly ColumnDescriptor[]): void {
    this.writeRow(tab, tab.rowCursor + 1, row =>
      columns.flatMap((column, i) => {
        if (column.name.startsWith('{')) {
          return this.writeStyled(tab.worksheet, row, i, column.name);
        }
        tab.worksheet.getCell(row + 1, i + 1).value = column.name;
        return [];
      })
    );
  }

  /**
   * Append one data row after the last row in use.
   *
   * NULL leaves the cell blank. Numeric columns get number cells with the
   * integer or decimal format. Text starting with `{` is styled.
   */
  writeData(tab: Tab, values: Row, columns: readonly ColumnDescriptor[]): void {
    this.writeRow(tab, tab.rowCursor + 1, row =>
      values.flatMap((value, i) => {
        if (value === NULL_MARKER) {
          return [];
        }
        const column = columns[i];
        if (column !== undefined && isNumericTag(column.typeTag) && this.writeNumber(tab.worksheet, row, i, value, column)) {
          return [];
        }
        if (value.startsWith('{')) {
          return this.writeStyled(tab.worksheet, row, i, value);
        }
        tab.worksheet.getCell(row + 1, i + 1).value = value;
        return [];
      })
    );
  }

  private writeRow(tab: Tab, rowIndex: number, fill: (rowIndex: number) => PendingMerge[]): void {
    tab.worksheet.getRow(rowIndex + 1);
    const merges = fill(rowIndex);
    // Merge after the row is filled: writes into a merged cell land on its master.
    for (const merge of merges) {
      this.merge(tab.worksheet, rowIndex, merge);
    }
    tab.rowCursor = Math.max(tab.rowCursor, rowIndex);
  }

  private writeNumber(
    worksheet: Worksheet,
    rowIndex: number,
    column: number,
    value: string,
    descriptor: ColumnDescriptor
  ): boolean {
    const numeric = value.trim() === '' ? NaN : Number(value);
    if (!Number.isFinite(numeric)) {
      return false;
    }
    const cell = worksheet.getCell(rowIndex + 1, column + 1);
    cell.value = numeric;
    cell.numFmt = descriptor.typeTag === 'integer' ? INTEGER_FORMAT : DECIMAL_FORMAT;
    cell.alignment = { horizontal: 'right' };
    return true;
  }

  private writeStyled(worksheet: Worksheet, rowIndex: number, column: number, value: string): PendingMerge[] {
    const directive = parseStyleDirective(value);
    const cell = worksheet.getCell(rowIndex + 1, column + 1);
    cell.value = directive.text;
    cell.font = this.styles.getOrCreate(directive);
    if (directive.center) {
      cell.alignment = { horizontal: 'center' };
    }
    return directive.mergeSpan ? [{ column, span: directive.mergeSpan }] : [];
  }

  private merge(worksheet: Worksheet, rowIndex: number, { column, span }: PendingMerge): void {
    const row = rowIndex + 1;
    try {
      worksheet.mergeCells(row, column + 1, row, column + 1 + span);
    } catch (error) {
      console.error(`Warning: could not merge ${span + 1} cells at row ${row}: ${errorMessage(error)}`);
    }
  }
}
