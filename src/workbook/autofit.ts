import type { CellValue, Worksheet } from 'exceljs';

export interface ColumnFitOptions {
  min?: number;
  max?: number;
  pad?: number;
}

/** Displayed text of a cell value, for width estimation */
export function cellText(value: CellValue): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return value.toISOString().slice(0, 10);
  if (typeof value === 'object') {
    if ('richText' in value && Array.isArray(value.richText)) {
      return value.richText.map(run => run.text).join('');
    }
    if ('text' in value && value.text !== undefined) return String(value.text);
    if ('result' in value && value.result !== undefined) return String(value.result);
    return '';
  }
  return String(value);
}

/**
 * Size the given columns (1-based) to their longest value, clamped.
 * Merged cells are skipped so a wide title does not widen its first column.
 */
export function autoFitColumns(
  worksheet: Worksheet,
  columns: number[],
  { min = 8, max = 60, pad = 2 }: ColumnFitOptions = {}
): void {
  for (const index of columns) {
    const column = worksheet.getColumn(index);
    let width = min;

    column.eachCell({ includeEmpty: false }, cell => {
      if (cell.isMerged) return;
      const longestLine = cellText(cell.value)
        .split('\n')
        .reduce((longest, line) => Math.max(longest, line.length), 0);
      width = Math.max(width, longestLine + pad);
    });

    column.width = Math.min(width, max);
  }
}
