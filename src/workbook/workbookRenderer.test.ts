/**
 * Tests for workbook output: sheet selection, framing rows and cell typing
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import ExcelJS from 'exceljs';
import type { Workbook } from 'exceljs';
import { WorkbookRenderer } from './workbookRenderer.js';
import { WorkbookSession, type WorkbookStore } from './workbookSession.js';
import { DECIMAL_FORMAT, INTEGER_FORMAT } from './cellWriter.js';
import { ExportSession } from '../session/exportSession.js';
import {
  OutputError,
  createExportConfig,
  type ExportConfig,
  type RowsResult,
  type StatementResult,
} from '../types/index.js';

type XlsxBuffer = Awaited<ReturnType<Workbook['xlsx']['writeBuffer']>>;

class MemoryStore implements WorkbookStore {
  readonly files = new Map<string, XlsxBuffer>();

  async load(path: string): Promise<Workbook> {
    const data = this.files.get(path);
    if (data === undefined) {
      throw new Error(`ENOENT: ${path}`);
    }
    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.load(data);
    return workbook;
  }

  async save(workbook: Workbook, path: string): Promise<void> {
    this.files.set(path, await workbook.xlsx.writeBuffer());
  }
}

function rows(name: string, values: string[][], typeTag: 'integer' | 'other' = 'other'): RowsResult {
  return { kind: 'rows', columns: [{ name, typeTag }], rows: values };
}

function setup(overrides: Partial<ExportConfig>, store: WorkbookStore = new MemoryStore(), pageSize?: number) {
  const config = createExportConfig({ outputFormat: 'xls', outputFile: 'report.xlsx', quiet: true, ...overrides });
  const session = new WorkbookSession(config, store);
  const queue: StatementResult[][] = [];
  const exporter = new ExportSession(
    { execute: async () => queue.shift() ?? [], close: async () => {} },
    new WorkbookRenderer(session),
    config,
    { pageSize }
  );
  const run = (...results: StatementResult[]) => {
    queue.push(results);
    return exporter.run('select');
  };
  return { session, run };
}

function sheetNames(workbook: Workbook): string[] {
  return workbook.worksheets.map(worksheet => worksheet.name);
}

describe('WorkbookRenderer', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('sheet selection', () => {
    it('should fill configured tabs in order, then auto-name', async () => {
      const { session, run } = setup({ configuredTabs: [{ name: 'Q1' }, { name: 'Q2' }] });

      await run(rows('id', [['1']], 'integer'), rows('id', [['2']], 'integer'), rows('id', [['3']], 'integer'));

      const workbook = session.getWorkbook();
      expect(sheetNames(workbook)).toEqual(['Q1', 'Q2', 'Sheet3']);

      const q1 = workbook.getWorksheet('Q1');
      expect(q1?.getCell(1, 1).value).toBeNull();
      expect(q1?.getCell(2, 1).value).toBe('id');
      expect(q1?.getCell(3, 1).value).toBe(1);
      expect(workbook.getWorksheet('Sheet3')?.getCell(3, 1).value).toBe(3);
    });

    it('should treat tab names that differ only in case as one sheet', async () => {
      const { session, run } = setup({ configuredTabs: [{ name: 'Q1' }, { name: 'q1' }] });

      await run(rows('v', [['x']]), rows('v', [['y']]));

      const workbook = session.getWorkbook();
      expect(sheetNames(workbook)).toEqual(['Q1']);
      const sheet = workbook.getWorksheet('Q1');
      expect([2, 3, 4].map(row => sheet?.getCell(row, 1).value)).toEqual(['v', 'x', 'y']);
    });

    it('should keep every result set on a pinned sheet', async () => {
      const { session, run } = setup({
        configuredTabs: [{ name: 'A' }, { name: 'B' }],
        pinnedSheetName: 'B',
      });

      await run(rows('v', [['x']]), rows('v', [['y']]));

      const workbook = session.getWorkbook();
      expect(sheetNames(workbook)).toEqual(['A', 'B']);
      const sheet = workbook.getWorksheet('B');
      expect(sheet?.getCell(2, 1).value).toBe('v');
      expect(sheet?.getCell(3, 1).value).toBe('x');
      expect(sheet?.getCell(4, 1).value).toBe('y');
    });

    it('should move to the next tab per statement in increment mode', async () => {
      const { session, run } = setup({
        configuredTabs: [{ name: 'A', title: '{B}First' }, { name: 'B' }],
        incrementTabMode: true,
      });

      await run(rows('v', [['one']]));
      await run(rows('v', [['two']]));

      const workbook = session.getWorkbook();
      expect(sheetNames(workbook)).toEqual(['A', 'B']);
      // A is recreated ahead of B with only its title
      expect(workbook.getWorksheet('A')?.getCell(1, 1).value).toBe('First');
      expect(workbook.getWorksheet('A')?.getCell(2, 1).value).toBeNull();
      expect(workbook.getWorksheet('B')?.getCell(2, 1).value).toBe('v');
      expect(workbook.getWorksheet('B')?.getCell(3, 1).value).toBe('two');
    });

    it('should continue later pages on the same sheet', async () => {
      const { session, run } = setup({}, new MemoryStore(), 2);

      await run(rows('v', [['a'], ['b'], ['c']]));

      const workbook = session.getWorkbook();
      expect(sheetNames(workbook)).toEqual(['Sheet1']);
      const sheet = workbook.getWorksheet('Sheet1');
      expect([2, 3, 4, 5].map(row => sheet?.getCell(row, 1).value)).toEqual(['v', 'a', 'b', 'c']);
    });
  });

  describe('framing rows', () => {
    it('should write a styled, merged title above the header', async () => {
      const { session, run } = setup({ title: '{BUC3>6}Report' });

      await run({
        kind: 'rows',
        columns: [
          { name: 'id', typeTag: 'integer' },
          { name: 'name', typeTag: 'other' },
        ],
        rows: [['1234', 'Widget']],
      });

      const sheet = session.getWorkbook().getWorksheet('Sheet1');
      const title = sheet?.getCell('A1');
      expect(title?.value).toBe('Report');
      expect(title?.font).toEqual({ size: 14, bold: true, italic: false, underline: 'single' });
      expect(title?.alignment).toEqual({ horizontal: 'center' });
      expect(title?.isMerged).toBe(true);
      expect(sheet?.getCell('G1').isMerged).toBe(true);
      expect(sheet?.getCell('H1').isMerged).toBe(false);

      expect(sheet?.getCell('A2').value).toBe('id');
      expect(sheet?.getCell('B2').value).toBe('name');
      expect(sheet?.getCell('A3').value).toBe(1234);
      expect(sheet?.getCell('B3').value).toBe('Widget');
    });

    it('should start data on the second row without headings', async () => {
      const { session, run } = setup({ headingsEnabled: false });

      await run(rows('v', [['first']]));

      const sheet = session.getWorkbook().getWorksheet('Sheet1');
      expect(sheet?.getCell('A1').value).toBeNull();
      expect(sheet?.getCell('A2').value).toBe('first');
    });
  });

  describe('cell typing', () => {
    it('should write numbers, blanks, styled and plain text', async () => {
      const { session, run } = setup({ headingsEnabled: false });

      await run({
        kind: 'rows',
        columns: [
          { name: 'n', typeTag: 'integer' },
          { name: 'f', typeTag: 'fractional' },
          { name: 't', typeTag: 'other' },
        ],
        rows: [
          ['<NULL>', '12.5', '{I}note'],
          ['abc', '', 'x'],
          ['42', '<NULL>', '<NULL>'],
        ],
      });

      const sheet = session.getWorkbook().getWorksheet('Sheet1');

      expect(sheet?.getCell('A2').value).toBeNull();
      expect(sheet?.getCell('B2').value).toBe(12.5);
      expect(sheet?.getCell('B2').numFmt).toBe(DECIMAL_FORMAT);
      expect(sheet?.getCell('B2').alignment).toEqual({ horizontal: 'right' });
      expect(sheet?.getCell('C2').value).toBe('note');
      expect(sheet?.getCell('C2').font).toEqual({ size: 10, bold: false, italic: true, underline: false });

      expect(sheet?.getCell('A3').value).toBe('abc');
      expect(sheet?.getCell('B3').value).toBe('');
      expect(sheet?.getCell('C3').value).toBe('x');

      expect(sheet?.getCell('A4').value).toBe(42);
      expect(sheet?.getCell('A4').numFmt).toBe(INTEGER_FORMAT);
      expect(sheet?.getCell('B4').value).toBeNull();
    });

    it('should warn and carry on when a merge overlaps another', async () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      const { session, run } = setup({ headingsEnabled: false });

      await run({
        kind: 'rows',
        columns: [
          { name: 'x', typeTag: 'other' },
          { name: 'y', typeTag: 'other' },
        ],
        rows: [['{>2}a', '{>1}b']],
      });

      const sheet = session.getWorkbook().getWorksheet('Sheet1');
      expect(sheet?.getCell('A2').value).toBe('a');
      expect(sheet?.getCell('C2').isMerged).toBe(true);
      expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('could not merge 2 cells at row 2'));
    });
  });

  it('should print update counts to standard output', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const { run } = setup({});

    await run({ kind: 'update', count: 5 });

    expect(logSpy).toHaveBeenCalledWith('Updated: 5');
  });

  it('should surface save failures as output errors', async () => {
    const failing: WorkbookStore = {
      load: async () => {
        throw new Error('not found');
      },
      save: async () => {
        throw new Error('EACCES: permission denied');
      },
    };
    const { run } = setup({}, failing);

    await expect(run(rows('v', [['x']]))).rejects.toThrow(OutputError);
  });
});
