/**
 * Workbook Session
 *
 * Owns the in-memory workbook for one program run: its tabs, the style
 * cache, the result-set sequence number and the append-mode lifecycle.
 *
 * Append mode, per executed statement:
 * - not requested: start a fresh workbook every statement
 * - requested, nothing loaded yet: load the target file. On success the
 *   file's own title and header rows stand, so headings and title are
 *   switched off for the rest of the run. On failure a fresh workbook is
 *   used and this statement behaves as non-append; the next statement
 *   appends to the in-memory workbook.
 * - requested, workbook already in memory: keep adding to it
 *
 * The whole workbook is written back to the target path after every
 * statement.
 */

import ExcelJS from 'exceljs';
import type { Workbook, Worksheet } from 'exceljs';
import { StyleCache } from '../cache/styleCache.js';
import { ExportConfig, OutputError, ValidationError, errorMessage } from '../types/index.js';

export interface Tab {
  name: string;
  title?: string;
  /** 0-based index of the last row in use; 0 for an empty sheet */
  rowCursor: number;
  worksheet: Worksheet;
}

/**
 * Persistence boundary for workbooks
 */
export interface WorkbookStore {
  load(path: string): Promise<Workbook>;
  save(workbook: Workbook, path: string): Promise<void>;
}

export const xlsxFileStore: WorkbookStore = {
  async load(path: string): Promise<Workbook> {
    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(path);
    return workbook;
  },
  async save(workbook: Workbook, path: string): Promise<void> {
    await workbook.xlsx.writeFile(path);
  },
};

/** Excel limits sheet names to 31 characters */
export const MAX_SHEET_NAME_LENGTH = 31;

export class WorkbookSession {
  readonly styleCache = new StyleCache();

  private readonly config: ExportConfig;
  private readonly store: WorkbookStore;
  private readonly targetPath: string;

  private workbook?: Workbook;
  private tabs: Tab[] = [];
  private appendRequested: boolean;
  private appendInEffect = false;
  private headings: boolean;
  private documentTitle?: string;
  private sequence = 0;

  constructor(config: ExportConfig, store: WorkbookStore = xlsxFileStore) {
    if (!config.outputFile) {
      throw new ValidationError('Workbook output requires an output file', 'outputFile');
    }
    this.config = config;
    this.store = store;
    this.targetPath = config.outputFile;
    this.appendRequested = config.appendMode;
    this.headings = config.headingsEnabled;
    this.documentTitle = config.title;
  }

  // ==========================================================================
  // Statement lifecycle
  // ==========================================================================

  /**
   * Prepare the workbook for the next executed statement
   */
  async beginStatement(): Promise<void> {
    this.appendInEffect = this.appendRequested;

    if (!this.appendInEffect) {
      this.reset(new ExcelJS.Workbook());
    } else if (this.workbook === undefined) {
      try {
        const loaded = await this.store.load(this.targetPath);
        this.reset(loaded);
        this.headings = false;
        this.documentTitle = undefined;
        this.info(`Appending to '${this.targetPath}' (${this.tabs.length} sheets)`);
      } catch (error) {
        this.info(`No workbook at '${this.targetPath}' to append to (${errorMessage(error)}); creating it`);
        this.appendRequested = true;
        this.appendInEffect = false;
        this.reset(new ExcelJS.Workbook());
      }
    }

    if (!this.config.incrementTabMode) {
      this.sequence = 0;
    }
  }

  /**
   * Write the whole workbook to the target path, overwriting it
   * @throws OutputError when the file cannot be written
   */
  async save(): Promise<void> {
    try {
      await this.store.save(this.requireWorkbook(), this.targetPath);
    } catch (error) {
      throw new OutputError(
        `Could not write output file '${this.targetPath}': ${errorMessage(error)}`,
        this.targetPath,
        error
      );
    }
  }

  /** Advance the 1-based result-set sequence number and return it */
  nextResultSet(): number {
    this.sequence++;
    return this.sequence;
  }

  // ==========================================================================
  // Effective settings for the current statement
  // ==========================================================================

  get appendMode(): boolean {
    return this.appendInEffect;
  }

  get incrementTabMode(): boolean {
    return this.config.incrementTabMode;
  }

  get headingsEnabled(): boolean {
    return this.headings;
  }

  get title(): string | undefined {
    return this.documentTitle;
  }

  get configuredTabNames(): string[] {
    return this.config.configuredTabs.map(tab => tab.name);
  }

  get configuredTabTitles(): Array<string | undefined> {
    return this.config.configuredTabs.map(tab => tab.title);
  }

  get pinnedSheetName(): string | undefined {
    return this.config.pinnedSheetName;
  }

  // ==========================================================================
  // Tabs
  // ==========================================================================

  getTabs(): readonly Tab[] {
    return this.tabs;
  }

  /** Sheet names match case-insensitively, as in the workbook itself */
  findTab(name: string): Tab | undefined {
    const wanted = name.toLowerCase();
    return this.tabs.find(tab => tab.name.toLowerCase() === wanted);
  }

  /**
   * Add a sheet. Without a name the sheet is auto-named `Sheet<N>`.
   */
  createTab(name?: string, title?: string): Tab {
    const workbook = this.requireWorkbook();
    const sheetName = name ?? this.autoSheetName();
    const tab: Tab = {
      name: sheetName,
      title,
      rowCursor: 0,
      worksheet: workbook.addWorksheet(sheetName),
    };
    this.tabs.push(tab);
    return tab;
  }

  getWorkbook(): Workbook {
    return this.requireWorkbook();
  }

  private autoSheetName(): string {
    const taken = new Set(this.requireWorkbook().worksheets.map(ws => ws.name.toLowerCase()));
    for (let n = this.tabs.length + 1; ; n++) {
      const candidate = `Sheet${n}`;
      if (!taken.has(candidate.toLowerCase())) {
        return candidate;
      }
    }
  }

  private reset(workbook: Workbook): void {
    this.workbook = workbook;
    this.tabs = workbook.worksheets.map(worksheet => ({
      name: worksheet.name,
      rowCursor: Math.max(0, worksheet.rowCount - 1),
      worksheet,
    }));
  }

  private requireWorkbook(): Workbook {
    if (this.workbook === undefined) {
      throw new Error('WorkbookSession.beginStatement() must run before the workbook is used');
    }
    return this.workbook;
  }

  private info(message: string): void {
    if (!this.config.quiet) {
      console.error(message);
    }
  }
}
