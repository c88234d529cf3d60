/**
 * Workbook renderer
 *
 * Writes result sets into sheets of the session's workbook and persists the
 * workbook when the statement's document ends.
 */

import type { ColumnDescriptor, OutputFormat, Row } from '../types/index.js';
import type { DocumentOptions, Renderer } from '../formatters/renderer.js';
import { autoFitColumns } from './autofit.js';
import { CellWriter } from './cellWriter.js';
import { TabResolver } from './tabResolver.js';
import type { Tab, WorkbookSession } from './workbookSession.js';

export class WorkbookRenderer implements Renderer {
  readonly format: OutputFormat = 'xls';

  private readonly session: WorkbookSession;
  private readonly cells: CellWriter;
  private readonly resolver: TabResolver;
  private currentTab?: Tab;

  constructor(session: WorkbookSession) {
    this.session = session;
    this.cells = new CellWriter(session.styleCache);
    this.resolver = new TabResolver(session, this.cells);
  }

  /**
   * Heading and title settings come from the session, which turns both off
   * once an existing workbook has been loaded for appending.
   */
  async beginDocument(_options: DocumentOptions): Promise<void> {
    await this.session.beginStatement();
    this.currentTab = undefined;
  }

  beginResultSet(columns: readonly ColumnDescriptor[], _widths: readonly number[], page: number): void {
    // Later pages of the same result set continue on the sheet of the first.
    if (page > 0 && this.currentTab !== undefined) {
      return;
    }

    const resolution = this.resolver.resolve(this.session.nextResultSet());
    this.currentTab = resolution.tab;

    if (!this.resolver.shouldWriteFraming(resolution)) {
      return;
    }
    if (resolution.title !== undefined) {
      this.cells.writeTitle(resolution.tab, resolution.title);
    }
    if (this.session.headingsEnabled) {
      this.cells.writeHeader(resolution.tab, columns);
    }
  }

  emitRow(values: Row, columns: readonly ColumnDescriptor[]): void {
    this.cells.writeData(this.requireTab(), values, columns);
  }

  endResultSet(widths: readonly number[]): void {
    const columns = widths.map((_, i) => i + 1);
    autoFitColumns(this.requireTab().worksheet, columns);
  }

  /** The workbook has no place for update counts; they go to standard output */
  emitUpdateCount(count: number): void {
    console.log(`Updated: ${count}`);
  }

  async endDocument(): Promise<void> {
    await this.session.save();
  }

  private requireTab(): Tab {
    if (this.currentTab === undefined) {
      throw new Error('WorkbookRenderer: beginResultSet() must be called before writing rows');
    }
    return this.currentTab;
  }
}
