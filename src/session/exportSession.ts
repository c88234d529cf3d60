/**
 * Export Session
 *
 * Runs statements through an executor and streams every result set into
 * the configured renderer, one page of at most PAGE_ROW_LIMIT rows at a
 * time. Each executed statement is one rendered document.
 */

import {
  ExportConfig,
  PAGE_ROW_LIMIT,
  RowsResult,
  StatementExecutor,
  StatementResult,
} from '../types/index.js';
import { ResultMatrix } from '../formatters/resultMatrix.js';
import type { Renderer } from '../formatters/renderer.js';

export interface ExportSessionOptions {
  /** Rows per page; defaults to PAGE_ROW_LIMIT */
  pageSize?: number;
}

export interface StatementSummary {
  resultSets: number;
  rows: number;
  updates: number;
}

export class ExportSession {
  private readonly executor: StatementExecutor;
  private readonly renderer: Renderer;
  private readonly config: ExportConfig;
  private readonly pageSize: number;

  constructor(
    executor: StatementExecutor,
    renderer: Renderer,
    config: ExportConfig,
    options: ExportSessionOptions = {}
  ) {
    this.executor = executor;
    this.renderer = renderer;
    this.config = config;
    this.pageSize = options.pageSize ?? PAGE_ROW_LIMIT;
  }

  /**
   * Execute one statement and render everything it produced
   */
  async run(sql: string): Promise<StatementSummary> {
    const results = await this.executor.execute(sql);
    return this.render(results);
  }

  /**
   * Render already-executed results as one document
   */
  async render(results: StatementResult[]): Promise<StatementSummary> {
    const summary: StatementSummary = { resultSets: 0, rows: 0, updates: 0 };

    await this.renderer.beginDocument({
      title: this.config.title,
      headingsEnabled: this.config.headingsEnabled,
    });

    for (const result of results) {
      this.drainWarnings(result);
      if (result.kind === 'update') {
        summary.updates++;
        if (!this.config.showResultsOnly) {
          this.renderer.emitUpdateCount(result.count);
        }
        continue;
      }
      summary.resultSets++;
      summary.rows += await this.renderResultSet(result);
    }

    await this.renderer.endDocument();
    return summary;
  }

  private async renderResultSet(result: RowsResult): Promise<number> {
    const matrix = new ResultMatrix(result.columns, this.pageSize);
    let page = 0;
    let total = 0;

    const flush = (): void => {
      const widths = matrix.widths();
      this.renderer.beginResultSet(result.columns, widths, page);
      for (const row of matrix.rows) {
        this.renderer.emitRow(row, result.columns);
      }
      this.renderer.endResultSet(widths);
      matrix.clear();
      page++;
    };

    for await (const row of result.rows) {
      if (matrix.isFull) {
        flush();
      }
      matrix.append(row);
      total++;
    }

    // An empty result set still gets its header and footer.
    if (!matrix.isEmpty || page === 0) {
      flush();
    }
    return total;
  }

  private drainWarnings(result: StatementResult): void {
    for (const warning of result.warnings ?? []) {
      console.error(`Warning: ${warning}`);
    }
  }
}
