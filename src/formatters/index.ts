/**
 * Formatters Module
 *
 * Renderer selection and the stream renderers for text, CSV and HTML.
 */

import type { ExportConfig, OutputSink } from '../types/index.js';
import { WorkbookRenderer } from '../workbook/workbookRenderer.js';
import { WorkbookSession, type WorkbookStore } from '../workbook/workbookSession.js';
import { CsvRenderer } from './csvRenderer.js';
import { HtmlRenderer } from './htmlRenderer.js';
import type { Renderer } from './renderer.js';
import { TextRenderer } from './textRenderer.js';

export interface RendererTargets {
  /** Character sink for text, CSV and HTML */
  sink: OutputSink;
  /** Workbook persistence; defaults to xlsx files on disk */
  store?: WorkbookStore;
}

/**
 * Pick the renderer for the configured output format
 */
export function createRenderer(config: ExportConfig, targets: RendererTargets): Renderer {
  switch (config.outputFormat) {
    case 'csv':
      return new CsvRenderer(targets.sink);
    case 'html':
      return new HtmlRenderer(targets.sink, { cssFilePath: config.cssFilePath });
    case 'xls':
      return new WorkbookRenderer(new WorkbookSession(config, targets.store));
    case 'text':
    default:
      return new TextRenderer(targets.sink);
  }
}

export { type Renderer, type DocumentOptions, StreamRenderer } from './renderer.js';
export { ResultMatrix } from './resultMatrix.js';
export { TextRenderer, dividerLine, fixedWidthRow } from './textRenderer.js';
export { CsvRenderer, csvLine } from './csvRenderer.js';
export { HtmlRenderer, loadStylesheet, DEFAULT_STYLESHEET_PATH } from './htmlRenderer.js';
