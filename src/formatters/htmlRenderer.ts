/**
 * HTML renderer
 *
 * One page per executed statement, one `<table>` per result page. Cell
 * values are written verbatim so markup stored in the database renders as
 * markup.
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import type { ColumnDescriptor, OutputFormat, OutputSink, Row } from '../types/index.js';
import { errorMessage } from '../types/index.js';
import { directiveText } from '../parsers/styleDirective.js';
import type { DocumentOptions } from './renderer.js';
import { StreamRenderer } from './renderer.js';

/** Stylesheet shipped with the package, used when no --css file is given */
export const DEFAULT_STYLESHEET_PATH = fileURLToPath(new URL('../../assets/default.css', import.meta.url));

export interface HtmlRendererOptions {
  cssFilePath?: string;
}

/**
 * Read the stylesheet to inline. An unreadable file is reported and the page
 * is rendered without styling.
 */
export function loadStylesheet(cssFilePath: string = DEFAULT_STYLESHEET_PATH): string | undefined {
  try {
    return readFileSync(cssFilePath, 'utf-8');
  } catch (error) {
    console.error(`Could not read stylesheet '${cssFilePath}': ${errorMessage(error)}`);
    return undefined;
  }
}

export class HtmlRenderer extends StreamRenderer {
  readonly format: OutputFormat = 'html';

  private readonly cssFilePath?: string;

  constructor(sink: OutputSink, options: HtmlRendererOptions = {}) {
    super(sink);
    this.cssFilePath = options.cssFilePath;
  }

  async beginDocument(options: DocumentOptions): Promise<void> {
    await super.beginDocument(options);
    const title = this.title !== undefined ? directiveText(this.title) : '';

    this.line(
      `<html><head><title>${title}</title>` +
        '<meta http-equiv="content-type" content="text/html;charset=UTF-8"/>'
    );
    const css = loadStylesheet(this.cssFilePath);
    if (css !== undefined) {
      this.line('<style>');
      this.sink.write(css.endsWith('\n') ? css : css + '\n');
      this.line('</style>');
    }
    this.line('</head>');
    this.line('<body>');

    if (this.title !== undefined && this.headingsEnabled) {
      this.line('<table width="100%">');
      this.line(`<tr><th class="title">${title}</th></tr>`);
      this.line('</table>');
    }
  }

  beginResultSet(columns: readonly ColumnDescriptor[]): void {
    this.line('<table width="100%">');
    if (!this.headingsEnabled) {
      return;
    }
    const cells = columns.map(column => `<th align="center">${column.name}</th>`);
    this.line('<tr>' + cells.join('') + '</tr>');
  }

  emitRow(values: Row): void {
    const cells = values.map(value => `<td align="center">${value}</td>`);
    this.line('<tr>' + cells.join('') + '</tr>');
  }

  endResultSet(): void {
    this.line('</table>');
    this.line('');
  }

  async endDocument(): Promise<void> {
    this.line('</body>');
    this.line('</html>');
  }
}
