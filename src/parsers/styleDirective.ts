/**
 * Style Directive Parser - Tokenizer & Interpreter
 *
 * Parses the inline `{flags}text` mini-language used by titles, headers and
 * styled workbook cells:
 *
 *   {B}Hello          bold
 *   {BUC3>6}Total     bold, underline, centered, heading 3, merge 6 columns right
 *   {>3}Name          merge 3 columns right
 *
 * Flag letters are case-insensitive. Unknown characters are ignored.
 */

import type { StyleDirective } from '../types/index.js';

// ============================================================================
// Token Types
// ============================================================================

export enum DirectiveTokenType {
  BOLD = 'BOLD',
  ITALIC = 'ITALIC',
  UNDERLINE = 'UNDERLINE',
  CENTER = 'CENTER',
  HEADING = 'HEADING', // 1-4 outside merge mode
  MERGE = 'MERGE', // >
  SPAN = 'SPAN', // any character after >, read as a digit
  CLOSE = 'CLOSE', // }
  UNKNOWN = 'UNKNOWN',
}

export interface DirectiveToken {
  type: DirectiveTokenType;
  value: string;
  position: number;
}

/** Heading level applied when the directive names none */
export const DEFAULT_HEADING_LEVEL = 5;

const FLAG_TOKENS: Record<string, DirectiveTokenType> = {
  b: DirectiveTokenType.BOLD,
  i: DirectiveTokenType.ITALIC,
  u: DirectiveTokenType.UNDERLINE,
  c: DirectiveTokenType.CENTER,
  '>': DirectiveTokenType.MERGE,
  '}': DirectiveTokenType.CLOSE,
};

// ============================================================================
// Tokenizer
// ============================================================================

export class StyleDirectiveTokenizer {
  private readonly input: string;
  private position: number;
  private mergeMode: boolean;

  constructor(input: string) {
    this.input = input;
    this.position = 0;
    this.mergeMode = false;
  }

  /**
   * Tokenize the flag block. Stops after the closing brace; the caller reads
   * the literal text from `bodyStart()`.
   */
  tokenize(): DirectiveToken[] {
    const tokens: DirectiveToken[] = [];
    this.position = 1;
    this.mergeMode = false;

    if (!this.input.startsWith('{')) {
      return tokens;
    }

    while (this.position < this.input.length) {
      const token = this.nextToken();
      tokens.push(token);
      if (token.type === DirectiveTokenType.CLOSE) {
        break;
      }
    }

    return tokens;
  }

  /** Index of the first literal character, or -1 when the block never closed */
  bodyStart(): number {
    const closed = this.position <= this.input.length && this.input[this.position - 1] === '}';
    return closed && this.position > 1 ? this.position : -1;
  }

  private nextToken(): DirectiveToken {
    const position = this.position;
    const char = this.input[this.position++];
    const flag = FLAG_TOKENS[char.toLowerCase()];

    if (flag !== undefined) {
      if (flag === DirectiveTokenType.MERGE) {
        this.mergeMode = true;
      }
      return { type: flag, value: char, position };
    }

    if (this.mergeMode) {
      return { type: DirectiveTokenType.SPAN, value: char, position };
    }

    if (char >= '1' && char <= '4') {
      return { type: DirectiveTokenType.HEADING, value: char, position };
    }

    return { type: DirectiveTokenType.UNKNOWN, value: char, position };
  }
}

// ============================================================================
// Interpreter
// ============================================================================

/** Style applied to plain strings with no directive block */
export function defaultDirective(text: string): StyleDirective {
  return {
    bold: false,
    italic: false,
    underline: false,
    center: false,
    headingLevel: DEFAULT_HEADING_LEVEL,
    text,
  };
}

/**
 * Parse a possibly-directive-prefixed string.
 *
 * A block that never closes leaves `text` empty.
 */
export function parseStyleDirective(value: string): StyleDirective {
  if (!value.startsWith('{')) {
    return defaultDirective(value);
  }

  const tokenizer = new StyleDirectiveTokenizer(value);
  const tokens = tokenizer.tokenize();
  const directive = defaultDirective('');

  for (const token of tokens) {
    switch (token.type) {
      case DirectiveTokenType.BOLD:
        directive.bold = true;
        break;
      case DirectiveTokenType.ITALIC:
        directive.italic = true;
        break;
      case DirectiveTokenType.UNDERLINE:
        directive.underline = true;
        break;
      case DirectiveTokenType.CENTER:
        directive.center = true;
        break;
      case DirectiveTokenType.HEADING:
        directive.headingLevel = Number(token.value);
        break;
      case DirectiveTokenType.MERGE:
        directive.mergeSpan ??= 0;
        break;
      case DirectiveTokenType.SPAN: {
        const span = token.value.charCodeAt(0) - 48;
        if (span >= 0 && span <= 9) {
          directive.mergeSpan = span;
        }
        break;
      }
      default:
        break;
    }
  }

  const start = tokenizer.bodyStart();
  directive.text = start >= 0 ? value.slice(start) : '';
  return directive;
}

/** Strip any directive block, keeping only the literal text */
export function directiveText(value: string): string {
  return parseStyleDirective(value).text;
}

/**
 * Cache key for the font a directive produces. Center alignment and merge
 * span are applied per cell and never take part in the key.
 */
export function styleKey(directive: StyleDirective): string {
  return (
    (directive.headingLevel > 0 ? String(directive.headingLevel) : '') +
    (directive.bold ? 'B' : '') +
    (directive.italic ? 'I' : '') +
    (directive.underline ? 'U' : '')
  );
}

/** Font size in points for a heading level */
export function fontSizeFor(headingLevel: number): number {
  return 20 - 2 * headingLevel;
}

/** Directive prefixed to titles given without one */
export const DEFAULT_TITLE_DIRECTIVE = '{BUC3>6}';

/** Give a bare title the default title styling; directive-led titles pass through */
export function decorateTitle(title: string): string {
  return title.startsWith('{') ? title : DEFAULT_TITLE_DIRECTIVE + title;
}
