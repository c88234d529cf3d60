/**
 * Style Cache Layer
 *
 * Memoizes workbook fonts derived from style directives, keyed by the
 * heading digit plus B/I/U flags. Entries live for the whole workbook
 * session: no TTL, no eviction.
 *
 * Handles are returned by reference so every cell sharing a flag
 * combination shares one font object.
 */

import NodeCache from 'node-cache';
import type { Font } from 'exceljs';
import type { StyleDirective } from '../types/index.js';
import { fontSizeFor, styleKey } from '../parsers/styleDirective.js';

export type FontHandle = Readonly<Partial<Font>>;

/**
 * StyleCache - per-session font memo
 *
 * Features:
 * - Lazy construction on first request for a key
 * - Idempotent: later requests with the same key reuse the handle
 * - No expiry (stdTTL 0, no check period)
 */
export class StyleCache {
  private readonly cache: NodeCache;

  constructor() {
    this.cache = new NodeCache({
      stdTTL: 0,
      checkperiod: 0,
      useClones: false, // callers compare handles by identity
    });
  }

  /**
   * Get the font for a directive, building it on first use
   */
  getOrCreate(directive: StyleDirective): FontHandle {
    const key = styleKey(directive);
    const cached = this.cache.get<FontHandle>(key);
    if (cached !== undefined) {
      return cached;
    }

    const font: Partial<Font> = {
      size: fontSizeFor(directive.headingLevel),
      bold: directive.bold,
      italic: directive.italic,
      underline: directive.underline ? 'single' : false,
    };
    this.cache.set(key, Object.freeze(font));
    return font;
  }

  has(directive: StyleDirective): boolean {
    return this.cache.has(styleKey(directive));
  }

  /** Number of distinct flag combinations built so far */
  get size(): number {
    return this.cache.keys().length;
  }
}
