/**
 * Tab configuration parser
 *
 * Parses the workbook tab list given on the command line:
 *
 *   [Summary|{B2}Quarterly summary][Detail][Raw|Raw rows]
 *
 * Each bracketed group names one sheet, optionally followed by `|title`.
 * Sheets without a title are titled with their own name. Input that does
 * not match the bracket grammar disables the feature rather than failing.
 */

import type { TabSpec } from '../types/index.js';
import { decorateTitle } from './styleDirective.js';

const TAB_LIST_PATTERN = /^(\[[^[]*\])*$/;

export interface TabConfigResult {
  tabs: TabSpec[];
  /** False when the input did not match the bracket grammar */
  valid: boolean;
}

/**
 * Parse a tab configuration string into ordered tab specs.
 */
export function parseTabConfig(spec: string | undefined): TabConfigResult {
  if (spec === undefined || spec.length === 0) {
    return { tabs: [], valid: true };
  }

  if (!TAB_LIST_PATTERN.test(spec)) {
    return { tabs: [], valid: false };
  }

  const tabs: TabSpec[] = [];
  const groups = spec
    .slice(1, -1)
    .split(/[\][]/)
    .filter(group => group.length > 0);

  for (const group of groups) {
    const parts = group.split('|').filter(part => part.length > 0);
    if (parts.length === 0) {
      continue;
    }
    const [name, title] = parts;
    tabs.push({
      name,
      title: decorateTitle(title ?? name),
    });
  }

  return { tabs, valid: true };
}
