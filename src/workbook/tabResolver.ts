/**
 * Tab Resolver
 *
 * Decides which sheet a result set lands on.
 *
 * 1. A pinned sheet name that appears in the configured tab list selects
 *    that tab for every result set; otherwise the result-set sequence
 *    number picks the tab (sequence 1 -> first configured tab).
 * 2. A configured tab is fetched if it already exists, created otherwise.
 *    Configured tabs that come before it and do not exist yet are created
 *    first, with their titles, so sheet order follows the configuration.
 * 3. Past the configured list every result set gets a fresh auto-named sheet.
 */

import type { CellWriter } from './cellWriter.js';
import type { Tab, WorkbookSession } from './workbookSession.js';

export interface TabResolution {
  tab: Tab;
  /** Position in the configured tab list, or sequence - 1 */
  index: number;
  /** True when the sheet was created for this result set */
  newSheet: boolean;
  /** Title for the sheet: the configured tab title, else the document title */
  title?: string;
}

export class TabResolver {
  constructor(
    private readonly session: WorkbookSession,
    private readonly cells: CellWriter
  ) {}

  resolve(sequence: number): TabResolution {
    const names = this.session.configuredTabNames;
    const titles = this.session.configuredTabTitles;
    const index = this.targetIndex(sequence, names);
    const title = index < titles.length ? titles[index] : this.session.title;

    if (index >= names.length) {
      return { tab: this.session.createTab(), index, newSheet: true, title };
    }

    this.createIntermediateTabs(index, names, titles);

    const existing = this.session.findTab(names[index]);
    if (existing !== undefined) {
      return { tab: existing, index, newSheet: false, title };
    }
    return { tab: this.session.createTab(names[index], title), index, newSheet: true, title };
  }

  /**
   * Whether a resolved sheet gets its title and header rows. A sheet reused
   * in plain append mode already carries them.
   */
  shouldWriteFraming(resolution: TabResolution): boolean {
    return (!this.session.appendMode || this.session.incrementTabMode) && resolution.newSheet;
  }

  private targetIndex(sequence: number, names: readonly string[]): number {
    const pinned = this.session.pinnedSheetName;
    const pinnedIndex = pinned !== undefined ? names.indexOf(pinned) : -1;
    return pinnedIndex >= 0 ? pinnedIndex : sequence - 1;
  }

  private createIntermediateTabs(
    index: number,
    names: readonly string[],
    titles: ReadonlyArray<string | undefined>
  ): void {
    for (let i = 0; i < index; i++) {
      if (this.session.findTab(names[i]) !== undefined) {
        continue;
      }
      const title = titles[i];
      const tab = this.session.createTab(names[i], title);
      if (title !== undefined) {
        this.cells.writeTitle(tab, title);
      }
    }
  }
}
