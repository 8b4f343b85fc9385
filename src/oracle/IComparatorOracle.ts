/**
 * Comparator oracle interface.
 * Resolves one pairwise preference at a time — a terminal prompt, a scripted
 * judge, or a test stub.
 */

import type { Item, Preference } from '../types/models.js';

export interface IComparatorOracle<P = unknown> {
  /**
   * Decide which of two items is preferred.
   * Must never answer "equal": an oracle that allows no preference resolves it
   * to a deterministic side itself, or answers 'abort'.
   */
  compare(first: Item<P>, second: Item<P>): Promise<Preference>;

  /** Optional metadata side channel. Called only by the oracle's own UI, never by the sorter. */
  describe?(item: Item<P>): string[];
}
