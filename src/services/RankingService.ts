/**
 * Pairwise ranking service.
 * Builds a strict best-first order by binary insertion, asking the oracle
 * one comparison at a time.
 */

import type { IComparatorOracle } from '../oracle/IComparatorOracle.js';
import type { Item, Ranking } from '../types/models.js';
import { DuplicateItemError, IndeterminateComparisonError } from '../errors.js';

export interface RankingProgress {
  /** Comparisons resolved so far. */
  completed: number;
  /** Worst-case total for the whole input. */
  estimatedTotal: number;
}

export interface InsertionEvent<P = unknown> {
  item: Item<P>;
  /** 1-based position the item landed at. */
  position: number;
  /** Size of the ordered sequence after insertion. */
  size: number;
}

export interface RankingOptions<P = unknown> {
  onProgress?: (progress: RankingProgress) => void;
  onInsert?: (event: InsertionEvent<P>) => void;
}

/**
 * Worst-case comparisons for binary insertion of n items:
 * inserting the k-th item costs at most ceil(log2 k).
 */
export function estimateComparisons(n: number): number {
  let total = 0;
  for (let k = 2; k <= n; k++) {
    total += Math.ceil(Math.log2(k));
  }
  return total;
}

export class RankingService {
  async rank<P>(
    items: readonly Item<P>[],
    oracle: IComparatorOracle<P>,
    options: RankingOptions<P> = {}
  ): Promise<Ranking<P>> {
    // Empty input is an empty ranking, not an error
    if (items.length === 0) return [];

    assertUniqueKeys(items);

    const estimatedTotal = estimateComparisons(items.length);
    const ordered: Item<P>[] = [items[0]];
    let completed = 0;

    for (let i = 1; i < items.length; i++) {
      const candidate = items[i];
      let lo = 0;
      let hi = ordered.length;

      while (lo < hi) {
        const mid = Math.floor((lo + hi) / 2);
        const incumbent = ordered[mid];
        const preference = await oracle.compare(candidate, incumbent);

        if (preference === 'abort') {
          throw new IndeterminateComparisonError(
            `Comparison between "${candidate.key}" and "${incumbent.key}" was not resolved`,
            { first: candidate.key, second: incumbent.key, completed }
          );
        }

        completed++;
        options.onProgress?.({ completed, estimatedTotal });

        if (preference === 'first') {
          hi = mid;
        } else {
          lo = mid + 1;
        }
      }

      ordered.splice(lo, 0, candidate);
      options.onInsert?.({ item: candidate, position: lo + 1, size: ordered.length });
    }

    return ordered;
  }
}

function assertUniqueKeys(items: readonly Item[]): void {
  const seen = new Set<string>();
  for (const item of items) {
    if (seen.has(item.key)) {
      throw new DuplicateItemError(item.key);
    }
    seen.add(item.key);
  }
}
