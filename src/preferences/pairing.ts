import { DEFAULT_ELO } from './elo';
import type { Comparison } from '../types';

/** Order-independent key for an unordered pair. */
export function pairKey(a: string, b: string): string {
  return a < b ? `${a}|${b}` : `${b}|${a}`;
}

export function comparedPairs(comparisons: readonly Comparison[]): Set<string> {
  return new Set(comparisons.map(c => pairKey(c.ideaA, c.ideaB)));
}

export function pairwiseLimit(n: number): number {
  return 2 * n;
}

/**
 * The uncompared pair with the smallest rating gap. Ties go to the pair found
 * first in (i, j) index order.
 */
export function selectNextPair(
  ids: readonly string[],
  ratings: Readonly<Record<string, number>>,
  compared: ReadonlySet<string>
): [string, string] | null {
  let best: [string, string] | null = null;
  let smallestGap = Infinity;

  for (let i = 0; i < ids.length; i++) {
    for (let j = i + 1; j < ids.length; j++) {
      if (compared.has(pairKey(ids[i], ids[j]))) continue;
      const gap = Math.abs((ratings[ids[i]] ?? DEFAULT_ELO) - (ratings[ids[j]] ?? DEFAULT_ELO));
      if (gap < smallestGap) {
        smallestGap = gap;
        best = [ids[i], ids[j]];
      }
    }
  }

  return best;
}
