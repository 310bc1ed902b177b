import type { Idea } from '../types';
import type { RandomSource } from '../util/random';
import { sampleWithoutReplacement } from '../util/random';

/** Stable, descending by overall score; unscored ideas sort last. */
export function rankByScore<T extends Pick<Idea, 'overallScore'>>(ideas: readonly T[]): T[] {
  return [...ideas].sort((a, b) => (b.overallScore ?? -Infinity) - (a.overallScore ?? -Infinity));
}

/** Highest-scoring active idea, or undefined when none has a score. */
export function bestActive(ideas: readonly Idea[]): Idea | undefined {
  return rankByScore(ideas.filter(i => i.status === 'active' && i.overallScore !== null))[0];
}

/**
 * Elite plus a random sample from the middle band of the ranking.
 * Only active ideas with an overall score are considered.
 */
export function selectIdeas(
  ideas: readonly Idea[],
  eliteCount: number,
  populationSize: number,
  random: RandomSource = Math.random
): Set<string> {
  const scored = rankByScore(ideas.filter(i => i.status === 'active' && i.overallScore !== null));
  const n = scored.length;
  const selected = new Set<string>();

  const eliteTaken = Math.min(eliteCount, n);
  for (const idea of scored.slice(0, eliteTaken)) {
    selected.add(idea.id);
  }

  const diversitySlots = populationSize - eliteTaken;
  if (diversitySlots > 0 && n > eliteCount) {
    const bandStart = Math.ceil(0.3 * n);
    const bandEnd = Math.floor(0.7 * n);
    const band = scored.slice(bandStart, Math.max(bandStart, bandEnd)).filter(i => !selected.has(i.id));
    const take = Math.min(diversitySlots, band.length);
    for (const idea of sampleWithoutReplacement(band, take, random)) {
      selected.add(idea.id);
    }
  }

  return selected;
}

export function updateStagnation(current: number | null, previous: number | null, counter: number): number {
  if (previous === null) return 0;
  if (current !== null && current > previous) return 0;
  return counter + 1;
}
