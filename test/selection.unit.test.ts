import { describe, expect, it } from 'vitest';

import { rankByScore, selectIdeas, updateStagnation } from '../src/engine/selection';
import { seededRandom } from '../src/util/random';
import { makeIdea } from './fixtures';

function ladder(count: number) {
  // i1 scores highest
  return Array.from({ length: count }, (_, k) => makeIdea({ id: `i${k + 1}`, overallScore: count - k }));
}

describe('selectIdeas', () => {
  it('keeps the elite and samples the middle band', () => {
    const selected = selectIdeas(ladder(9), 2, 4, () => 0);
    // band is ranks [3, 6): i4, i5, i6
    expect([...selected]).toEqual(['i1', 'i2', 'i4', 'i5']);
  });

  it('ignores archived and unscored ideas', () => {
    const ideas = [
      makeIdea({ id: 'gone', overallScore: 10, status: 'archived' }),
      makeIdea({ id: 'fresh', overallScore: null }),
      makeIdea({ id: 'kept', overallScore: 5 })
    ];
    expect([...selectIdeas(ideas, 1, 1, () => 0)]).toEqual(['kept']);
  });

  it('returns everything when the elite covers the population', () => {
    const selected = selectIdeas(ladder(2), 5, 6, () => 0.5);
    expect([...selected]).toEqual(['i1', 'i2']);
  });

  it('adds nothing from the band when there are no free slots', () => {
    expect([...selectIdeas(ladder(10), 3, 3, () => 0)]).toEqual(['i1', 'i2', 'i3']);
  });

  it('never exceeds the population size and always includes the elite', () => {
    const random = seededRandom(7);
    for (let trial = 0; trial < 40; trial++) {
      const n = 1 + Math.floor(random() * 20);
      const populationSize = 1 + Math.floor(random() * 12);
      const eliteCount = Math.floor(random() * (populationSize + 1));
      const ideas = ladder(n);

      const selected = selectIdeas(ideas, eliteCount, populationSize, random);

      expect(selected.size).toBeLessThanOrEqual(populationSize);
      for (const idea of ideas.slice(0, Math.min(eliteCount, n))) {
        expect(selected.has(idea.id)).toBe(true);
      }
    }
  });
});

describe('rankByScore', () => {
  it('keeps input order on ties', () => {
    const ideas = [
      makeIdea({ id: 'a', overallScore: 5 }),
      makeIdea({ id: 'b', overallScore: 7 }),
      makeIdea({ id: 'c', overallScore: 5 }),
      makeIdea({ id: 'd', overallScore: null })
    ];
    expect(rankByScore(ideas).map(i => i.id)).toEqual(['b', 'a', 'c', 'd']);
  });
});

describe('updateStagnation', () => {
  it('resets on the first best ever recorded', () => {
    expect(updateStagnation(6, null, 3)).toBe(0);
  });

  it('resets on a strict improvement', () => {
    expect(updateStagnation(8, 7, 3)).toBe(0);
  });

  it('counts a tie as no improvement', () => {
    expect(updateStagnation(7, 7, 3)).toBe(4);
  });

  it('counts a drop or a missing best as no improvement', () => {
    expect(updateStagnation(6, 7, 0)).toBe(1);
    expect(updateStagnation(null, 7, 1)).toBe(2);
  });
});
