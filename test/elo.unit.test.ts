import { describe, expect, it } from 'vitest';

import { DEFAULT_ELO, expectedScore, updateElo } from '../src/preferences/elo';

describe('updateElo', () => {
  it('moves equal ratings by half of K', () => {
    const ratings = { a: 1000, b: 1000 };
    const delta = updateElo(ratings, 'a', 'b');

    expect(delta).toEqual({ winner: 16, loser: -16 });
    expect(ratings).toEqual({ a: 1016, b: 984 });
  });

  it('rewards an upset more', () => {
    const ratings = { strong: 1200, weak: 1000 };
    const { winner } = updateElo(ratings, 'weak', 'strong');

    expect(winner).toBeCloseTo(24.3119, 3);
    expect(ratings.weak).toBeCloseTo(1024.3119, 3);
  });

  it('is zero-sum and starts unseen ideas at the default rating', () => {
    const ratings: Record<string, number> = { known: 1100 };
    updateElo(ratings, 'fresh', 'known');

    expect(ratings.fresh + ratings.known).toBeCloseTo(1100 + DEFAULT_ELO, 9);
    expect(ratings.fresh).toBeGreaterThan(DEFAULT_ELO);
  });
});

describe('expectedScore', () => {
  it('is symmetric around one half', () => {
    expect(expectedScore(1000, 1000)).toBe(0.5);
    expect(expectedScore(1300, 1100) + expectedScore(1100, 1300)).toBeCloseTo(1, 12);
  });
});
