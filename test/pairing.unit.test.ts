import { describe, expect, it } from 'vitest';

import { comparedPairs, pairKey, pairwiseLimit, selectNextPair } from '../src/preferences/pairing';

const ids = ['a', 'b', 'c', 'd'];

describe('selectNextPair', () => {
  it('picks the closest ratings', () => {
    const ratings = { a: 1000, b: 1050, c: 1200, d: 1500 };
    expect(selectNextPair(ids, ratings, new Set())).toEqual(['a', 'b']);
  });

  it('skips pairs already compared in either order', () => {
    const ratings = { a: 1000, b: 1050, c: 1100, d: 1500 };
    const compared = comparedPairs([{ ideaA: 'b', ideaB: 'a', winner: 'a' }]);
    expect(selectNextPair(ids, ratings, compared)).toEqual(['b', 'c']);
  });

  it('takes the first pair on ties', () => {
    expect(selectNextPair(ids, {}, new Set())).toEqual(['a', 'b']);
  });

  it('returns null once every pair is compared', () => {
    const compared = new Set([pairKey('a', 'b'), pairKey('a', 'c'), pairKey('b', 'c')]);
    expect(selectNextPair(['a', 'b', 'c'], {}, compared)).toBeNull();
  });
});

describe('pair helpers', () => {
  it('keys pairs independent of order', () => {
    expect(pairKey('y', 'x')).toBe('x|y');
    expect(pairKey('x', 'y')).toBe('x|y');
  });

  it('allows two comparisons per idea', () => {
    expect(pairwiseLimit(5)).toBe(10);
  });
});
