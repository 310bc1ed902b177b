import { describe, expect, it } from 'vitest';

import { MalformedOutputError } from '../src/errors';
import { applyCriticPatches, parseGeneratedIdeas, parseRefinement } from '../src/engine/parse';
import { makeIdea, makeScores } from './fixtures';

describe('parseGeneratedIdeas', () => {
  it('fills missing fields with defaults', () => {
    const [idea] = parseGeneratedIdeas({ ideas: [{ facets: { audience: 'Bakers' } }] }, 3);

    expect(idea.title).toBe('Untitled');
    expect(idea.summary).toBe('');
    expect(idea.facets).toEqual({
      audience: 'Bakers',
      jtbd: '',
      differentiator: '',
      monetization: '',
      distribution: '',
      risks: ''
    });
    expect(idea).toMatchObject({ gen: 3, origin: 'generated', parents: [], status: 'active', overallScore: null });
  });

  it('gives every idea its own id', () => {
    const ideas = parseGeneratedIdeas({ ideas: [{ title: 'One' }, { title: 'Two' }] }, 1);
    expect(new Set(ideas.map(i => i.id)).size).toBe(2);
  });

  it('rejects output without an ideas array', () => {
    expect(() => parseGeneratedIdeas({ items: [] }, 1)).toThrow(MalformedOutputError);
    expect(() => parseGeneratedIdeas('not json', 1)).toThrow(MalformedOutputError);
  });
});

describe('applyCriticPatches', () => {
  it('replaces scores, zeroing missing criteria', () => {
    const idea = makeIdea({ id: 'a', scores: makeScores({ moats: 4 }) });
    const applied = applyCriticPatches([idea], {
      patches: [{ id: 'a', scores: { feasibility: 8, risk: 3 }, overallScore: 6, judgeNotes: 'Tight scope' }]
    });

    expect(applied).toBe(1);
    expect(idea.scores).toEqual(makeScores({ feasibility: 8, risk: 3 }));
    expect(idea.overallScore).toBe(6);
    expect(idea.judgeNotes).toBe('Tight scope');
  });

  it('skips patches for unknown ids', () => {
    const idea = makeIdea({ id: 'a' });
    const applied = applyCriticPatches([idea], {
      patches: [
        { id: 'ghost', scores: { feasibility: 9 } },
        { id: 'a', scores: { clarity: 5 } }
      ]
    });

    expect(applied).toBe(1);
    expect(idea.scores.clarity).toBe(5);
    expect(idea.judgeNotes).toBeNull();
  });

  it('rejects a missing patches array or a patch without an id', () => {
    expect(() => applyCriticPatches([], {})).toThrow(MalformedOutputError);
    expect(() => applyCriticPatches([], { patches: [{ scores: {} }] })).toThrow(MalformedOutputError);
  });
});

describe('parseRefinement', () => {
  const parent = makeIdea({
    id: 'p1',
    title: 'Flour tracker',
    summary: 'Tracks flour stock',
    facets: {
      audience: 'Bakers',
      jtbd: 'Never run out',
      differentiator: 'Scale integration',
      monetization: 'Monthly plan',
      distribution: 'Trade fairs',
      risks: 'Hardware costs'
    },
    overallScore: 7,
    judgeNotes: 'Narrow the audience'
  });

  it('inherits whatever the patch leaves out', () => {
    const child = parseRefinement({ patch: { title: 'Flour tracker Pro', facets: { audience: 'Bakery chains' } } }, parent, 2);

    expect(child.title).toBe('Flour tracker Pro');
    expect(child.summary).toBe('Tracks flour stock');
    expect(child.facets).toEqual({ ...parent.facets, audience: 'Bakery chains' });
    expect(child).toMatchObject({ gen: 2, origin: 'refined', parents: ['p1'], overallScore: null, judgeNotes: null });
    expect(child.id).not.toBe('p1');
  });

  it('rejects output without a patch', () => {
    expect(() => parseRefinement({}, parent, 2)).toThrow(MalformedOutputError);
  });
});
