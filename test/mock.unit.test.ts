import { describe, expect, it } from 'vitest';

import { MockLlmProvider } from '../src/llm/mock';
import { applyCriticPatches, parseGeneratedIdeas, parseRefinement } from '../src/engine/parse';
import { makeIdea } from './fixtures';

describe('MockLlmProvider', () => {
  it('numbers generated ideas by call', async () => {
    const llm = new MockLlmProvider();
    const first = parseGeneratedIdeas(await llm.generate({ kind: 'generate', prompt: 'p', count: 2 }), 1);
    const second = parseGeneratedIdeas(await llm.generate({ kind: 'generate', prompt: 'p', count: 1 }), 2);

    expect(first.map(i => i.title)).toEqual(['Mock Idea 0 (gen 0)', 'Mock Idea 1 (gen 0)']);
    expect(second.map(i => i.title)).toEqual(['Mock Idea 0 (gen 1)']);
    expect(first[1].summary).toBe('This is mock idea 1 generated in generation 0');
    expect(first[0].facets.audience).toBe('Developers');
  });

  it('scores later ideas in a batch higher', async () => {
    const ideas = [makeIdea({ id: 'a' }), makeIdea({ id: 'b' })];
    const output = await new MockLlmProvider().generate({
      kind: 'critic',
      ideas: ideas.map(({ id, title, summary }) => ({ id, title, summary }))
    });

    expect(applyCriticPatches(ideas, output)).toBe(2);
    const [, second] = ideas;
    expect(second.scores.feasibility).toBeCloseTo(7.3, 9);
    expect(second.scores.moats).toBeCloseTo(6.3, 9);
    expect(second.scores.risk).toBeCloseTo(4.8, 9);
    expect(second.overallScore).toBeCloseTo(7.3, 9);
    expect(second.judgeNotes).toBe('Mock evaluation for idea b');
    expect(ideas[0].scores.clarity).toBe(7.5);
  });

  it('refines by appending to the title and summary', async () => {
    const parent = makeIdea({ id: 'p', title: 'Timer', summary: 'Counts down.', judgeNotes: 'Be specific' });
    const output = await new MockLlmProvider().generate({
      kind: 'refine',
      id: parent.id,
      title: parent.title,
      summary: parent.summary,
      facets: parent.facets,
      judgeNotes: 'Be specific'
    });
    const child = parseRefinement(output, parent, 2);

    expect(child.title).toBe('Timer (refined)');
    expect(child.summary).toBe('Counts down. Improvements based on: Be specific');
    expect(child.facets).toEqual(parent.facets);
  });

  it('merges and mutates', async () => {
    const llm = new MockLlmProvider();
    const a = { title: 'Timer', summary: 'A', facets: makeIdea({ id: 'a' }).facets };
    const b = { title: 'Tracker', summary: 'B', facets: { ...a.facets, jtbd: 'Track flour' } };

    expect(await llm.generate({ kind: 'merge', ideaA: a, ideaB: b })).toMatchObject({
      idea: { title: 'Timer + Tracker', summary: 'Merged: A and B', facets: { jtbd: 'Track flour' } }
    });
    const mutated = await llm.generate({
      kind: 'mutate',
      idea: { ...a, facets: { ...a.facets, audience: 'Bakers' } },
      mutationType: 'audience'
    });
    expect(mutated).toMatchObject({
      mutationType: 'audience',
      idea: { title: 'Timer (mutated)', facets: { audience: 'Bakers (mutated)' } }
    });
  });
});
