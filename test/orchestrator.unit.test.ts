import { describe, expect, it } from 'vitest';

import {
  Orchestrator,
  evaluateStop,
  maxRoundsReached,
  stagnationReached,
  thresholdReached
} from '../src/engine/orchestrator';
import { MockLlmProvider } from '../src/llm/mock';
import type { LlmTask } from '../src/types';
import { emptyState } from '../src/state/storage';
import { validateStateInvariants } from '../src/state/validate';
import { MemoryStorage } from './mocks/MemoryStorage';
import { makeConfig } from './fixtures';

describe('stop predicates', () => {
  it('needs a best score to reach the threshold', () => {
    expect(thresholdReached(null, 0)).toBe(false);
    expect(thresholdReached(8.7, 8.7)).toBe(true);
    expect(thresholdReached(8.69, 8.7)).toBe(false);
  });

  it('compares stagnation and rounds inclusively', () => {
    expect(stagnationReached(2, 2)).toBe(true);
    expect(stagnationReached(1, 2)).toBe(false);
    expect(maxRoundsReached(6, 6)).toBe(true);
    expect(maxRoundsReached(5, 6)).toBe(false);
  });

  it('checks threshold, then stagnation, then rounds', () => {
    const config = makeConfig({ scoreThreshold: 8, stagnationPatience: 2, maxRounds: 3 });
    const everything = { ...emptyState('test-run'), bestScore: 9, stagnationCounter: 5, iteration: 3 };

    expect(evaluateStop(everything, config)).toBe('threshold');
    expect(evaluateStop({ ...everything, bestScore: 7 }, config)).toBe('stagnation');
    expect(evaluateStop({ ...everything, bestScore: 7, stagnationCounter: 0 }, config)).toBe('max_rounds');
    expect(evaluateStop({ ...everything, bestScore: 7, stagnationCounter: 0, iteration: 1 }, config)).toBeNull();
  });
});

describe('Orchestrator', () => {
  const smallRun = { populationSize: 4, eliteCount: 2, scoreThreshold: 10, stagnationPatience: 100 };

  it('runs one full round with the mock provider and finalizes', async () => {
    const storage = new MemoryStorage();
    const outcome = await Orchestrator.create(makeConfig({ ...smallRun, maxRounds: 1 }), {
      llm: new MockLlmProvider(),
      storage
    }).run();

    expect(outcome.stopReason).toBe('max_rounds');
    expect(outcome.status).toBe('finalized');
    expect(outcome.state.iteration).toBe(1);

    // 4 generated, 2 kept by the elite (the middle band is empty for n=4), 2 refined children
    const { ideas } = outcome.state;
    const active = ideas.filter(i => i.status === 'active');
    expect(ideas).toHaveLength(6);
    expect(active).toHaveLength(4);
    expect(ideas.filter(i => i.status === 'archived')).toHaveLength(2);
    expect(active.every(i => i.overallScore !== null)).toBe(true);
    expect(ideas.filter(i => i.origin === 'refined').map(i => i.title)).toEqual([
      'Mock Idea 3 (gen 0) (refined)',
      'Mock Idea 2 (gen 0) (refined)'
    ]);

    const scores = active.map(i => i.overallScore ?? 0).sort((a, b) => a - b);
    expect(scores[0]).toBeCloseTo(6.6125, 9);
    expect(scores[1]).toBeCloseTo(6.9, 9);
    expect(scores[2]).toBeCloseTo(7.1875, 9);
    expect(scores[3]).toBeCloseTo(7.475, 9);

    expect(outcome.result.best.title).toBe('Mock Idea 3 (gen 0)');
    expect(outcome.result.best.overallScore).toBeCloseTo(7.475, 9);
    expect(outcome.result.runnersUp).toHaveLength(3);

    expect(storage.loadEvents('test-run').map(e => e.type)).toEqual([
      'generated',
      'scored',
      'selected',
      'refined',
      'scored',
      'stopped'
    ]);
    expect(storage.stateSaves).toBe(6);
    expect(storage.loadFinal('test-run')?.best.ideaId).toBe(outcome.result.best.ideaId);
    expect(validateStateInvariants(storage.loadState('test-run'))).toEqual([]);
  });

  it('records a refined child scored after the stop as the best idea', async () => {
    // Refined children get 10 on every criterion with no risk; everything else gets 5
    class RefinedFavoringLlm extends MockLlmProvider {
      async generate(task: LlmTask): Promise<unknown> {
        if (task.kind !== 'critic') return super.generate(task);
        return {
          patches: task.ideas.map(idea => {
            const refined = idea.title.endsWith('(refined)');
            const value = refined ? 10 : 5;
            return {
              id: idea.id,
              scores: {
                feasibility: value,
                speedToValue: value,
                differentiation: value,
                marketSize: value,
                distribution: value,
                moats: value,
                risk: refined ? 0 : 5,
                clarity: value
              }
            };
          })
        };
      }
    }
    const storage = new MemoryStorage();

    const outcome = await Orchestrator.create(makeConfig({ ...smallRun, maxRounds: 1 }), {
      llm: new RefinedFavoringLlm(),
      storage
    }).run();

    expect(outcome.stopReason).toBe('max_rounds');
    expect(outcome.result.best.title).toMatch(/\(refined\)$/);
    expect(outcome.result.best.overallScore).toBe(10);

    const state = storage.loadState('test-run');
    expect(state.bestIdeaId).toBe(outcome.result.best.ideaId);
    expect(state.bestScore).toBe(10);
    expect(storage.loadFinal('test-run')?.best.ideaId).toBe(state.bestIdeaId);

    const stopped = storage.loadEvents('test-run').find(e => e.type === 'stopped');
    expect(stopped?.payload).toEqual({ reason: 'max_rounds', bestScore: 10, bestIdeaId: state.bestIdeaId });
  });

  it('stops on the score threshold', async () => {
    const outcome = await Orchestrator.create(makeConfig({ ...smallRun, scoreThreshold: 7, maxRounds: 5 }), {
      llm: new MockLlmProvider(),
      storage: new MemoryStorage()
    }).run();

    expect(outcome.stopReason).toBe('threshold');
    expect(outcome.state.iteration).toBe(1);
  });

  it('stops when the best score stops improving', async () => {
    const outcome = await Orchestrator.create(makeConfig({ ...smallRun, stagnationPatience: 1, maxRounds: 10 }), {
      llm: new MockLlmProvider(),
      storage: new MemoryStorage()
    }).run();

    expect(outcome.stopReason).toBe('stagnation');
    expect(outcome.state.iteration).toBe(2);
    expect(outcome.state.stagnationCounter).toBe(1);
  });

  it('resumes a stored run with a raised round limit', async () => {
    const storage = new MemoryStorage();
    await Orchestrator.create(makeConfig({ ...smallRun, maxRounds: 1 }), {
      llm: new MockLlmProvider(),
      storage
    }).run();

    const outcome = await Orchestrator.resume('test-run', { llm: new MockLlmProvider(), storage }, 2).run();

    expect(outcome.stopReason).toBe('max_rounds');
    expect(outcome.state.iteration).toBe(2);
    expect(storage.loadConfig('test-run').maxRounds).toBe(2);
  });
});
