import { createRunConfig } from '../src/config';
import { defaultScores } from '../src/engine/scoring';
import type { RunConfigOverrides } from '../src/config';
import type { Idea, RunConfig, Scores } from '../src/types';

export function makeScores(overrides: Partial<Scores> = {}): Scores {
  return { ...defaultScores(), ...overrides };
}

export function makeIdea(overrides: Partial<Idea> & { id: string }): Idea {
  return {
    gen: 1,
    origin: 'generated',
    parents: [],
    title: `Idea ${overrides.id}`,
    summary: '',
    facets: { audience: '', jtbd: '', differentiator: '', monetization: '', distribution: '', risks: '' },
    scores: defaultScores(),
    overallScore: null,
    judgeNotes: null,
    status: 'active',
    ...overrides
  };
}

export function makeConfig(overrides: Partial<RunConfigOverrides> = {}): RunConfig {
  return createRunConfig({
    prompt: 'Tools for independent bakeries',
    runId: 'test-run',
    createdAt: '2026-01-01T00:00:00.000Z',
    outputDir: 'runs',
    ...overrides
  });
}
