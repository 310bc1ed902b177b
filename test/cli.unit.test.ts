import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { main } from '../src/cli/evolver';
import { ConfigError, EvolverError, InvariantViolationError } from '../src/errors';
import { weightsFromVector } from '../src/engine/scoring';
import { FileStorage } from '../src/state/storage';

const argv = (...args: string[]) => ['node', 'idea-evolver', ...args];

describe('idea-evolver CLI', () => {
  let dir: string;
  let printed: string[];

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'idea-evolver-cli-'));
    printed = [];
    vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      printed.push(args.map(String).join(' '));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  async function mockRun(): Promise<string> {
    await main(
      argv('run', 'Tools for bakeries', '--max-rounds', '1', '--population', '4', '--elite', '2', '--seed', '3', '--out', dir)
    );
    const [run] = new FileStorage(dir).listRuns();
    return run.runId;
  }

  it('runs in mock mode and lists the finished run', async () => {
    const runId = await mockRun();
    const final = new FileStorage(dir).loadFinal(runId);
    const score = final?.best.overallScore.toFixed(2);
    expect(printed).toContain(`Best: Mock Idea 3 (gen 0) [${score}]`);

    printed = [];
    await main(argv('list', '--out', dir));
    expect(printed[0]).toBe(`Runs in ${dir}:`);
    expect(printed[3]).toBe(`${runId.padEnd(30)} ${'complete'.padEnd(12)} ${score}`);
  });

  it('validates and shows a finished run', async () => {
    const runId = await mockRun();

    printed = [];
    await main(argv('validate', runId, '--out', dir));
    expect(printed[printed.length - 1]).toBe('Invariants: OK');

    printed = [];
    await main(argv('show', runId, '--format', 'md', '--out', dir));
    expect(printed[0].split('\n')[0]).toBe('# Best Idea: Mock Idea 3 (gen 0)');
  });

  it('fails validation when the state breaks an invariant', async () => {
    const runId = await mockRun();
    const storage = new FileStorage(dir);
    const state = storage.loadState(runId);
    state.ideas[0].parents = ['someone'];
    storage.saveState(state);

    await expect(main(argv('validate', runId, '--out', dir))).rejects.toThrow(InvariantViolationError);
  });

  function writeProfile(derived: boolean): string {
    const file = path.join(dir, 'profile.json');
    const profile = {
      version: 1,
      createdAt: '2026-03-01T00:00:00.000Z',
      sourceRun: 'earlier-run',
      stats: { comparisons: 1, ideasRated: 2 },
      preferences: { comparisons: [{ ideaA: 'a', ideaB: 'b', winner: 'a' }], eloRatings: { a: 1016, b: 984 } },
      ...(derived ? {
        derived: {
          criterionWeights: weightsFromVector([1, 0, 0, 0, 0, 0, 0, 0]),
          fit: { method: 'pairwise-multiplicative-weights', comparisonsUsed: 1, holdoutAccuracy: null },
          summary: ['Prioritizes feasibility and speedToValue over other criteria.', 'De-emphasizes clarity and risk.']
        }
      } : {})
    };
    fs.writeFileSync(file, JSON.stringify(profile), 'utf-8');
    return file;
  }

  it('scores a run with the fitted weights of an exported profile', async () => {
    const file = writeProfile(true);
    await main(
      argv('run', 'Tools for bakeries', '--max-rounds', '1', '--population', '4', '--elite', '2', '--weights-from', file, '--out', dir)
    );

    const storage = new FileStorage(dir);
    const [{ runId }] = storage.listRuns();
    expect(storage.loadConfig(runId).scoringWeights).toEqual(weightsFromVector([1, 0, 0, 0, 0, 0, 0, 0]));

    // Only feasibility counts, so each overall score is the feasibility score
    const active = storage.loadState(runId).ideas.filter(i => i.status === 'active');
    expect(active).toHaveLength(4);
    for (const idea of active) expect(idea.overallScore).toBe(idea.scores.feasibility);
    expect(printed).toContain('Best: Mock Idea 3 (gen 0) [7.90]');
  });

  it('refuses a profile without fitted weights', async () => {
    const file = writeProfile(false);
    await expect(main(argv('run', 'p', '--weights-from', file, '--out', dir))).rejects.toThrow(ConfigError);
    expect(new FileStorage(dir).listRuns()).toEqual([]);
  });

  it('rejects a non-numeric option', async () => {
    await expect(main(argv('run', 'p', '--max-rounds', 'lots', '--out', dir))).rejects.toThrow(
      new EvolverError('BAD_OPTION', '--max-rounds must be an integer (got lots)')
    );
  });
});
