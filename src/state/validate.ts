import { EvolverError, RunNotFoundError } from '../errors';
import { CRITERIA } from '../engine/scoring';
import type { Storage } from './storage';
import type { PopulationState } from '../types';

/** Parent-cardinality and scoring invariants. Reports, never repairs. */
export function validateStateInvariants(state: PopulationState): string[] {
  const violations: string[] = [];

  for (const idea of state.ideas) {
    const hasParents = idea.parents.length > 0;
    if (idea.origin === 'generated' && hasParents) {
      violations.push(`Idea ${idea.id} (generated) has parents`);
    } else if (idea.origin !== 'generated' && !hasParents) {
      violations.push(`Idea ${idea.id} (${idea.origin}) has no parents`);
    }

    if (idea.status === 'active') {
      if (!CRITERIA.every(c => Number.isFinite(idea.scores[c]))) {
        violations.push(`Idea ${idea.id} (active) has missing/invalid scores`);
      }
      if (idea.overallScore === null || !Number.isFinite(idea.overallScore)) {
        violations.push(`Idea ${idea.id} (active) has missing/invalid overall score`);
      }
    }
  }

  return violations;
}

export interface RunValidation {
  runId: string;
  /** One status line per artifact, in check order. */
  checks: string[];
  errors: string[];
}

const truncate = (text: string, max: number) => (text.length > max ? `${text.slice(0, max)}...` : text);

function attempt<T>(errors: string[], load: () => T): T | undefined {
  try {
    return load();
  } catch (error) {
    if (!(error instanceof EvolverError)) throw error;
    errors.push(error.message);
    return undefined;
  }
}

/** Loads every artifact of a run and checks the state invariants. */
export function validateRun(storage: Storage, runId: string): RunValidation {
  if (!storage.runExists(runId)) {
    throw new RunNotFoundError(runId);
  }

  const checks: string[] = [];
  const errors: string[] = [];

  const config = attempt(errors, () => storage.loadConfig(runId));
  if (config) checks.push(`Config: OK (prompt: ${truncate(config.prompt, 30)})`);

  const state = attempt(errors, () => storage.loadState(runId));
  if (state) {
    checks.push(`State: OK (iteration: ${state.iteration}, ideas: ${state.ideas.length})`);
    errors.push(...validateStateInvariants(state));
  }

  const events = attempt(errors, () => storage.loadEvents(runId));
  if (events) checks.push(`History: OK (${events.length} events)`);

  const final = attempt(errors, () => storage.loadFinal(runId));
  if (final) checks.push(`Final: OK (best: ${final.best.title})`);
  else if (final === null) checks.push('Final: NOT YET (run in progress)');

  return { runId, checks, errors };
}
