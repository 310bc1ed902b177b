import type { LlmProvider } from '../../llm/provider';
import type { Storage } from '../../state/storage';
import type { RandomSource } from '../../util/random';
import type { EventType, PopulationState, RunConfig } from '../../types';

/** Read-only collaborators shared by every phase of a run. */
export interface PhaseContext {
  config: RunConfig;
  llm: LlmProvider;
  storage: Storage;
  random: RandomSource;
}

/**
 * A phase receives its own copy of the state and returns the next one.
 * It never mutates the value it was given.
 */
export interface Phase {
  readonly name: string;
  run(state: PopulationState, ctx: PhaseContext): Promise<PopulationState>;
}

export function cloneState(state: PopulationState): PopulationState {
  return structuredClone(state);
}

export function emitEvent(
  ctx: PhaseContext,
  state: PopulationState,
  type: EventType,
  payload: Record<string, unknown>
) {
  ctx.storage.appendEvent(state.runId, {
    ts: new Date().toISOString(),
    iteration: state.iteration,
    type,
    payload
  });
}
