import { createLogger } from '../util/logger';
import { criticPhase } from './phases/critic';
import { composeFinalResult, finalPhase } from './phases/final';
import { generatePhase } from './phases/generate';
import { refinePhase } from './phases/refine';
import { selectPhase } from './phases/select';
import { bestActive } from './selection';
import type { Phase, PhaseContext } from './phases/phase';
import type { LlmProvider } from '../llm/provider';
import type { Storage } from '../state/storage';
import type { RandomSource } from '../util/random';
import type { FinalResult, PopulationState, RunConfig, RunStatus, StopReason } from '../types';

const logger = createLogger('Orchestrator');

export const ROUND_PIPELINE: readonly Phase[] = [generatePhase, criticPhase, selectPhase, refinePhase];

export function thresholdReached(bestScore: number | null, threshold: number): boolean {
  return bestScore !== null && bestScore >= threshold;
}

export function stagnationReached(counter: number, patience: number): boolean {
  return counter >= patience;
}

export function maxRoundsReached(iteration: number, maxRounds: number): boolean {
  return iteration >= maxRounds;
}

/** First matching reason in priority order, or null to keep going. */
export function evaluateStop(state: PopulationState, config: RunConfig): StopReason | null {
  if (thresholdReached(state.bestScore, config.scoreThreshold)) return 'threshold';
  if (stagnationReached(state.stagnationCounter, config.stagnationPatience)) return 'stagnation';
  if (maxRoundsReached(state.iteration, config.maxRounds)) return 'max_rounds';
  return null;
}

const STATUS_BY_REASON: Record<StopReason, RunStatus> = {
  threshold: 'stopped_by_threshold',
  stagnation: 'stopped_by_stagnation',
  max_rounds: 'stopped_by_max_rounds'
};

export interface OrchestratorDeps {
  llm: LlmProvider;
  storage: Storage;
  random?: RandomSource;
}

export interface RunOutcome {
  status: RunStatus;
  stopReason: StopReason;
  state: PopulationState;
  result: FinalResult;
}

export class Orchestrator {
  private ctx: PhaseContext;
  private state: PopulationState;
  private status: RunStatus = 'running';

  private constructor(ctx: PhaseContext, state: PopulationState) {
    this.ctx = ctx;
    this.state = state;
  }

  static create(config: RunConfig, deps: OrchestratorDeps): Orchestrator {
    deps.storage.initRun(config);
    logger.info(`New run ${config.runId}`, { mode: config.mode, llm: deps.llm.name });
    return new Orchestrator(
      { config, llm: deps.llm, storage: deps.storage, random: deps.random ?? Math.random },
      deps.storage.loadState(config.runId)
    );
  }

  /** Picks up a stored run where it left off; `maxRounds` may only be raised here. */
  static resume(runId: string, deps: OrchestratorDeps, maxRounds?: number): Orchestrator {
    let config = deps.storage.loadConfig(runId);
    if (maxRounds !== undefined && maxRounds !== config.maxRounds) {
      config = { ...config, maxRounds };
      deps.storage.saveConfig(config);
      logger.info(`Max rounds set to ${maxRounds}`);
    }
    const state = deps.storage.loadState(runId);
    logger.info(`Resuming run ${runId} at round ${state.iteration}`);
    return new Orchestrator(
      { config, llm: deps.llm, storage: deps.storage, random: deps.random ?? Math.random },
      state
    );
  }

  get runId(): string {
    return this.ctx.config.runId;
  }

  get currentStatus(): RunStatus {
    return this.status;
  }

  async run(): Promise<RunOutcome> {
    const { storage, config } = this.ctx;
    let stopReason: StopReason | null = null;

    while (stopReason === null) {
      this.state = { ...this.state, iteration: this.state.iteration + 1 };
      logger.info(`Round ${this.state.iteration}/${config.maxRounds}`);

      for (const phase of ROUND_PIPELINE) {
        this.state = await phase.run(this.state, this.ctx);
        storage.saveState(this.state);
      }

      stopReason = evaluateStop(this.state, config);
    }

    this.status = STATUS_BY_REASON[stopReason];

    // Ideas refined in the last round have not been scored yet
    this.state = await criticPhase.run(this.state, this.ctx);
    const best = bestActive(this.state.ideas);
    if (best) {
      this.state = { ...this.state, bestIdeaId: best.id, bestScore: best.overallScore };
    }
    storage.saveState(this.state);

    storage.appendEvent(this.state.runId, {
      ts: new Date().toISOString(),
      iteration: this.state.iteration,
      type: 'stopped',
      payload: { reason: stopReason, bestScore: this.state.bestScore, bestIdeaId: this.state.bestIdeaId }
    });
    logger.info(`Stopped: ${stopReason}`, { round: this.state.iteration, bestScore: this.state.bestScore });

    this.state = await finalPhase.run(this.state, this.ctx);
    storage.saveState(this.state);
    this.status = 'finalized';

    return { status: this.status, stopReason, state: this.state, result: composeFinalResult(this.state) };
  }
}
