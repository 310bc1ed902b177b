import { NoScoredIdeasError } from '../../errors';
import { rankByScore } from '../selection';
import { createLogger } from '../../util/logger';
import type { FinalResult, PopulationState } from '../../types';
import { cloneState } from './phase';
import type { Phase } from './phase';

const logger = createLogger('Final');

const MAX_RUNNERS_UP = 4;

export function composeFinalResult(state: PopulationState): FinalResult {
  const ranked = rankByScore(state.ideas.filter(i => i.status === 'active' && i.overallScore !== null));
  const [best, ...rest] = ranked;
  if (!best) {
    throw new NoScoredIdeasError(state.runId);
  }
  const bestScore = best.overallScore ?? 0;

  return {
    runId: state.runId,
    best: {
      ideaId: best.id,
      title: best.title,
      summary: best.summary,
      facets: best.facets,
      scores: best.scores,
      overallScore: bestScore,
      whyWon: [
        `Highest overall score: ${bestScore.toFixed(2)}`,
        `Feasibility: ${best.scores.feasibility.toFixed(1)}`,
        `Low risk: ${(10 - best.scores.risk).toFixed(1)}`
      ]
    },
    runnersUp: rest.slice(0, MAX_RUNNERS_UP).map(i => ({
      ideaId: i.id,
      title: i.title,
      overallScore: i.overallScore ?? 0
    }))
  };
}

/** Persists the final result; the state passes through unchanged. */
export const finalPhase: Phase = {
  name: 'final',

  async run(state, ctx) {
    const result = composeFinalResult(state);
    ctx.storage.saveFinal(result);
    logger.info(`Best idea: ${result.best.title}`, { id: result.best.ideaId, score: result.best.overallScore });
    return cloneState(state);
  }
};
