import { applyCriticPatches } from '../parse';
import { overallScore } from '../scoring';
import { createLogger } from '../../util/logger';
import { cloneState, emitEvent } from './phase';
import type { Phase } from './phase';

const logger = createLogger('Critic');

/**
 * Scores every unscored active idea in one batch, then recomputes the overall
 * score of all active ideas from the run's weights.
 */
export const criticPhase: Phase = {
  name: 'critic',

  async run(input, ctx) {
    const state = cloneState(input);
    const unscored = state.ideas.filter(i => i.status === 'active' && i.overallScore === null);

    if (unscored.length === 0) {
      logger.debug('Nothing to score');
      return state;
    }

    const output = await ctx.llm.generate({
      kind: 'critic',
      ideas: unscored.map(({ id, title, summary }) => ({ id, title, summary }))
    });
    const applied = applyCriticPatches(unscored, output);
    if (applied < unscored.length) {
      logger.warn(`Critic returned ${applied} patches for ${unscored.length} ideas`);
    }

    // Weights win over any overall score the model suggested
    for (const idea of state.ideas) {
      if (idea.status === 'active') {
        idea.overallScore = overallScore(idea.scores, ctx.config.scoringWeights);
      }
    }

    logger.info(`Round ${state.iteration}: scored ${unscored.length} ideas`);
    emitEvent(ctx, state, 'scored', { count: unscored.length });
    return state;
  }
};
