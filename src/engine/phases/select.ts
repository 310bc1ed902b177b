import { bestActive, selectIdeas, updateStagnation } from '../selection';
import { createLogger } from '../../util/logger';
import { cloneState, emitEvent } from './phase';
import type { Phase } from './phase';

const logger = createLogger('Select');

export const selectPhase: Phase = {
  name: 'select',

  async run(input, ctx) {
    const state = cloneState(input);
    const { eliteCount, populationSize } = ctx.config;
    const survivors = selectIdeas(state.ideas, eliteCount, populationSize, ctx.random);

    let archived = 0;
    for (const idea of state.ideas) {
      if (idea.status === 'active' && !survivors.has(idea.id)) {
        idea.status = 'archived';
        archived++;
      }
    }

    const previousBest = state.bestScore;
    const best = bestActive(state.ideas);
    if (best) {
      state.bestIdeaId = best.id;
      state.bestScore = best.overallScore;
    }
    state.stagnationCounter = updateStagnation(state.bestScore, previousBest, state.stagnationCounter);

    logger.info(`Round ${state.iteration}: kept ${survivors.size}, archived ${archived}`, {
      bestScore: state.bestScore,
      stagnation: state.stagnationCounter
    });
    emitEvent(ctx, state, 'selected', { selected: survivors.size, archived, bestScore: state.bestScore });
    return state;
  }
};
