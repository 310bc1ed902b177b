import { parseGeneratedIdeas } from '../parse';
import { createLogger } from '../../util/logger';
import { cloneState, emitEvent } from './phase';
import type { Phase } from './phase';

const logger = createLogger('Generate');

/** Tops the active population back up to `populationSize`. */
export const generatePhase: Phase = {
  name: 'generate',

  async run(input, ctx) {
    const state = cloneState(input);
    const active = state.ideas.filter(i => i.status === 'active').length;
    const deficit = ctx.config.populationSize - active;

    if (deficit <= 0) {
      logger.debug(`Population full (${active}/${ctx.config.populationSize}), skipping`);
      return state;
    }

    const output = await ctx.llm.generate({ kind: 'generate', prompt: ctx.config.prompt, count: deficit });
    const ideas = parseGeneratedIdeas(output, state.iteration);
    state.ideas.push(...ideas);

    logger.info(`Round ${state.iteration}: generated ${ideas.length} ideas (requested ${deficit})`);
    emitEvent(ctx, state, 'generated', { count: ideas.length });
    return state;
  }
};
