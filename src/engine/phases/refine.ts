import { parseRefinement } from '../parse';
import { rankByScore } from '../selection';
import { createLogger } from '../../util/logger';
import { cloneState, emitEvent } from './phase';
import type { Phase } from './phase';
import type { Idea } from '../../types';

const logger = createLogger('Refine');

/** Asks for an improved child of each of the top-K judged ideas. Parents stay active. */
export const refinePhase: Phase = {
  name: 'refine',

  async run(input, ctx) {
    const state = cloneState(input);
    const candidates = rankByScore(state.ideas.filter(i => i.status === 'active' && i.judgeNotes !== null));
    const toRefine = candidates.slice(0, ctx.config.refineTopK);

    if (toRefine.length === 0) {
      logger.debug('No judged ideas to refine');
      return state;
    }

    const refined: Idea[] = [];
    for (const parent of toRefine) {
      const output = await ctx.llm.generate({
        kind: 'refine',
        id: parent.id,
        title: parent.title,
        summary: parent.summary,
        facets: parent.facets,
        judgeNotes: parent.judgeNotes ?? ''
      });
      refined.push(parseRefinement(output, parent, state.iteration));
    }
    state.ideas.push(...refined);

    logger.info(`Round ${state.iteration}: refined ${refined.length} ideas`);
    emitEvent(ctx, state, 'refined', { count: refined.length });
    return state;
  }
};
