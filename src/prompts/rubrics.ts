import type { Criterion } from '../types';

// Every criterion is scored 0-10. Risk is the only one where higher is worse.
export const RUBRICS: Record<Criterion, { question: string; guidance: string }> = {
  feasibility: { question: 'Can a small team build it?', guidance: '10 = buildable by 1-2 people in weeks with existing tools; 0 = needs research breakthroughs.' },
  speedToValue: { question: 'How fast does a user get value?', guidance: '10 = value in the first session; 0 = months of setup before any payoff.' },
  differentiation: { question: 'How different is it from what exists?', guidance: 'Name the closest alternative before scoring. 10 = no credible substitute.' },
  marketSize: { question: 'How many buyers have this problem?', guidance: 'Estimate reachable buyers, not the whole industry. 10 = millions of paying users.' },
  distribution: { question: 'Is there a clear channel to reach them?', guidance: '10 = an owned or cheap channel already exists; 0 = no known way to reach buyers.' },
  moats: { question: 'What stops a copycat?', guidance: 'Data, network effects, integrations, switching costs. 10 = hard to copy within a year.' },
  risk: { question: 'How likely is it to fail?', guidance: 'Technical, market, adoption and regulatory risk combined. 10 = very risky, 0 = safe bet.' },
  clarity: { question: 'Is the idea easy to explain?', guidance: '10 = one sentence a stranger understands; 0 = vague or self-contradictory.' }
};
