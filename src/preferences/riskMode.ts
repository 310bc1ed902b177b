import { CRITERIA } from '../engine/scoring';
import type { Idea, RiskMode, Scores } from '../types';

const MIN_SAMPLES = 3;
const EPSILON = 1e-6;

export function unweightedMean(scores: Scores, riskMode: RiskMode): number {
  let sum = 0;
  for (const c of CRITERIA) {
    sum += c === 'risk' && riskMode === 'invert' ? 10 - scores.risk : scores[c];
  }
  return sum / CRITERIA.length;
}

/**
 * Guesses from stored overall scores whether risk was inverted when they were
 * computed. Needs at least three scored ideas and a clear win for inversion;
 * otherwise risk is treated as a benefit.
 */
export function inferRiskMode(ideas: readonly Idea[]): RiskMode {
  let errBenefit = 0;
  let errInvert = 0;
  let n = 0;

  for (const idea of ideas) {
    if (idea.overallScore === null) continue;
    errBenefit += Math.abs(unweightedMean(idea.scores, 'as_benefit') - idea.overallScore);
    errInvert += Math.abs(unweightedMean(idea.scores, 'invert') - idea.overallScore);
    n++;
  }

  return n >= MIN_SAMPLES && errInvert + EPSILON < errBenefit ? 'invert' : 'as_benefit';
}
