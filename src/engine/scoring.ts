import { DivideByZeroError } from '../errors';
import type { Criterion, Scores, ScoringWeights } from '../types';

export const CRITERIA: readonly Criterion[] = [
  'feasibility',
  'speedToValue',
  'differentiation',
  'marketSize',
  'distribution',
  'moats',
  'risk',
  'clarity'
];

export function defaultScores(): Scores {
  return {
    feasibility: 0,
    speedToValue: 0,
    differentiation: 0,
    marketSize: 0,
    distribution: 0,
    moats: 0,
    risk: 0,
    clarity: 0
  };
}

export function defaultWeights(): ScoringWeights {
  return {
    feasibility: 1,
    speedToValue: 1,
    differentiation: 1,
    marketSize: 1,
    distribution: 1,
    moats: 1,
    risk: 1,
    clarity: 1
  };
}

/**
 * Weighted mean over the eight criteria. Risk is inverted: a raw risk of 2 contributes 8.
 */
export function overallScore(scores: Scores, weights: ScoringWeights): number {
  let weightedSum = 0;
  let totalWeight = 0;
  for (const criterion of CRITERIA) {
    const value = criterion === 'risk' ? 10 - scores.risk : scores[criterion];
    weightedSum += value * weights[criterion];
    totalWeight += weights[criterion];
  }
  if (totalWeight === 0) {
    throw new DivideByZeroError();
  }
  return weightedSum / totalWeight;
}

export function scoresToVector(scores: Scores | ScoringWeights): number[] {
  return CRITERIA.map(c => scores[c]);
}

export function weightsFromVector(vector: readonly number[]): ScoringWeights {
  const w = defaultWeights();
  CRITERIA.forEach((c, i) => {
    w[c] = vector[i] ?? 0;
  });
  return w;
}
