import { CRITERIA, weightsFromVector } from '../engine/scoring';
import { seededRandom, shuffle } from '../util/random';
import type { RiskMode, Scores, ScoringWeights } from '../types';

export interface FitOptions {
  holdoutFraction?: number;
  seed?: number;
  learningRate?: number;
}

export interface WeightFit {
  weights: ScoringWeights;
  /** Share of held-out pairs ranked correctly; null when nothing was held out. */
  holdoutAccuracy: number | null;
}

/** A decided comparison as (winner id, loser id). */
export type PreferencePair = [winner: string, loser: string];

const CLAMP_MIN = 0.1;
const CLAMP_MAX = 10;

export function scoresToFeatures(scores: Scores, riskMode: RiskMode): number[] {
  return CRITERIA.map(c => (c === 'risk' && riskMode === 'invert' ? 10 - scores.risk : scores[c]));
}

export function dot(w: readonly number[], f: readonly number[]): number {
  return w.reduce((sum, wi, i) => sum + wi * (f[i] ?? 0), 0);
}

export function normalize(w: number[]): number[] {
  const sum = w.reduce((a, b) => a + b, 0);
  return sum <= 0 ? w.map(() => 1 / w.length) : w.map(wi => wi / sum);
}

function featurePairs(
  pairs: readonly PreferencePair[],
  scoresById: ReadonlyMap<string, Scores>,
  riskMode: RiskMode
): Array<[number[], number[]]> {
  const out: Array<[number[], number[]]> = [];
  for (const [winnerId, loserId] of pairs) {
    const winner = scoresById.get(winnerId);
    const loser = scoresById.get(loserId);
    if (winner && loser) {
      out.push([scoresToFeatures(winner, riskMode), scoresToFeatures(loser, riskMode)]);
    }
  }
  return out;
}

function trainWeights(pairs: ReadonlyArray<[number[], number[]]>, learningRate: number): number[] {
  let w = CRITERIA.map(() => 1);
  for (const [fw, fl] of pairs) {
    w = normalize(
      w.map((wi, i) => Math.min(CLAMP_MAX, Math.max(CLAMP_MIN, wi * Math.exp(learningRate * (fw[i] - fl[i])))))
    );
  }
  return w;
}

export function pairwiseAccuracy(w: readonly number[], pairs: ReadonlyArray<[number[], number[]]>): number {
  if (pairs.length === 0) return 0;
  const correct = pairs.filter(([fw, fl]) => dot(w, fw) - dot(w, fl) >= 0).length;
  return correct / pairs.length;
}

/**
 * Multiplicative-weights fit of the eight criterion weights from
 * winner/loser pairs. The holdout split only produces the accuracy figure;
 * the returned weights are trained on every pair.
 */
export function fitCriterionWeights(
  pairs: readonly PreferencePair[],
  scoresById: ReadonlyMap<string, Scores>,
  riskMode: RiskMode,
  options: FitOptions = {}
): WeightFit {
  const { holdoutFraction = 0.2, seed = 1, learningRate = 0.05 } = options;

  const shuffled = shuffle(featurePairs(pairs, scoresById, riskMode), seededRandom(seed));
  const testCount = Math.min(shuffled.length, Math.round(shuffled.length * holdoutFraction));
  const test = shuffled.slice(0, testCount);
  const train = shuffled.slice(testCount);

  const holdoutAccuracy = test.length === 0 ? null : pairwiseAccuracy(trainWeights(train, learningRate), test);
  const weights = weightsFromVector(trainWeights(shuffled, learningRate));

  return { weights, holdoutAccuracy };
}
