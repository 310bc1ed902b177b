import { PortableProfileSchema } from '../schemas/preferences';
import { ConfigError, ProfileFormatError } from '../errors';
import { CRITERIA } from '../engine/scoring';
import { createLogger } from '../util/logger';
import { inferRiskMode } from './riskMode';
import { fitCriterionWeights } from './weightFit';
import type { PreferencePair } from './weightFit';
import type { DerivedProfile, Idea, PopulationState, PortableProfile, Preferences, Scores, ScoringWeights } from '../types';

const logger = createLogger('Profile');

export const PROFILE_VERSION = 1;

/** Two fixed sentences: the top two weights, then the bottom two from the lowest up. */
export function summarizeWeights(weights: ScoringWeights): [string, string] {
  const ranked = [...CRITERIA].sort((a, b) => weights[b] - weights[a]);
  const [top1 = 'unknown', top2 = 'unknown'] = ranked;
  const [bottom1 = 'unknown', bottom2 = 'unknown'] = [...ranked].reverse();
  return [
    `Prioritizes ${top1} and ${top2} over other criteria.`,
    `De-emphasizes ${bottom1} and ${bottom2} relative to other criteria.`
  ];
}

function scoresById(ideas: readonly Idea[]): Map<string, Scores> {
  return new Map(ideas.map((i): [string, Scores] => [i.id, i.scores]));
}

/** Winner/loser pairs whose both sides have known scores. */
export function preferencePairs(preferences: Preferences, known: ReadonlyMap<string, Scores>): PreferencePair[] {
  const pairs: PreferencePair[] = [];
  for (const { ideaA, ideaB, winner } of preferences.comparisons) {
    const loser = winner === ideaA ? ideaB : winner === ideaB ? ideaA : null;
    if (loser !== null && known.has(winner) && known.has(loser)) {
      pairs.push([winner, loser]);
    }
  }
  return pairs;
}

export function derivePreferenceProfile(preferences: Preferences, ideas: readonly Idea[]): DerivedProfile | null {
  if (preferences.comparisons.length === 0) return null;

  const known = scoresById(ideas);
  const pairs = preferencePairs(preferences, known);
  if (pairs.length === 0) return null;

  const riskMode = inferRiskMode(ideas);
  const { weights, holdoutAccuracy } = fitCriterionWeights(pairs, known, riskMode);
  logger.debug('Fitted criterion weights', { riskMode, pairs: pairs.length, holdoutAccuracy });

  return {
    criterionWeights: weights,
    fit: {
      method: 'pairwise-multiplicative-weights',
      comparisonsUsed: pairs.length,
      holdoutAccuracy
    },
    summary: summarizeWeights(weights)
  };
}

export function buildPortableProfile(
  runId: string,
  preferences: Preferences,
  state: PopulationState | null,
  now: Date = new Date()
): PortableProfile {
  const profile: PortableProfile = {
    version: PROFILE_VERSION,
    createdAt: now.toISOString(),
    sourceRun: runId,
    stats: {
      comparisons: preferences.comparisons.length,
      ideasRated: Object.keys(preferences.eloRatings).length
    },
    preferences
  };

  const derived = state ? derivePreferenceProfile(preferences, state.ideas) : null;
  if (derived) profile.derived = derived;
  return profile;
}

/** Validates an exported profile. */
export function parsePortableProfile(data: unknown): PortableProfile {
  if (typeof data !== 'object' || data === null || !('version' in data)) {
    throw new ProfileFormatError('Invalid profile: missing version');
  }
  if (data.version !== PROFILE_VERSION) {
    throw new ProfileFormatError(`Unsupported profile version: ${String(data.version)}`);
  }

  const parsed = PortableProfileSchema.safeParse(data);
  if (!parsed.success) {
    throw new ProfileFormatError(
      `Invalid profile: ${parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`
    );
  }
  return parsed.data;
}

/** The fitted weights of a profile, used as a new run's scoring weights. */
export function profileWeights(profile: PortableProfile): ScoringWeights {
  if (!profile.derived) {
    throw new ConfigError(`Profile from ${profile.sourceRun} has no derived weights; export it from a run with state`);
  }
  return profile.derived.criterionWeights;
}

export interface ProfileSummary {
  runId: string;
  comparisons: number;
  ideasRated: number;
  ranking: Array<{ id: string; title: string; elo: number }>;
  derived: DerivedProfile | null;
}

/** What `profile show` prints for a run. */
export function profileShow(runId: string, preferences: Preferences, state: PopulationState | null): ProfileSummary {
  const titles = new Map(state?.ideas.map((i): [string, string] => [i.id, i.title]) ?? []);
  const ranking = Object.entries(preferences.eloRatings)
    .sort(([, a], [, b]) => b - a)
    .map(([id, elo]) => ({ id, title: titles.get(id) ?? 'Unknown', elo }));

  return {
    runId,
    comparisons: preferences.comparisons.length,
    ideasRated: Object.keys(preferences.eloRatings).length,
    ranking,
    derived: state ? derivePreferenceProfile(preferences, state.ideas) : null
  };
}
