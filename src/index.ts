export { CFG, RUN_DEFAULTS, createRunConfig, newRunId } from './config';
export type { RunConfigOverrides } from './config';
export * from './errors';
export type * from './types';

export { CRITERIA, defaultScores, defaultWeights, overallScore } from './engine/scoring';
export { rankByScore, selectIdeas, updateStagnation } from './engine/selection';
export { applyCriticPatches, parseGeneratedIdeas, parseRefinement } from './engine/parse';
export {
  Orchestrator,
  ROUND_PIPELINE,
  evaluateStop,
  maxRoundsReached,
  stagnationReached,
  thresholdReached
} from './engine/orchestrator';
export type { OrchestratorDeps, RunOutcome } from './engine/orchestrator';
export { generatePhase } from './engine/phases/generate';
export { criticPhase } from './engine/phases/critic';
export { selectPhase } from './engine/phases/select';
export { refinePhase } from './engine/phases/refine';
export { composeFinalResult, finalPhase } from './engine/phases/final';
export type { Phase, PhaseContext } from './engine/phases/phase';

export { createLlmProvider } from './llm/provider';
export type { LlmProvider } from './llm/provider';
export { MockLlmProvider } from './llm/mock';
export { OpenAiLlmProvider } from './llm/openaiProvider';

export { FileStorage, emptyState } from './state/storage';
export type { RunListing, Storage } from './state/storage';
export { validateRun, validateStateInvariants } from './state/validate';

export { updateElo, DEFAULT_ELO, ELO_K } from './preferences/elo';
export { pairKey, pairwiseLimit, selectNextPair } from './preferences/pairing';
export { eligibleIdeas, runTournament } from './preferences/tournament';
export type { PairPrompt, TournamentIO, TournamentResult } from './preferences/tournament';
export { inferRiskMode } from './preferences/riskMode';
export { fitCriterionWeights } from './preferences/weightFit';
export {
  buildPortableProfile,
  derivePreferenceProfile,
  parsePortableProfile,
  profileShow,
  summarizeWeights
} from './preferences/profile';

export { renderTree } from './report/tree';
export { renderFinalMarkdown } from './report/markdown';
export { seededRandom } from './util/random';
export type { RandomSource } from './util/random';
