import 'dotenv/config';
import { randomUUID } from 'node:crypto';
import { RunConfigSchema } from './schemas/run';
import { ConfigError } from './errors';
import { defaultWeights } from './engine/scoring';
import type { RunConfig } from './types';

export const CFG = {
  OPENAI_API_KEY: process.env.OPENAI_API_KEY || '',
  CHAT_MODEL: process.env.CHAT_MODEL || 'gpt-4o-mini',
  TIMEOUT_MS: Number(process.env.REQUEST_TIMEOUT_MS || 30000),
  MAX_RETRIES: Number(process.env.MAX_RETRIES || 3), // transport-level 429/5xx only

  // Rate limiting
  REQUEST_THROTTLE_MS: Number(process.env.REQUEST_THROTTLE_MS || 1000),
  BACKOFF_BASE_MS: Number(process.env.BACKOFF_BASE_MS || 2000),
  BACKOFF_MAX_MS: Number(process.env.BACKOFF_MAX_MS || 60000),

  // Run artifacts
  RUNS_DIR: process.env.RUNS_DIR || 'runs',

  LOG_LEVEL: process.env.LOG_LEVEL || 'info'
};

// Defaults for a fresh run
export const RUN_DEFAULTS = {
  mode: 'mock',
  maxRounds: 6,
  populationSize: 12,
  eliteCount: 4,
  scoreThreshold: 8.7,
  stagnationPatience: 2,
  refineTopK: 2
} as const;

/** Sortable by creation time: `20261018T153012Z-1a2b3c4d`. */
export function newRunId(now: Date = new Date()): string {
  const stamp = now.toISOString().replace(/[-:]/g, '').replace(/\.\d{3}/, '');
  return `${stamp}-${randomUUID().slice(0, 8)}`;
}

export type RunConfigOverrides = Partial<Omit<RunConfig, 'prompt'>> & { prompt: string };

export function createRunConfig(overrides: RunConfigOverrides): RunConfig {
  const parsed = RunConfigSchema.safeParse({
    runId: overrides.runId ?? newRunId(),
    prompt: overrides.prompt,
    mode: overrides.mode ?? RUN_DEFAULTS.mode,
    maxRounds: overrides.maxRounds ?? RUN_DEFAULTS.maxRounds,
    populationSize: overrides.populationSize ?? RUN_DEFAULTS.populationSize,
    eliteCount: overrides.eliteCount ?? RUN_DEFAULTS.eliteCount,
    scoreThreshold: overrides.scoreThreshold ?? RUN_DEFAULTS.scoreThreshold,
    stagnationPatience: overrides.stagnationPatience ?? RUN_DEFAULTS.stagnationPatience,
    refineTopK: overrides.refineTopK ?? RUN_DEFAULTS.refineTopK,
    scoringWeights: overrides.scoringWeights ?? defaultWeights(),
    outputDir: overrides.outputDir ?? CFG.RUNS_DIR,
    createdAt: overrides.createdAt ?? new Date().toISOString()
  });

  if (!parsed.success) {
    throw new ConfigError(
      `Invalid run configuration: ${parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`
    );
  }
  return parsed.data;
}
