import { z } from 'zod';
import { FacetsSchema, ScoresSchema } from './idea';

export const ScoringWeightsSchema = z
  .object({
    feasibility: z.number().nonnegative(),
    speedToValue: z.number().nonnegative(),
    differentiation: z.number().nonnegative(),
    marketSize: z.number().nonnegative(),
    distribution: z.number().nonnegative(),
    moats: z.number().nonnegative(),
    risk: z.number().nonnegative(),
    clarity: z.number().nonnegative()
  })
  .refine(w => Object.values(w).some(v => v > 0), { message: 'weights must not all be zero' });

export const LlmModeSchema = z.enum(['mock', 'openai']);

export const RunConfigSchema = z
  .object({
    runId: z.string().min(1),
    prompt: z.string().min(1),
    mode: LlmModeSchema,
    maxRounds: z.number().int().positive(),
    populationSize: z.number().int().positive(),
    eliteCount: z.number().int().nonnegative(),
    scoreThreshold: z.number(),
    stagnationPatience: z.number().int().positive(),
    refineTopK: z.number().int().nonnegative(),
    scoringWeights: ScoringWeightsSchema,
    outputDir: z.string().min(1),
    createdAt: z.string()
  })
  .refine(c => c.eliteCount <= c.populationSize, {
    message: 'eliteCount must not exceed populationSize',
    path: ['eliteCount']
  });

export const EventTypeSchema = z.enum(['generated', 'scored', 'selected', 'crossover', 'mutated', 'refined', 'stopped']);

export const RunEventSchema = z.object({
  ts: z.string(),
  iteration: z.number().int().nonnegative(),
  type: EventTypeSchema,
  payload: z.record(z.unknown())
});

export const RunnerUpSchema = z.object({
  ideaId: z.string(),
  title: z.string(),
  overallScore: z.number()
});

export const FinalResultSchema = z.object({
  runId: z.string(),
  best: z.object({
    ideaId: z.string(),
    title: z.string(),
    summary: z.string(),
    facets: FacetsSchema,
    scores: ScoresSchema,
    overallScore: z.number(),
    whyWon: z.array(z.string())
  }),
  runnersUp: z.array(RunnerUpSchema)
});
