import { z } from 'zod';
import { ScoringWeightsSchema } from './run';

export const ComparisonSchema = z.object({
  ideaA: z.string(),
  ideaB: z.string(),
  winner: z.string()
});

export const PreferencesSchema = z.object({
  comparisons: z.array(ComparisonSchema),
  eloRatings: z.record(z.number())
});

export const DerivedProfileSchema = z.object({
  criterionWeights: ScoringWeightsSchema,
  fit: z.object({
    method: z.literal('pairwise-multiplicative-weights'),
    comparisonsUsed: z.number().int().nonnegative(),
    holdoutAccuracy: z.number().nullable()
  }),
  summary: z.tuple([z.string(), z.string()])
});

export const PortableProfileSchema = z.object({
  version: z.literal(1),
  createdAt: z.string(),
  sourceRun: z.string(),
  stats: z.object({
    comparisons: z.number().int().nonnegative(),
    ideasRated: z.number().int().nonnegative()
  }),
  preferences: PreferencesSchema,
  derived: DerivedProfileSchema.optional()
});
