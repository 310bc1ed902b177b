import { z } from 'zod';

export const CriterionSchema = z.enum([
  'feasibility',
  'speedToValue',
  'differentiation',
  'marketSize',
  'distribution',
  'moats',
  'risk',
  'clarity'
]);

export const ScoresSchema = z.object({
  feasibility: z.number(),
  speedToValue: z.number(),
  differentiation: z.number(),
  marketSize: z.number(),
  distribution: z.number(),
  moats: z.number(),
  risk: z.number(),
  clarity: z.number()
});

export const FacetsSchema = z.object({
  audience: z.string(),
  jtbd: z.string(),
  differentiator: z.string(),
  monetization: z.string(),
  distribution: z.string(),
  risks: z.string()
});

export const OriginSchema = z.enum(['generated', 'crossover', 'mutated', 'refined']);
export const IdeaStatusSchema = z.enum(['active', 'archived']);

export const IdeaSchema = z.object({
  id: z.string().min(1),
  gen: z.number().int().nonnegative(),
  origin: OriginSchema,
  parents: z.array(z.string()),
  title: z.string(),
  summary: z.string(),
  facets: FacetsSchema,
  scores: ScoresSchema,
  overallScore: z.number().nullable(),
  judgeNotes: z.string().nullable(),
  status: IdeaStatusSchema
});

export const PopulationStateSchema = z.object({
  runId: z.string().min(1),
  iteration: z.number().int().nonnegative(),
  ideas: z.array(IdeaSchema),
  bestIdeaId: z.string().nullable(),
  bestScore: z.number().nullable(),
  stagnationCounter: z.number().int().nonnegative()
});
