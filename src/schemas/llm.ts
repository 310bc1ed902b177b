import { z } from 'zod';

// Structural keys are required; leaf text falls back to placeholders.
const LooseFacetsSchema = z
  .object({
    audience: z.string().optional(),
    jtbd: z.string().optional(),
    differentiator: z.string().optional(),
    monetization: z.string().optional(),
    distribution: z.string().optional(),
    risks: z.string().optional()
  })
  .passthrough();

export const GeneratedIdeaSchema = z
  .object({
    title: z.string().optional(),
    summary: z.string().optional(),
    facets: LooseFacetsSchema.optional()
  })
  .passthrough();

export const GeneratorOutputSchema = z.object({
  ideas: z.array(GeneratedIdeaSchema)
});

const LooseScoresSchema = z
  .object({
    feasibility: z.number().optional(),
    speedToValue: z.number().optional(),
    differentiation: z.number().optional(),
    marketSize: z.number().optional(),
    distribution: z.number().optional(),
    moats: z.number().optional(),
    risk: z.number().optional(),
    clarity: z.number().optional()
  })
  .passthrough();

export const CriticPatchSchema = z
  .object({
    id: z.string(),
    scores: LooseScoresSchema.optional(),
    overallScore: z.number().optional(),
    judgeNotes: z.string().optional()
  })
  .passthrough();

export const CriticOutputSchema = z.object({
  patches: z.array(CriticPatchSchema)
});

export const RefinerOutputSchema = z.object({
  patch: z
    .object({
      id: z.string().optional(),
      title: z.string().optional(),
      summary: z.string().optional(),
      facets: LooseFacetsSchema.optional(),
      changes: z.array(z.string()).optional()
    })
    .passthrough()
});

export type GeneratedIdea = z.infer<typeof GeneratedIdeaSchema>;
export type CriticPatch = z.infer<typeof CriticPatchSchema>;
export type RefinerOutput = z.infer<typeof RefinerOutputSchema>;
