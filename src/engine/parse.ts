import { randomUUID } from 'node:crypto';
import type { z } from 'zod';
import { CriticOutputSchema, GeneratorOutputSchema, RefinerOutputSchema } from '../schemas/llm';
import type { RefinerOutput } from '../schemas/llm';
import { MalformedOutputError } from '../errors';
import { CRITERIA, defaultScores } from './scoring';
import type { Facets, Idea } from '../types';

function emptyFacets(): Facets {
  return { audience: '', jtbd: '', differentiator: '', monetization: '', distribution: '', risks: '' };
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map(i => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ');
}

function facetsFrom(raw: Partial<Facets> | undefined, fallback: Facets = emptyFacets()): Facets {
  return {
    audience: raw?.audience ?? fallback.audience,
    jtbd: raw?.jtbd ?? fallback.jtbd,
    differentiator: raw?.differentiator ?? fallback.differentiator,
    monetization: raw?.monetization ?? fallback.monetization,
    distribution: raw?.distribution ?? fallback.distribution,
    risks: raw?.risks ?? fallback.risks
  };
}

/** `{ ideas: [...] }` into fresh generated ideas of round `gen`. */
export function parseGeneratedIdeas(output: unknown, gen: number): Idea[] {
  const parsed = GeneratorOutputSchema.safeParse(output);
  if (!parsed.success) {
    throw new MalformedOutputError(`Generator output is missing an 'ideas' array (${describeIssues(parsed.error)})`);
  }

  return parsed.data.ideas.map(raw => ({
    id: randomUUID(),
    gen,
    origin: 'generated' as const,
    parents: [],
    title: raw.title ?? 'Untitled',
    summary: raw.summary ?? '',
    facets: facetsFrom(raw.facets),
    scores: defaultScores(),
    overallScore: null,
    judgeNotes: null,
    status: 'active' as const
  }));
}

/**
 * Applies `{ patches: [...] }` to `ideas` in place.
 * Patches for unknown ids are dropped; returns the number applied.
 */
export function applyCriticPatches(ideas: Idea[], output: unknown): number {
  const parsed = CriticOutputSchema.safeParse(output);
  if (!parsed.success) {
    throw new MalformedOutputError(`Critic output is malformed (${describeIssues(parsed.error)})`);
  }

  const byId = new Map(ideas.map((idea): [string, Idea] => [idea.id, idea]));
  let applied = 0;

  for (const patch of parsed.data.patches) {
    const idea = byId.get(patch.id);
    if (!idea) continue;

    const scores = defaultScores();
    for (const criterion of CRITERIA) {
      scores[criterion] = patch.scores?.[criterion] ?? 0;
    }
    idea.scores = scores;
    if (patch.overallScore !== undefined) idea.overallScore = patch.overallScore;
    if (patch.judgeNotes !== undefined) idea.judgeNotes = patch.judgeNotes;
    applied++;
  }

  return applied;
}

/** `{ patch: {...} }` into a refined child of `parent`; absent fields are inherited. */
export function parseRefinement(output: unknown, parent: Idea, gen: number): Idea {
  const parsed = RefinerOutputSchema.safeParse(output);
  if (!parsed.success) {
    throw new MalformedOutputError(
      `Refiner output for ${parent.id} is missing a 'patch' object (${describeIssues(parsed.error)})`
    );
  }
  const patch: RefinerOutput['patch'] = parsed.data.patch;

  return {
    id: randomUUID(),
    gen,
    origin: 'refined',
    parents: [parent.id],
    title: patch.title ?? parent.title,
    summary: patch.summary ?? parent.summary,
    facets: facetsFrom(patch.facets, parent.facets),
    scores: defaultScores(),
    overallScore: null,
    judgeNotes: null,
    status: 'active'
  };
}
