import type { LlmProvider } from './provider';
import type { Facets, IdeaBrief, LlmTask } from '../types';

const clamp = (value: number, min: number, max: number) => Math.min(max, Math.max(min, value));

const MOCK_FACETS: Facets = {
  audience: 'Developers',
  jtbd: 'Automate repetitive tasks',
  differentiator: 'AI-powered automation',
  monetization: 'SaaS subscription',
  distribution: 'Developer communities',
  risks: 'Competition from incumbents'
};

/**
 * Deterministic stand-in for a real model. Output depends only on the task
 * and on how many generate calls came before it.
 */
export class MockLlmProvider implements LlmProvider {
  readonly name = 'mock';
  private genCounter = 0;

  async generate(task: LlmTask): Promise<unknown> {
    switch (task.kind) {
      case 'generate': {
        const gen = this.genCounter++;
        return { ideas: Array.from({ length: task.count }, (_, i) => mockIdea(i, gen)) };
      }
      case 'critic':
        return { patches: task.ideas.map((idea, idx) => mockScores(idea, idx)) };
      case 'refine':
        return {
          patch: {
            id: task.id,
            title: `${task.title} (refined)`,
            summary: `${task.summary} Improvements based on: ${task.judgeNotes}`,
            facets: task.facets,
            changes: ['Improved based on feedback']
          }
        };
      case 'merge': {
        const { ideaA, ideaB } = task;
        return {
          idea: {
            title: `${ideaA.title} + ${ideaB.title}`,
            summary: `Merged: ${ideaA.summary} and ${ideaB.summary}`,
            facets: {
              audience: ideaA.facets.audience,
              jtbd: ideaB.facets.jtbd,
              differentiator: `${ideaA.facets.differentiator} with ${ideaB.facets.differentiator}`,
              monetization: ideaA.facets.monetization,
              distribution: ideaB.facets.distribution,
              risks: `${ideaA.facets.risks} and ${ideaB.facets.risks}`
            }
          }
        };
      }
      case 'mutate': {
        const facets = { ...task.idea.facets };
        facets[task.mutationType] = `${facets[task.mutationType]} (mutated)`;
        return {
          mutationType: task.mutationType,
          idea: { title: `${task.idea.title} (mutated)`, summary: task.idea.summary, facets }
        };
      }
    }
  }
}

function mockIdea(idx: number, gen: number) {
  return {
    title: `Mock Idea ${idx} (gen ${gen})`,
    summary: `This is mock idea ${idx} generated in generation ${gen}`,
    facets: { ...MOCK_FACETS }
  };
}

// Later positions in a batch score higher and carry less risk.
function mockScores(idea: IdeaBrief, idx: number) {
  const base = 7 + idx * 0.3;
  return {
    id: idea.id,
    scores: {
      feasibility: Math.min(base, 10),
      speedToValue: clamp(base - 0.5, 0, 10),
      differentiation: Math.min(base + 0.2, 10),
      marketSize: clamp(base - 0.3, 0, 10),
      distribution: Math.min(base, 10),
      moats: clamp(base - 1, 0, 10),
      risk: clamp(5 - idx * 0.2, 1, 10),
      clarity: Math.min(base + 0.5, 10)
    },
    overallScore: Math.min(base, 10),
    judgeNotes: `Mock evaluation for idea ${idea.id}`
  };
}
