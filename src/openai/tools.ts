import type OpenAI from 'openai';
import type { LlmTaskKind } from '../types';

type Tool = OpenAI.Chat.Completions.ChatCompletionTool;

const facets = {
  type: 'object',
  properties: {
    audience: { type: 'string' },
    jtbd: { type: 'string' },
    differentiator: { type: 'string' },
    monetization: { type: 'string' },
    distribution: { type: 'string' },
    risks: { type: 'string' }
  },
  required: ['audience', 'jtbd', 'differentiator', 'monetization', 'distribution', 'risks']
};

const idea = {
  type: 'object',
  properties: {
    title: { type: 'string' },
    summary: { type: 'string' },
    facets
  },
  required: ['title', 'summary', 'facets']
};

const score = { type: 'number', minimum: 0, maximum: 10 };

export const TOOLS: Record<LlmTaskKind, Tool> = {
  generate: {
    type: 'function',
    function: {
      name: 'submit_ideas',
      description: 'Return the generated ideas',
      parameters: {
        type: 'object',
        properties: { ideas: { type: 'array', items: idea } },
        required: ['ideas']
      }
    }
  },
  critic: {
    type: 'function',
    function: {
      name: 'submit_scores',
      description: 'Return one score patch per idea',
      parameters: {
        type: 'object',
        properties: {
          patches: {
            type: 'array',
            items: {
              type: 'object',
              properties: {
                id: { type: 'string' },
                scores: {
                  type: 'object',
                  properties: {
                    feasibility: score,
                    speedToValue: score,
                    differentiation: score,
                    marketSize: score,
                    distribution: score,
                    moats: score,
                    risk: score,
                    clarity: score
                  },
                  required: ['feasibility', 'speedToValue', 'differentiation', 'marketSize', 'distribution', 'moats', 'risk', 'clarity']
                },
                overallScore: score,
                judgeNotes: { type: 'string' }
              },
              required: ['id', 'scores', 'judgeNotes']
            }
          }
        },
        required: ['patches']
      }
    }
  },
  refine: {
    type: 'function',
    function: {
      name: 'submit_refinement',
      description: 'Return the improved idea',
      parameters: {
        type: 'object',
        properties: {
          patch: {
            type: 'object',
            properties: {
              id: { type: 'string' },
              title: { type: 'string' },
              summary: { type: 'string' },
              facets,
              changes: { type: 'array', items: { type: 'string' } }
            },
            required: ['id', 'title', 'summary', 'facets', 'changes']
          }
        },
        required: ['patch']
      }
    }
  },
  merge: {
    type: 'function',
    function: {
      name: 'submit_merge',
      description: 'Return the merged idea',
      parameters: {
        type: 'object',
        properties: { idea },
        required: ['idea']
      }
    }
  },
  mutate: {
    type: 'function',
    function: {
      name: 'submit_mutation',
      description: 'Return the mutated idea',
      parameters: {
        type: 'object',
        properties: {
          mutationType: { type: 'string', enum: ['audience', 'monetization', 'distribution', 'differentiator', 'jtbd'] },
          idea
        },
        required: ['mutationType', 'idea']
      }
    }
  }
};
