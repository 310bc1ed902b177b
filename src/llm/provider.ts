import { MockLlmProvider } from './mock';
import { OpenAiLlmProvider } from './openaiProvider';
import type { LlmMode, LlmTask } from '../types';

/**
 * One call shape for every task kind. Implementations return the raw JSON
 * value; parsing and validation happen in the phase that asked.
 */
export interface LlmProvider {
  readonly name: string;
  generate(task: LlmTask): Promise<unknown>;
}

export function createLlmProvider(mode: LlmMode): LlmProvider {
  switch (mode) {
    case 'mock':
      return new MockLlmProvider();
    case 'openai':
      return new OpenAiLlmProvider();
  }
}
