import { SYSTEM_PROMPTS } from '../prompts/system';
import { RUBRICS } from '../prompts/rubrics';
import type { LlmTask } from '../types';

export function buildMessages(task: LlmTask) {
  const { kind, ...payload } = task;

  // Only the critic gets the rubric
  const guidance = kind === 'critic' ? RUBRICS : undefined;

  return [
    { role: 'system' as const, content: SYSTEM_PROMPTS[kind] },
    { role: 'user' as const, content: JSON.stringify({ task: kind, ...payload, guidance }) }
  ];
}
