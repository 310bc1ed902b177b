import { CFG } from '../config';
import { MalformedOutputError } from '../errors';
import { buildMessages } from '../engine/buildMessages';
import { createChatCompletion, getTokenUsage } from '../openai/client';
import { TOOLS } from '../openai/tools';
import { createLogger } from '../util/logger';
import type { LlmProvider } from './provider';
import type { LlmTask } from '../types';

const logger = createLogger('LLM');

/** Chat completions with one forced function tool per task kind. */
export class OpenAiLlmProvider implements LlmProvider {
  readonly name = 'openai';
  private model: string;

  constructor(model: string = CFG.CHAT_MODEL) {
    this.model = model;
  }

  async generate(task: LlmTask): Promise<unknown> {
    const tool = TOOLS[task.kind];
    const start = Date.now();

    const res = await createChatCompletion({
      model: this.model,
      messages: buildMessages(task),
      tools: [tool],
      tool_choice: { type: 'function', function: { name: tool.function.name } },
      temperature: task.kind === 'critic' ? 0.2 : 0.8
    });

    const tc = res.choices[0]?.message.tool_calls?.[0];
    if (!tc) {
      throw new MalformedOutputError(`Model returned no ${tool.function.name} call for ${task.kind}`);
    }

    let payload: unknown;
    try {
      payload = JSON.parse(tc.function.arguments);
    } catch (error) {
      throw new MalformedOutputError(`Tool arguments for ${task.kind} are not valid JSON`, {
        reason: error instanceof Error ? error.message : String(error)
      });
    }

    const usage = getTokenUsage();
    logger.debug(`${task.kind} done in ${Date.now() - start}ms`, {
      totalInputTokens: usage.inputTokens,
      totalOutputTokens: usage.outputTokens
    });
    return payload;
  }
}
