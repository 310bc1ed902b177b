import OpenAI from 'openai';
import { CFG } from '../config';
import { ConfigError } from '../errors';
import { createLogger } from '../util/logger';

const logger = createLogger('OpenAI');

let client: OpenAI | null = null;

// Constructed on first use so mock runs never need a key
export function getOpenAI(): OpenAI {
  if (!client) {
    if (!CFG.OPENAI_API_KEY) {
      throw new ConfigError('OPENAI_API_KEY is not set (required for --mode openai)');
    }
    client = new OpenAI({
      apiKey: CFG.OPENAI_API_KEY,
      timeout: CFG.TIMEOUT_MS
    });
  }
  return client;
}

// Rate limiting state
let lastRequestTime = 0;

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  requests: number;
}

const usage: TokenUsage = { inputTokens: 0, outputTokens: 0, requests: 0 };

export function getTokenUsage(): TokenUsage {
  return { ...usage };
}

function errorStatus(error: unknown): number | undefined {
  return error instanceof OpenAI.APIError ? error.status : undefined;
}

// Exponential backoff with jitter for 429/5xx. Transport only: a response that
// arrives but cannot be used is never retried here.
async function withRetryAndBackoff<T>(
  operation: () => Promise<T>,
  context: string = 'operation'
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      // Rate limiting: ensure minimum time between requests
      const timeSinceLastRequest = Date.now() - lastRequestTime;
      if (timeSinceLastRequest < CFG.REQUEST_THROTTLE_MS) {
        await new Promise(resolve => setTimeout(resolve, CFG.REQUEST_THROTTLE_MS - timeSinceLastRequest));
      }
      lastRequestTime = Date.now();

      const result = await operation();
      if (attempt > 0) {
        logger.info(`${context} succeeded after ${attempt} retries`);
      }
      return result;
    } catch (error) {
      const status = errorStatus(error);
      const isRetryable = status === 429 || (status !== undefined && status >= 500);

      if (!isRetryable || attempt >= CFG.MAX_RETRIES) {
        logger.error(`${context} failed after ${attempt} retries`, {
          status,
          message: error instanceof Error ? error.message : String(error)
        });
        throw error;
      }

      const baseDelay = CFG.BACKOFF_BASE_MS * Math.pow(2, attempt);
      const jitter = Math.random() * 0.3 * baseDelay; // 30% jitter
      const delay = Math.min(baseDelay + jitter, CFG.BACKOFF_MAX_MS);

      logger.warn(`${context} attempt ${attempt + 1} failed (${status}), retrying in ${delay.toFixed(0)}ms...`);
      await new Promise(resolve => setTimeout(resolve, delay));
    }
  }
}

export async function createChatCompletion(
  params: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming
): Promise<OpenAI.Chat.Completions.ChatCompletion> {
  return withRetryAndBackoff(async () => {
    const result = await getOpenAI().chat.completions.create(params);

    if (result.usage) {
      usage.inputTokens += result.usage.prompt_tokens;
      usage.outputTokens += result.usage.completion_tokens;
      usage.requests += 1;
      logger.debug('Tokens', {
        input: result.usage.prompt_tokens,
        output: result.usage.completion_tokens,
        total: result.usage.total_tokens
      });
    }

    return result;
  }, `chat completion (${params.model})`);
}
