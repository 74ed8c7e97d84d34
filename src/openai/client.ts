import OpenAI from 'openai';
import type { AppConfig } from '../config';
import { ConfigurationError, ModelServiceError } from '../errors';
import { SYSTEM_PROMPT } from '../prompts/system';
import type { GenerateRequest, TextGenerator } from '../types';
import { createLogger } from '../util/logger';

const logger = createLogger('OpenAI');

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  requests: number;
}

export interface OpenAITextGeneratorOptions {
  apiKey?: string;
  timeoutMs?: number;
  temperature?: number;
  system?: string;
  /** Pre-built SDK client; skips the API key check. */
  client?: OpenAI;
}

const TRANSIENT_STATUSES = new Set([408, 409, 429]);

export function toServiceError(error: unknown): ModelServiceError {
  if (error instanceof OpenAI.APIError) {
    const status = error.status;
    // No status means the request never got a response (connection reset, timeout)
    const transient = status === undefined || TRANSIENT_STATUSES.has(status) || status >= 500;
    const label = status === undefined ? 'no response' : `status ${status}`;
    return new ModelServiceError(`OpenAI request failed (${label}): ${error.message}`, status, transient, { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ModelServiceError(`OpenAI request failed: ${message}`, undefined, true, { cause: error });
}

/**
 * Chat-completions implementation of the pipeline's "generate text from prompt" capability.
 * The SDK's own retries are off; each agent owns its retry envelope.
 */
export class OpenAITextGenerator implements TextGenerator {
  private readonly client: OpenAI;
  private readonly temperature: number;
  private readonly system: string;
  private usage: TokenUsage = { inputTokens: 0, outputTokens: 0, requests: 0 };

  constructor(options: OpenAITextGeneratorOptions = {}) {
    if (!options.client && !options.apiKey) {
      throw new ConfigurationError('OPENAI_API_KEY is not set. Add it to your environment or .env file.');
    }
    this.client = options.client ?? new OpenAI({
      apiKey: options.apiKey,
      timeout: options.timeoutMs ?? 30000,
      maxRetries: 0
    });
    this.temperature = options.temperature ?? 0.7;
    this.system = options.system ?? SYSTEM_PROMPT;
  }

  async generate({ prompt, model }: GenerateRequest): Promise<string | null> {
    let completion: OpenAI.Chat.Completions.ChatCompletion;
    try {
      completion = await this.client.chat.completions.create({
        model,
        temperature: this.temperature,
        messages: [
          { role: 'system', content: this.system },
          { role: 'user', content: prompt }
        ],
        stream: false
      });
    } catch (error) {
      throw toServiceError(error);
    }

    this.usage.requests += 1;
    if (completion.usage) {
      this.usage.inputTokens += completion.usage.prompt_tokens;
      this.usage.outputTokens += completion.usage.completion_tokens;
      logger.debug(`Tokens - Input: ${completion.usage.prompt_tokens}, Output: ${completion.usage.completion_tokens}, Total: ${completion.usage.total_tokens}`);
    }

    return completion.choices[0]?.message?.content ?? null;
  }

  getUsage(): TokenUsage {
    return { ...this.usage };
  }

  resetUsage(): void {
    this.usage = { inputTokens: 0, outputTokens: 0, requests: 0 };
  }
}

export function createTextGenerator(config: AppConfig): OpenAITextGenerator {
  return new OpenAITextGenerator({
    apiKey: config.openaiApiKey,
    timeoutMs: config.requestTimeoutMs,
    temperature: config.temperature
  });
}
