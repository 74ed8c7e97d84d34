import { z } from 'zod';
import { ConfigurationError } from './errors';
import { LOG_LEVELS, type LogLevel } from './util/logger';
import type { RetryPolicy } from './types';

export const PINNED_CHAT_MODEL = 'gpt-4o-mini-2024-07-18';

// Unset and blank variables both fall back to the default
const blank = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess(v => (typeof v === 'string' && v.trim() === '' ? undefined : v), schema);

const flag = (fallback: boolean) =>
  blank(z.enum(['true', 'false']).optional().transform(v => (v === undefined ? fallback : v === 'true')));

const optionalText = blank(z.string().trim().optional());

const EnvSchema = z.object({
  OPENAI_API_KEY: optionalText,
  CHAT_MODEL: blank(z.string().trim().default('gpt-4o-mini')), // cost optimization: default to mini
  PROFILER_MODEL: optionalText,
  SIMULATOR_MODEL: optionalText,
  ANALYZER_MODEL: optionalText,
  ADVISOR_MODEL: optionalText,
  PRODUCTION_MODE: flag(false),
  TEMPERATURE: blank(z.coerce.number().min(0).max(2).default(0.7)),
  REQUEST_TIMEOUT_MS: blank(z.coerce.number().int().positive().default(30000)),

  // Retry envelope around each agent call
  MAX_ATTEMPTS: blank(z.coerce.number().int().min(1).default(3)),
  BACKOFF_BASE_MS: blank(z.coerce.number().int().min(0).default(1000)),
  BACKOFF_MAX_MS: blank(z.coerce.number().int().min(0).default(10000)),
  BACKOFF_JITTER: blank(z.coerce.number().min(0).max(1).default(0)),

  PARALLEL_TIMELINES: flag(false),
  LOG_LEVEL: blank(z.enum(LOG_LEVELS).default('info')),
  RESULTS_DIR: blank(z.string().trim().default('results/outputs')),
  INPUT_FILE: blank(z.string().trim().default('decision_input.json'))
});

export interface AgentModels {
  profiler: string;
  simulator: string;
  analyzer: string;
  advisor: string;
}

export interface AppConfig {
  openaiApiKey?: string;
  productionMode: boolean;
  models: AgentModels;
  temperature: number;
  requestTimeoutMs: number;
  retry: RetryPolicy;
  parallelTimelines: boolean;
  logLevel: LogLevel;
  resultsDir: string;
  inputFile: string;
}

/**
 * Builds the config object handed to the model client and agents. Callers load
 * `.env` (via `dotenv/config`) before calling this; nothing else reads the environment.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(`Invalid configuration ${issue.path.join('.')}: ${issue.message}`);
  }
  const e = parsed.data;

  if (e.BACKOFF_MAX_MS < e.BACKOFF_BASE_MS) {
    throw new ConfigurationError('Invalid configuration BACKOFF_MAX_MS: must not be below BACKOFF_BASE_MS');
  }

  // Production mode pins every agent to the exact model version
  const chatModel = e.PRODUCTION_MODE ? PINNED_CHAT_MODEL : e.CHAT_MODEL;
  const pick = (override: string | undefined) => (e.PRODUCTION_MODE ? chatModel : override ?? chatModel);

  return {
    openaiApiKey: e.OPENAI_API_KEY,
    productionMode: e.PRODUCTION_MODE,
    models: {
      profiler: pick(e.PROFILER_MODEL),
      simulator: pick(e.SIMULATOR_MODEL),
      analyzer: pick(e.ANALYZER_MODEL),
      advisor: pick(e.ADVISOR_MODEL)
    },
    temperature: e.TEMPERATURE,
    requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
    retry: {
      maxAttempts: e.MAX_ATTEMPTS,
      baseDelayMs: e.BACKOFF_BASE_MS,
      maxDelayMs: e.BACKOFF_MAX_MS,
      jitterRatio: e.BACKOFF_JITTER
    },
    parallelTimelines: e.PARALLEL_TIMELINES,
    logLevel: e.LOG_LEVEL,
    resultsDir: e.RESULTS_DIR,
    inputFile: e.INPUT_FILE
  };
}
