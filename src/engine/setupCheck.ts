import { existsSync } from 'fs';
import type { z } from 'zod';
import type { AppConfig } from '../config';
import { AppError } from '../errors';
import { DecisionSchema, SimulationRequestSchema, TimelinesSchema, UserProfileSchema } from '../schemas/input';
import { readJsonFile } from './inputFile';

export interface CheckReport {
  valid: boolean;
  errors: string[];
  warnings: string[];
  info: string[];
}

const PLACEHOLDER_KEYS = new Set(['your_openai_api_key_here', 'sk-your-key-here']);
const MIN_KEY_LENGTH = 20;
const OPTIONAL_PROFILE_FIELDS: Array<[string, string]> = [
  ['skills', 'skills'],
  ['interests', 'interests'],
  ['life_goals', 'lifeGoals'],
  ['past_decisions', 'pastDecisions']
];

function emptyReport(): CheckReport {
  return { valid: true, errors: [], warnings: [], info: [] };
}

function fail(report: CheckReport, message: string): void {
  report.valid = false;
  report.errors.push(message);
}

function collect(report: CheckReport, schema: z.ZodTypeAny, value: unknown): boolean {
  const result = schema.safeParse(value);
  if (result.success) return true;
  for (const issue of result.error.issues) fail(report, issue.message);
  return false;
}

export function checkEnvironment(config: AppConfig, fileExists: (path: string) => boolean = existsSync): CheckReport {
  const report = emptyReport();
  const key = config.openaiApiKey;

  if (!key) {
    fail(report, 'OPENAI_API_KEY not found in environment variables. Please set it in your .env file.');
  } else if (PLACEHOLDER_KEYS.has(key)) {
    fail(report, 'OPENAI_API_KEY appears to be a placeholder. Please set your actual API key.');
  } else if (key.length < MIN_KEY_LENGTH) {
    report.warnings.push("OPENAI_API_KEY seems unusually short. Please verify it's correct.");
  } else {
    report.info.push('OPENAI_API_KEY found');
  }

  if (fileExists('.env')) report.info.push('.env file found');
  else report.warnings.push('.env file not found. Consider creating one from .env.example');

  const models = Object.entries(config.models).map(([agent, model]) => `${agent}=${model}`);
  report.info.push(`Models: ${models.join(', ')}${config.productionMode ? ' (pinned)' : ''}`);
  report.info.push(`Retry: ${config.retry.maxAttempts} attempts, backoff ${config.retry.baseDelayMs}-${config.retry.maxDelayMs}ms`);
  return report;
}

/** Reports every problem in a request file instead of stopping at the first. */
export function checkInputFile(filePath: string): CheckReport {
  const report = emptyReport();

  let data: unknown;
  try {
    data = readJsonFile(filePath);
  } catch (error) {
    if (!(error instanceof AppError)) throw error;
    fail(report, error.message);
    return report;
  }
  report.info.push(`${filePath} loaded successfully`);

  const request = SimulationRequestSchema.safeParse(data);
  if (!request.success) {
    for (const issue of request.error.issues) fail(report, issue.message);
    return report;
  }
  const { user_profile, decision, timelines } = request.data;

  if (collect(report, UserProfileSchema, user_profile) && typeof user_profile === 'object' && user_profile !== null) {
    for (const [field, alias] of OPTIONAL_PROFILE_FIELDS) {
      if (!(field in user_profile) && !(alias in user_profile)) report.warnings.push(`Optional field missing: ${field}`);
    }
  }
  collect(report, DecisionSchema, decision);

  if (timelines === undefined) report.info.push('Using default timelines: 1yr, 3yr, 5yr');
  else collect(report, TimelinesSchema, timelines);

  return report;
}
