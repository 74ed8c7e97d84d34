import { ModelOutputError, ModelServiceError, ValidationError } from '../errors';
import type { RetryPolicy } from '../types';
import { createLogger } from '../util/logger';

const logger = createLogger('Retry');

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 10000,
  jitterRatio: 0
};

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Model-output faults are retried because the next generation may well be fine.
 * Transport faults retry only when the service flagged them transient; bad input never does.
 */
export function isRetryable(error: unknown): boolean {
  if (error instanceof ValidationError) return false;
  if (error instanceof ModelOutputError) return true;
  if (error instanceof ModelServiceError) return error.transient;
  return true;
}

export function backoffDelay(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
  const base = policy.baseDelayMs * Math.pow(2, attempt - 1);
  const jitter = random() * policy.jitterRatio * base;
  return Math.min(base + jitter, policy.maxDelayMs);
}

export interface RetryOptions {
  policy?: RetryPolicy;
  context?: string;
  sleep?: Sleep;
  random?: () => number;
}

/** Runs `operation` up to `policy.maxAttempts` times; the last error propagates unchanged. */
export async function withRetry<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const policy = options.policy ?? DEFAULT_RETRY_POLICY;
  const context = options.context ?? 'operation';
  const wait = options.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    try {
      const result = await operation(attempt);
      if (attempt > 1) {
        logger.info(`${context} succeeded after ${attempt - 1} retries`);
      }
      return result;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      if (!isRetryable(error) || attempt >= policy.maxAttempts) {
        logger.error(`${context} failed after ${attempt} attempt(s): ${message}`);
        throw error;
      }

      const delay = backoffDelay(policy, attempt, options.random);
      logger.warn(`${context} attempt ${attempt} failed (${message}), retrying in ${delay.toFixed(0)}ms...`);
      await wait(delay);
    }
  }
}
