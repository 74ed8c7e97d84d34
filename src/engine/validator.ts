import type { z } from 'zod';
import { ValidationError } from '../errors';
import { DecisionSchema, TimelinesSchema, UserProfileSchema } from '../schemas/input';
import type { Timeline, UserProfile } from '../types';

function parseInput<S extends z.ZodTypeAny>(schema: S, value: unknown): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(result.error.issues[0].message);
  }
  return result.data;
}

/**
 * Checks required fields and the age range, and fills absent list fields with `[]`.
 * Returns a new profile; `data` itself is left as it was.
 */
export function validateProfile(data: unknown): UserProfile {
  return parseInput(UserProfileSchema, data);
}

/** Returns the trimmed decision text. */
export function validateDecision(text: unknown): string {
  return parseInput(DecisionSchema, text);
}

export function validateTimelines(timelines: unknown): Timeline[] {
  return parseInput(TimelinesSchema, timelines);
}
