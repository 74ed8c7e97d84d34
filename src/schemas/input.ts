import { z } from 'zod';
import { TIMELINES } from '../types';

export const MIN_AGE = 16;
export const MAX_AGE = 100;
export const MIN_DECISION_LENGTH = 10;

const AGE_MESSAGE = `Age must be an integer between ${MIN_AGE} and ${MAX_AGE}`;

// Input files use snake_case; the camelCase spelling wins when both are given
const PROFILE_ALIASES: Record<string, string> = {
  user_id: 'userId',
  current_role: 'currentRole',
  life_goals: 'lifeGoals',
  past_decisions: 'pastDecisions'
};

function normalizeProfileKeys(value: unknown): unknown {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return value;

  const out: Record<string, unknown> = {};
  const aliased: Array<[string, unknown]> = [];
  for (const [key, field] of Object.entries(value)) {
    const target = PROFILE_ALIASES[key];
    if (target) aliased.push([target, field]);
    else out[key] = field;
  }
  for (const [target, field] of aliased) {
    if (out[target] === undefined) out[target] = field;
  }
  return out;
}

const requiredText = (field: string) =>
  z
    .string({ required_error: `Missing required field: ${field}`, invalid_type_error: `${field} must be a string` })
    .refine(v => v.trim().length > 0, `${field} must be a non-empty string`);

const list = (field: string) =>
  z
    .array(z.string({ invalid_type_error: `${field} must be a list of strings` }), {
      invalid_type_error: `${field} must be a list`
    })
    .default([]);

export const UserProfileSchema = z.preprocess(
  normalizeProfileKeys,
  z
    .object(
      {
        userId: requiredText('userId'),
        age: z
          .number({ required_error: 'Missing required field: age', invalid_type_error: AGE_MESSAGE })
          .int(AGE_MESSAGE)
          .min(MIN_AGE, AGE_MESSAGE)
          .max(MAX_AGE, AGE_MESSAGE),
        currentRole: requiredText('currentRole'),
        skills: list('skills'),
        interests: list('interests'),
        lifeGoals: list('lifeGoals'),
        pastDecisions: list('pastDecisions')
      },
      { required_error: 'Profile must be an object', invalid_type_error: 'Profile must be an object' }
    )
    .passthrough()
);

const DECISION_REQUIRED = 'Decision must be a non-empty string';

export const DecisionSchema = z
  .string({ required_error: DECISION_REQUIRED, invalid_type_error: DECISION_REQUIRED })
  .min(1, DECISION_REQUIRED)
  .trim()
  .min(MIN_DECISION_LENGTH, `Decision must be at least ${MIN_DECISION_LENGTH} characters long`);

const TIMELINES_REQUIRED = 'Timelines must be a non-empty list';

export const TimelineSchema = z.enum(TIMELINES, {
  errorMap: (_issue, ctx) => ({
    message: `Invalid timeline: ${String(ctx.data)}. Must be one of ${TIMELINES.join(', ')}`
  })
});

export const TimelinesSchema = z
  .array(TimelineSchema, { required_error: TIMELINES_REQUIRED, invalid_type_error: TIMELINES_REQUIRED })
  .min(1, TIMELINES_REQUIRED);

/** Shape of the request file the CLI reads. */
export const SimulationRequestSchema = z.object(
  {
    user_profile: z.unknown().refine(v => v !== undefined && v !== null, 'Missing required key: user_profile'),
    decision: z.unknown().refine(v => v !== undefined && v !== null, 'Missing required key: decision'),
    timelines: z.unknown().optional(),
    generate_visuals: z.boolean({ invalid_type_error: 'generate_visuals must be a boolean' }).default(false)
  },
  { required_error: 'Input must be a JSON object', invalid_type_error: 'Input must be a JSON object' }
);
