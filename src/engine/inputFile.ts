import { existsSync, readFileSync } from 'fs';
import { InputFileError, ValidationError } from '../errors';
import { SimulationRequestSchema } from '../schemas/input';
import { TIMELINES, type Timeline, type UserProfile } from '../types';
import { validateDecision, validateProfile, validateTimelines } from './validator';

export interface SimulationRequest {
  profile: UserProfile;
  decision: string;
  timelines: Timeline[];
  generateVisuals: boolean;
}

export function readJsonFile(filePath: string): unknown {
  if (!existsSync(filePath)) {
    throw new InputFileError(`Input file ${filePath} not found`, filePath);
  }
  try {
    return JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InputFileError(`Invalid JSON in ${filePath}: ${reason}`, filePath, { cause: error });
  }
}

/**
 * Reads `{ user_profile, decision, timelines?, generate_visuals? }` and runs every
 * field through the validator. Timelines default to all three horizons.
 */
export function parseSimulationRequest(data: unknown): SimulationRequest {
  const parsed = SimulationRequestSchema.safeParse(data);
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues[0].message);
  }
  const { user_profile, decision, timelines, generate_visuals } = parsed.data;

  return {
    profile: validateProfile(user_profile),
    decision: validateDecision(decision),
    timelines: validateTimelines(timelines ?? [...TIMELINES]),
    generateVisuals: generate_visuals
  };
}

export function loadSimulationRequest(filePath: string): SimulationRequest {
  return parseSimulationRequest(readJsonFile(filePath));
}
