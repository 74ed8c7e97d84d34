import type { z } from 'zod';
import { MalformedResponseError, SchemaViolationError } from '../errors';

const FENCE = /```(?:json)?/gi;

/** Drops Markdown code-fence markers the model likes to wrap JSON in. */
export function stripCodeFences(text: string): string {
  return text.trim().replace(FENCE, '').trim();
}

export function parseModelJson(rawText: string, agent: string): unknown {
  try {
    return JSON.parse(stripCodeFences(rawText));
  } catch (error) {
    throw new MalformedResponseError(agent, rawText, error);
  }
}

export function describePath(path: ReadonlyArray<string | number>): string {
  return path.length === 0 ? '(root)' : path.join('.');
}

/**
 * Checks a parsed payload against the agent's schema. The first zod issue
 * becomes the error, naming the offending key.
 */
export function validateModelOutput<S extends z.ZodTypeAny>(schema: S, payload: unknown, agent: string): z.output<S> {
  const result = schema.safeParse(payload);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new SchemaViolationError(agent, describePath(issue.path), issue.message);
  }
  return result.data;
}

export function parseStructured<S extends z.ZodTypeAny>(schema: S, rawText: string, agent: string): z.output<S> {
  return validateModelOutput(schema, parseModelJson(rawText, agent), agent);
}
