export class AppError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad caller input. Raised before any model call and never retried. */
export class ValidationError extends AppError {}

export class ConfigurationError extends AppError {}

export class InputFileError extends AppError {
  constructor(message: string, public readonly filePath: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * Base for faults in what the model sent back. The model is non-deterministic,
 * so every subclass is retried by the agent's retry envelope.
 */
export class ModelOutputError extends AppError {
  constructor(message: string, public readonly agent: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class EmptyResponseError extends ModelOutputError {
  constructor(agent: string) {
    super(`Empty response from model (${agent})`, agent);
  }
}

export class MalformedResponseError extends ModelOutputError {
  constructor(agent: string, public readonly rawText: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Invalid JSON response from model (${agent}): ${reason}`, agent, { cause });
  }
}

export class SchemaViolationError extends ModelOutputError {
  constructor(agent: string, public readonly field: string, detail: string) {
    super(`Invalid ${agent} response at "${field}": ${detail}`, agent);
  }
}

export class IncompleteResponseError extends ModelOutputError {
  constructor(agent: string, public readonly length: number, minimum: number) {
    super(`${agent} response too short (${length} < ${minimum} chars), likely incomplete`, agent);
  }
}

/** Transport-level failure talking to the model service. */
export class ModelServiceError extends AppError {
  constructor(
    message: string,
    public readonly status: number | undefined,
    public readonly transient: boolean,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class PersistenceError extends AppError {}
