import { ConfigurationError, EmptyResponseError } from '../errors';
import { DEFAULT_RETRY_POLICY, withRetry, type Sleep } from '../engine/retry';
import type { RetryPolicy, TextGenerator } from '../types';
import { createLogger, type Logger } from '../util/logger';

export interface AgentOptions {
  generator: TextGenerator;
  model: string;
  retry?: RetryPolicy;
  /** Replaces the backoff timer, mainly for tests. */
  sleep?: Sleep;
}

/**
 * One request/response cycle with the model: render a prompt from already
 * validated input, call the generator, and turn the reply into a typed result.
 * Each attempt inside the retry envelope makes exactly one generator call.
 */
export abstract class StructuredAgent<TInput, TOutput> {
  readonly model: string;
  protected readonly generator: TextGenerator;
  protected readonly logger: Logger;
  private readonly retry: RetryPolicy;
  private readonly sleep?: Sleep;

  protected constructor(readonly name: string, options: AgentOptions) {
    if (!options.model || !options.model.trim()) {
      throw new ConfigurationError(`${name} agent requires a model identifier`);
    }
    this.model = options.model;
    this.generator = options.generator;
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.sleep = options.sleep;
    this.logger = createLogger(name);
    this.logger.debug(`initialized with model: ${this.model}`);
  }

  protected abstract buildPrompt(input: TInput): string;

  /** Turns non-empty reply text into the result, or throws a ModelOutputError. */
  protected abstract interpret(text: string, input: TInput): TOutput;

  protected async invoke(input: TInput): Promise<TOutput> {
    const prompt = this.buildPrompt(input);

    return withRetry(
      async attempt => {
        this.logger.debug(`request attempt ${attempt} (${prompt.length} chars)`);
        const text = await this.generator.generate({ prompt, model: this.model });
        if (text === null || text.trim() === '') {
          throw new EmptyResponseError(this.name);
        }
        return this.interpret(text, input);
      },
      { policy: this.retry, context: this.name, sleep: this.sleep }
    );
  }
}
