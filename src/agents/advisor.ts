import { IncompleteResponseError, ValidationError } from '../errors';
import { buildAdvisorPrompt } from '../prompts/templates';
import { AnalysisSchema } from '../schemas/agentOutputs';
import type { AnalysisResult, DecisionDNA } from '../types';
import { StructuredAgent, type AgentOptions } from './structuredAgent';

export const MIN_ADVICE_LENGTH = 50;

interface AdviceInput {
  analysis: AnalysisResult;
  dna: DecisionDNA;
}

/** Turns the comparative analysis into free-text recommendations. */
export class AdvisorAgent extends StructuredAgent<AdviceInput, string> {
  constructor(options: AgentOptions) {
    super('Advisor', options);
  }

  async generateAdvice(analysis: AnalysisResult, dna: DecisionDNA): Promise<string> {
    if (!AnalysisSchema.safeParse(analysis).success) {
      throw new ValidationError('No valid analysis provided for advice generation');
    }
    this.logger.info('Generating personalized advice');

    const advice = await this.invoke({ analysis, dna });
    this.logger.info(`Advice ready (${advice.length} chars)`);
    return advice;
  }

  protected buildPrompt({ analysis, dna }: AdviceInput): string {
    return buildAdvisorPrompt(analysis, dna);
  }

  protected interpret(text: string): string {
    const advice = text.trim();
    if (advice.length < MIN_ADVICE_LENGTH) {
      throw new IncompleteResponseError(this.name, advice.length, MIN_ADVICE_LENGTH);
    }
    return advice;
  }
}
