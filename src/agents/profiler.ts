import { parseStructured } from '../engine/structuredOutput';
import { deepFreeze } from '../util/freeze';
import { validateProfile } from '../engine/validator';
import { buildProfilerPrompt } from '../prompts/templates';
import { DecisionDnaSchema } from '../schemas/agentOutputs';
import type { DecisionDNA, UserProfile } from '../types';
import { StructuredAgent, type AgentOptions } from './structuredAgent';

/** Extracts a user's Decision DNA from their profile. */
export class ProfilerAgent extends StructuredAgent<UserProfile, DecisionDNA> {
  constructor(options: AgentOptions) {
    super('Profiler', options);
  }

  async analyzeProfile(data: unknown): Promise<DecisionDNA> {
    const profile = validateProfile(data);
    this.logger.info(`Analyzing profile for user: ${profile.userId}`);

    const dna = await this.invoke(profile);
    this.logger.info(`Decision DNA extracted for user: ${profile.userId} (risk ${dna.riskTolerance.toFixed(2)})`);
    return dna;
  }

  protected buildPrompt(profile: UserProfile): string {
    return buildProfilerPrompt(profile);
  }

  protected interpret(text: string): DecisionDNA {
    return deepFreeze(parseStructured(DecisionDnaSchema, text, this.name));
  }
}
