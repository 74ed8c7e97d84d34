import { SchemaViolationError, ValidationError } from '../errors';
import { parseStructured } from '../engine/structuredOutput';
import { buildAnalyzerPrompt } from '../prompts/templates';
import { AnalysisSchema } from '../schemas/agentOutputs';
import type { AnalysisResult, DecisionDNA, FutureScenario } from '../types';
import { StructuredAgent, type AgentOptions } from './structuredAgent';

interface AnalysisInput {
  scenarios: FutureScenario[];
  dna: DecisionDNA;
}

export class AnalyzerAgent extends StructuredAgent<AnalysisInput, AnalysisResult> {
  constructor(options: AgentOptions) {
    super('Analyzer', options);
  }

  async analyzeScenarios(scenarios: FutureScenario[], dna: DecisionDNA): Promise<AnalysisResult> {
    if (scenarios.length === 0) {
      throw new ValidationError('No scenarios provided for analysis');
    }
    this.logger.info(`Analyzing ${scenarios.length} scenarios`);

    const analysis = await this.invoke({ scenarios, dna });
    this.logger.info(`Analysis complete, best scenario: ${analysis.bestScenario}`);
    return analysis;
  }

  protected buildPrompt({ scenarios, dna }: AnalysisInput): string {
    return buildAnalyzerPrompt(scenarios, dna);
  }

  protected interpret(text: string, { scenarios }: AnalysisInput): AnalysisResult {
    const analysis = parseStructured(AnalysisSchema, text, this.name);
    const known = scenarios.map(s => s.scenarioId);
    if (!known.includes(analysis.bestScenario)) {
      throw new SchemaViolationError(
        this.name,
        'bestScenario',
        `"${analysis.bestScenario}" is not one of ${known.join(', ')}`
      );
    }
    return analysis;
  }
}
