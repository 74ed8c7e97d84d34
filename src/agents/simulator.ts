import { parseStructured } from '../engine/structuredOutput';
import { validateDecision, validateTimelines } from '../engine/validator';
import { buildSimulatorPrompt } from '../prompts/templates';
import { ScenarioTripleSchema } from '../schemas/agentOutputs';
import type { DecisionDNA, FutureScenario, Timeline } from '../types';
import { StructuredAgent, type AgentOptions } from './structuredAgent';

interface SimulationInput {
  decision: string;
  dna: DecisionDNA;
  timeline: Timeline;
}

export function scenarioId(timeline: Timeline, index: number): string {
  return `${timeline}_${index}`;
}

/** Simulates three futures (optimistic, realistic, pessimistic) for one timeline. */
export class SimulatorAgent extends StructuredAgent<SimulationInput, FutureScenario[]> {
  constructor(options: AgentOptions) {
    super('Simulator', options);
  }

  async simulateFutures(decision: unknown, dna: DecisionDNA, timeline: unknown): Promise<FutureScenario[]> {
    const input: SimulationInput = {
      decision: validateDecision(decision),
      dna,
      timeline: validateTimelines([timeline])[0]
    };
    this.logger.info(`Simulating futures for timeline: ${input.timeline}`);

    const scenarios = await this.invoke(input);
    this.logger.info(`Generated ${scenarios.length} scenarios for ${input.timeline}`);
    return scenarios;
  }

  protected buildPrompt({ decision, dna, timeline }: SimulationInput): string {
    return buildSimulatorPrompt(decision, dna, timeline);
  }

  // Ids come from array position, never from the model
  protected interpret(text: string, { timeline }: SimulationInput): FutureScenario[] {
    return parseStructured(ScenarioTripleSchema, text, this.name).map((draft, index) => ({
      scenarioId: scenarioId(timeline, index),
      timeline,
      ...draft
    }));
  }
}
