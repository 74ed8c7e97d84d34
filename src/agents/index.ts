import type { AppConfig } from '../config';
import type { Sleep } from '../engine/retry';
import type { TextGenerator } from '../types';
import { AdvisorAgent } from './advisor';
import { AnalyzerAgent } from './analyzer';
import { ProfilerAgent } from './profiler';
import { SimulatorAgent } from './simulator';

export { AdvisorAgent, AnalyzerAgent, ProfilerAgent, SimulatorAgent };
export type { AgentOptions } from './structuredAgent';

export interface AgentSet {
  profiler: ProfilerAgent;
  simulator: SimulatorAgent;
  analyzer: AnalyzerAgent;
  advisor: AdvisorAgent;
}

/** Binds every agent to the shared generator, its configured model and the retry policy. */
export function createAgents(config: AppConfig, generator: TextGenerator, sleep?: Sleep): AgentSet {
  const base = { generator, retry: config.retry, sleep };
  return {
    profiler: new ProfilerAgent({ ...base, model: config.models.profiler }),
    simulator: new SimulatorAgent({ ...base, model: config.models.simulator }),
    analyzer: new AnalyzerAgent({ ...base, model: config.models.analyzer }),
    advisor: new AdvisorAgent({ ...base, model: config.models.advisor })
  };
}
