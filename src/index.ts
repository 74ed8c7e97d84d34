export * from './types';
export * from './errors';
export { loadConfig, type AppConfig, type AgentModels } from './config';
export { validateProfile, validateDecision, validateTimelines } from './engine/validator';
export { withRetry, isRetryable, backoffDelay, DEFAULT_RETRY_POLICY, type Sleep } from './engine/retry';
export { stripCodeFences, parseModelJson, validateModelOutput, parseStructured } from './engine/structuredOutput';
export {
  DecisionOrchestrator,
  DEFAULT_TIMELINES,
  type OrchestratorOptions,
  type ResultObserver,
  type StageListener
} from './engine/orchestrator';
export { loadSimulationRequest, parseSimulationRequest, type SimulationRequest } from './engine/inputFile';
export { createResultWriter, summarizeResult, type ResultSummary } from './engine/resultWriter';
export { checkEnvironment, checkInputFile, type CheckReport } from './engine/setupCheck';
export { createAgents, ProfilerAgent, SimulatorAgent, AnalyzerAgent, AdvisorAgent, type AgentSet, type AgentOptions } from './agents';
export { OpenAITextGenerator, createTextGenerator, type TokenUsage } from './openai/client';
export { MemoryBank } from './state/memoryBank';
export { DecisionTracker } from './state/tracker';
export { createSession } from './state/session';
export { createLogger, setLogLevel, type Logger, type LogLevel } from './util/logger';
