import type { Session, SimulationResult } from '../types';
import { saveJSON } from '../util/fileCache';
import { createLogger } from '../util/logger';
import type { SimulationRequest } from './inputFile';
import type { ResultObserver } from './orchestrator';

const logger = createLogger('Results');

export interface ResultSummary {
  sessionId: string;
  userId: string;
  createdAt: string;
  decision: string;
  timelines: string[];
  generateVisuals: boolean;
  riskTolerance: number;
  valuePriorities: string[];
  scenarioCount: number;
  bestScenario: string;
  bestScenarioPath: string | null;
  adviceLength: number;
}

export function summarizeResult(
  result: Readonly<SimulationResult>,
  session: Readonly<Session>,
  request: SimulationRequest
): ResultSummary {
  const best = result.scenarios.find(s => s.scenarioId === result.analysis.bestScenario);
  return {
    sessionId: result.sessionId,
    userId: session.userProfile.userId,
    createdAt: session.createdAt,
    decision: request.decision,
    timelines: request.timelines,
    generateVisuals: request.generateVisuals,
    riskTolerance: result.decisionDna.riskTolerance,
    valuePriorities: [...result.decisionDna.valuePriorities],
    scenarioCount: result.scenarios.length,
    bestScenario: result.analysis.bestScenario,
    bestScenarioPath: best ? best.decisionPath : null,
    adviceLength: result.advice.length
  };
}

export interface WrittenFiles {
  result: string;
  summary: string;
}

/**
 * Observer that writes `result_<sessionId>.json` (request plus full result) and
 * `summary_<sessionId>.json` under `outputDir`. `onWritten` receives the paths.
 */
export function createResultWriter(
  outputDir: string,
  request: SimulationRequest,
  onWritten?: (files: WrittenFiles) => void
): ResultObserver {
  return (result, session) => {
    const files: WrittenFiles = {
      result: saveJSON(outputDir, `result_${result.sessionId}`, { request, result }),
      summary: saveJSON(outputDir, `summary_${result.sessionId}`, summarizeResult(result, session, request))
    };
    logger.info(`Saved ${files.result} and ${files.summary}`);
    onWritten?.(files);
  };
}
