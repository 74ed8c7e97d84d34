#!/usr/bin/env node
import 'dotenv/config';
import { parseArgs } from 'node:util';
import { createAgents } from '../agents';
import { loadConfig, type AppConfig } from '../config';
import { AppError } from '../errors';
import { loadSimulationRequest, type SimulationRequest } from '../engine/inputFile';
import { DecisionOrchestrator } from '../engine/orchestrator';
import { createResultWriter, type WrittenFiles } from '../engine/resultWriter';
import { createTextGenerator, type TokenUsage } from '../openai/client';
import type { SimulationResult, TextGenerator } from '../types';
import { log, setLogLevel } from '../util/logger';

export const RULE = '='.repeat(80);

function riskLabel(risk: number): string {
  if (risk < 0.3) return 'Low';
  return risk < 0.7 ? 'Medium' : 'High';
}

export function printResults(result: SimulationResult): void {
  const { decisionDna: dna, analysis } = result;

  console.log(`\n${RULE}\nSIMULATION RESULTS\n${RULE}`);
  console.log('\nDecision DNA:');
  console.log(`  Risk Tolerance: ${dna.riskTolerance.toFixed(2)} (${riskLabel(dna.riskTolerance)})`);
  console.log(`  Time Preference: ${dna.timeHorizonPreference}`);
  console.log(`  Top Values: ${dna.valuePriorities.slice(0, 3).join(', ')}`);

  console.log(`\nGenerated ${result.scenarios.length} future scenarios`);
  for (const scenario of result.scenarios) {
    console.log(`  [${scenario.scenarioId}] ${scenario.decisionPath} (${Math.round(scenario.probability * 100)}%)`);
  }

  console.log(`\nBest scenario: ${analysis.bestScenario}`);
  console.log(`Trade-offs: ${analysis.tradeOffs}`);
  console.log(`\nAdvice:\n${result.advice}`);
}

export interface SimulationRun {
  result: SimulationResult;
  written?: WrittenFiles;
  durationMs: number;
}

/** Runs one request through the pipeline and writes the result files under `outputDir`. */
export async function runSimulation(
  config: AppConfig,
  request: SimulationRequest,
  generator: TextGenerator,
  outputDir: string
): Promise<SimulationRun> {
  log.info(`User: ${request.profile.userId}`);
  log.info(`Decision: ${request.decision.length > 80 ? `${request.decision.slice(0, 80)}...` : request.decision}`);
  log.info(`Timelines: ${request.timelines.join(', ')}`);
  if (request.generateVisuals) {
    log.warn('Visual generation is not available in this tool; the flag is recorded in the summary only');
  }

  let written: WrittenFiles | undefined;
  const orchestrator = new DecisionOrchestrator({
    agents: createAgents(config, generator),
    parallelTimelines: config.parallelTimelines,
    observers: [createResultWriter(outputDir, request, files => { written = files; })]
  });

  const startTime = Date.now();
  const session = orchestrator.createSession(request.profile);
  const result = await orchestrator.simulateDecision(session, request.decision, request.timelines);
  return { result, written, durationMs: Date.now() - startTime };
}

export function printRunFooter(run: SimulationRun, usage?: TokenUsage): void {
  console.log(`\n${RULE}`);
  console.log(`Session completed: ${run.result.sessionId}`);
  console.log(`Duration: ${(run.durationMs / 1000).toFixed(1)} seconds`);
  if (usage) {
    console.log(`Requests: ${usage.requests}, tokens in/out: ${usage.inputTokens}/${usage.outputTokens}`);
  }
  if (run.written) {
    console.log(`JSON Result: ${run.written.result}`);
    console.log(`Summary: ${run.written.summary}`);
  }
  console.log(RULE);
}

async function main(): Promise<number> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const { values } = parseArgs({
    options: {
      input: { type: 'string', short: 'i' },
      output: { type: 'string', short: 'o' }
    }
  });
  const request = loadSimulationRequest(values.input ?? config.inputFile);

  const generator = createTextGenerator(config);
  const run = await runSimulation(config, request, generator, values.output ?? config.resultsDir);

  printResults(run.result);
  printRunFooter(run, generator.getUsage());
  return 0;
}

if (require.main === module) {
  main()
    .then(code => process.exit(code))
    .catch(error => {
      if (error instanceof AppError) {
        log.error(`${error.name}: ${error.message}`);
      } else {
        log.error('FATAL ERROR:', error);
      }
      process.exit(1);
    });
}
