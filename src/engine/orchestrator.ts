import type { AgentSet } from '../agents';
import { MemoryBank } from '../state/memoryBank';
import { createSession } from '../state/session';
import { DecisionTracker } from '../state/tracker';
import {
  TIMELINES,
  type DecisionDNA,
  type DecisionLogEntry,
  type FutureScenario,
  type PipelineStage,
  type Session,
  type SimulationResult,
  type Timeline
} from '../types';
import { deepFreeze } from '../util/freeze';
import { createLogger } from '../util/logger';
import { validateDecision, validateProfile, validateTimelines } from './validator';

const logger = createLogger('Pipeline');

export const DEFAULT_TIMELINES: readonly Timeline[] = TIMELINES;

export type StageListener = (stage: PipelineStage, session: Readonly<Session>) => void;

/** Output collaborator (report writer, renderer). Its failures never fail the run. */
export type ResultObserver = (result: Readonly<SimulationResult>, session: Readonly<Session>) => void | Promise<void>;

export interface OrchestratorOptions {
  agents: AgentSet;
  memory?: MemoryBank;
  tracker?: DecisionTracker;
  /** Simulate timelines concurrently; results are still merged in the caller's timeline order. */
  parallelTimelines?: boolean;
  onStage?: StageListener;
  observers?: ResultObserver[];
  clock?: () => Date;
}

/**
 * Drives one decision run: DNA (once per session), scenarios per timeline,
 * analysis, advice, then a snapshot into the memory bank. A failing stage ends
 * the run with that stage's error; nothing computed before it is kept.
 */
export class DecisionOrchestrator {
  readonly memory: MemoryBank;
  readonly tracker: DecisionTracker;
  private readonly agents: AgentSet;
  private readonly parallelTimelines: boolean;
  private readonly onStage?: StageListener;
  private readonly observers: ResultObserver[];
  private readonly clock: () => Date;

  constructor(options: OrchestratorOptions) {
    this.agents = options.agents;
    this.memory = options.memory ?? new MemoryBank();
    this.tracker = options.tracker ?? new DecisionTracker();
    this.parallelTimelines = options.parallelTimelines ?? false;
    this.onStage = options.onStage;
    this.observers = [...(options.observers ?? [])];
    this.clock = options.clock ?? (() => new Date());
  }

  createSession(profile: unknown): Session {
    const session = createSession(validateProfile(profile), this.clock());
    logger.info(`Created session ${session.sessionId} for user ${session.userProfile.userId}`);
    return session;
  }

  addObserver(observer: ResultObserver): void {
    this.observers.push(observer);
  }

  /** Profiles the session's user unless the session already carries DNA. */
  async ensureDna(session: Session): Promise<DecisionDNA> {
    if (session.decisionDna) {
      logger.debug(`Reusing cached Decision DNA for ${session.sessionId}`);
      // Sessions restored from the memory bank carry an unfrozen copy
      const cached = deepFreeze(session.decisionDna);
      this.enter('dna_ready', session);
      return cached;
    }

    this.enter('dna_pending', session);
    const dna = await this.agents.profiler.analyzeProfile(session.userProfile);
    session.decisionDna = dna;
    this.enter('dna_ready', session);
    return dna;
  }

  async simulateDecision(
    session: Session,
    decision: unknown,
    timelines: unknown = DEFAULT_TIMELINES
  ): Promise<SimulationResult> {
    const validDecision = validateDecision(decision);
    const validTimelines = validateTimelines(timelines);
    const startTime = Date.now();

    let stage: PipelineStage = 'created';
    const enter = (next: PipelineStage) => {
      stage = next;
      this.enter(next, session);
    };

    logger.info(`Simulating decision for ${session.sessionId} across ${validTimelines.join(', ')}`);
    enter('created');

    try {
      stage = 'dna_pending';
      const decisionDna = await this.ensureDna(session);

      enter('scenarios_pending');
      const scenarios = await this.simulateTimelines(validDecision, decisionDna, validTimelines);
      session.scenarios = scenarios;
      enter('scenarios_ready');

      const analysis = await this.agents.analyzer.analyzeScenarios(scenarios, decisionDna);
      enter('analyzed');

      const advice = await this.agents.advisor.generateAdvice(analysis, decisionDna);
      enter('advised');

      this.memory.save(session);
      enter('persisted');

      const result: SimulationResult = {
        sessionId: session.sessionId,
        decisionDna,
        scenarios,
        analysis,
        advice
      };
      logger.info(`Session ${session.sessionId} completed in ${Date.now() - startTime}ms`);

      await this.notifyObservers(result, session);
      return result;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const position = stage.endsWith('_pending') ? 'during' : 'after';
      logger.error(`Run for ${session.sessionId} failed ${position} stage "${stage}": ${message}`);
      throw error;
    }
  }

  trackDecision(decision: string, chosenPath: string, reasoning: string): DecisionLogEntry {
    return this.tracker.log(decision, chosenPath, reasoning);
  }

  decisionHistory(): DecisionLogEntry[] {
    return this.tracker.history();
  }

  private async simulateTimelines(
    decision: string,
    dna: DecisionDNA,
    timelines: Timeline[]
  ): Promise<FutureScenario[]> {
    const simulate = (timeline: Timeline) => this.agents.simulator.simulateFutures(decision, dna, timeline);

    if (this.parallelTimelines) {
      // Promise.all keeps input order, so the merge is grouped by timeline as given
      const batches = await Promise.all(timelines.map(simulate));
      return batches.flat();
    }

    const scenarios: FutureScenario[] = [];
    for (const timeline of timelines) {
      const batch = await simulate(timeline);
      scenarios.push(...batch);
      logger.info(`${timeline}: ${batch.length} scenarios generated`);
    }
    return scenarios;
  }

  private enter(stage: PipelineStage, session: Session): void {
    logger.debug(`${session.sessionId} -> ${stage}`);
    this.onStage?.(stage, session);
  }

  private async notifyObservers(result: SimulationResult, session: Session): Promise<void> {
    for (const observer of this.observers) {
      try {
        await observer(result, session);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.warn(`Result observer failed, simulation result kept: ${message}`);
      }
    }
  }
}
