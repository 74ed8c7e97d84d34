import { afterEach, describe, it, expect, vi } from 'vitest';
import { DecisionOrchestrator } from '../src/engine/orchestrator';
import { MalformedResponseError, PersistenceError, SchemaViolationError, ValidationError } from '../src/errors';
import { MemoryBank } from '../src/state/memoryBank';
import { DecisionTracker } from '../src/state/tracker';
import type { PipelineStage } from '../src/types';
import { setLogLevel } from '../src/util/logger';
import {
  ADVICE,
  DNA,
  ScriptedGenerator,
  happyPath,
  promptKind,
  scenarioDrafts,
  testAgents,
  timelineOf
} from './helpers/scriptedGenerator';

const PROFILE = {
  user_id: 'u1',
  age: 28,
  current_role: 'Software Engineer',
  skills: ['TypeScript', 'ML'],
  interests: ['AI'],
  life_goals: ['Financial independence']
};
const DECISION = 'Should I change my career path to focus on AI?';
const FIXED_NOW = new Date('2026-03-01T09:00:00.000Z');

function setup(generator: ScriptedGenerator, extra: { parallelTimelines?: boolean } = {}) {
  const stages: PipelineStage[] = [];
  const orchestrator = new DecisionOrchestrator({
    agents: testAgents(generator),
    onStage: stage => stages.push(stage),
    clock: () => FIXED_NOW,
    ...extra
  });
  return { orchestrator, stages };
}

describe('DecisionOrchestrator.simulateDecision', () => {
  it('runs profiler, simulator per timeline, analyzer and advisor in order', async () => {
    const generator = happyPath();
    const { orchestrator } = setup(generator);
    const session = orchestrator.createSession(PROFILE);

    const result = await orchestrator.simulateDecision(session, DECISION);

    expect(generator.kinds()).toEqual(['profiler', 'simulator', 'simulator', 'simulator', 'analyzer', 'advisor']);
    expect(generator.calls.slice(1, 4).map(c => timelineOf(c.prompt))).toEqual(['1yr', '3yr', '5yr']);
    expect(result.sessionId).toBe(session.sessionId);
    expect(result.decisionDna).toEqual(DNA);
    expect(result.scenarios.map(s => s.scenarioId)).toEqual([
      '1yr_0', '1yr_1', '1yr_2',
      '3yr_0', '3yr_1', '3yr_2',
      '5yr_0', '5yr_1', '5yr_2'
    ]);
    expect(result.analysis.bestScenario).toBe('1yr_0');
    expect(result.advice).toBe(ADVICE);
  });

  it('leaves the session populated and persisted', async () => {
    const { orchestrator } = setup(happyPath());
    const session = orchestrator.createSession(PROFILE);

    await orchestrator.simulateDecision(session, DECISION);

    expect(session.decisionDna).toEqual(DNA);
    expect(session.scenarios).toHaveLength(9);
    expect(orchestrator.memory.get(session.sessionId)).toEqual(session);
    expect(orchestrator.memory.history('u1')).toHaveLength(1);
  });

  it('emits every stage once, in order', async () => {
    const { orchestrator, stages } = setup(happyPath());
    await orchestrator.simulateDecision(orchestrator.createSession(PROFILE), DECISION);

    expect(stages).toEqual([
      'created',
      'dna_pending',
      'dna_ready',
      'scenarios_pending',
      'scenarios_ready',
      'analyzed',
      'advised',
      'persisted'
    ]);
  });

  it('profiles a session only once across runs', async () => {
    const generator = happyPath();
    const { orchestrator, stages } = setup(generator);
    const session = orchestrator.createSession(PROFILE);

    await orchestrator.simulateDecision(session, DECISION, ['1yr']);
    stages.length = 0;
    await orchestrator.simulateDecision(session, 'Should I start a company instead?', ['5yr']);

    expect(generator.count('profiler')).toBe(1);
    expect(stages.slice(0, 3)).toEqual(['created', 'dna_ready', 'scenarios_pending']);
    expect(session.scenarios.map(s => s.scenarioId)).toEqual(['5yr_0', '5yr_1', '5yr_2']);
  });

  it('follows the caller timeline order', async () => {
    const generator = happyPath();
    const { orchestrator } = setup(generator);

    const result = await orchestrator.simulateDecision(orchestrator.createSession(PROFILE), DECISION, ['5yr', '1yr']);

    expect(result.scenarios.map(s => s.scenarioId)).toEqual(['5yr_0', '5yr_1', '5yr_2', '1yr_0', '1yr_1', '1yr_2']);
    expect(result.analysis.bestScenario).toBe('5yr_0');
  });

  it('keeps timeline order when timelines run concurrently', async () => {
    const generator = happyPath({
      simulator: async request => {
        const timeline = timelineOf(request.prompt);
        // The first timeline answers last
        if (timeline === '1yr') await new Promise(resolve => setTimeout(resolve, 20));
        return JSON.stringify(
          ['optimistic', 'realistic', 'pessimistic'].map((tone, i) => ({
            decisionPath: `${timeline} ${tone}`,
            outcomes: { career: 'changes' },
            probability: [0.3, 0.5, 0.2][i],
            keyEvents: [],
            risks: [],
            opportunities: []
          }))
        );
      }
    });
    const { orchestrator } = setup(generator, { parallelTimelines: true });

    const result = await orchestrator.simulateDecision(orchestrator.createSession(PROFILE), DECISION);

    expect(result.scenarios.map(s => s.decisionPath)).toEqual([
      '1yr optimistic', '1yr realistic', '1yr pessimistic',
      '3yr optimistic', '3yr realistic', '3yr pessimistic',
      '5yr optimistic', '5yr realistic', '5yr pessimistic'
    ]);
  });

  it('aborts when the profiler never returns JSON', async () => {
    const generator = happyPath({ profiler: () => 'not json' });
    const { orchestrator, stages } = setup(generator);
    const session = orchestrator.createSession(PROFILE);

    await expect(orchestrator.simulateDecision(session, DECISION)).rejects.toBeInstanceOf(MalformedResponseError);
    expect(generator.count('profiler')).toBe(3);
    expect(generator.count('simulator')).toBe(0);
    expect(session.decisionDna).toBeUndefined();
    expect(stages).toEqual(['created', 'dna_pending']);
    expect(orchestrator.memory.size).toBe(0);
  });

  it('keeps no partial scenarios when a later timeline fails', async () => {
    const generator = happyPath({
      simulator: request => {
        const timeline = timelineOf(request.prompt);
        return JSON.stringify(timeline === '3yr' ? [] : scenarioDrafts(timeline));
      }
    });
    const { orchestrator } = setup(generator);
    const session = orchestrator.createSession(PROFILE);

    await expect(orchestrator.simulateDecision(session, DECISION)).rejects.toBeInstanceOf(SchemaViolationError);
    expect(generator.calls.map(c => timelineOf(c.prompt))).toEqual(['unknown', '1yr', '3yr', '3yr', '3yr']);
    expect(generator.count('analyzer')).toBe(0);
    expect(session.scenarios).toEqual([]);
    expect(session.decisionDna).toEqual(DNA);
    expect(orchestrator.memory.size).toBe(0);
  });

  it('rejects invalid input before any model call', async () => {
    const generator = happyPath();
    const { orchestrator, stages } = setup(generator);
    const session = orchestrator.createSession(PROFILE);

    await expect(orchestrator.simulateDecision(session, 'Quit?')).rejects.toThrow(
      new ValidationError('Decision must be at least 10 characters long')
    );
    await expect(orchestrator.simulateDecision(session, DECISION, ['1yr', '10yr'])).rejects.toThrow(
      'Invalid timeline: 10yr. Must be one of 1yr, 3yr, 5yr'
    );
    await expect(orchestrator.simulateDecision(session, DECISION, [])).rejects.toThrow(
      'Timelines must be a non-empty list'
    );
    expect(generator.calls).toHaveLength(0);
    expect(stages).toEqual([]);
  });

  it('propagates persistence failures', async () => {
    const generator = happyPath();
    const { orchestrator, stages } = setup(generator);
    const session = orchestrator.createSession({ ...PROFILE, onChange: () => undefined });

    await expect(orchestrator.simulateDecision(session, DECISION, ['1yr'])).rejects.toBeInstanceOf(PersistenceError);
    expect(stages[stages.length - 1]).toBe('advised');
  });
});

describe('DecisionOrchestrator.createSession', () => {
  it('validates the profile and stamps the clock', () => {
    const { orchestrator } = setup(happyPath());
    const session = orchestrator.createSession(PROFILE);

    expect(session.sessionId).toMatch(/^session_1772355600000_[0-9a-f]{8}$/);
    expect(session.createdAt).toBe('2026-03-01T09:00:00.000Z');
    expect(session.userProfile.currentRole).toBe('Software Engineer');
    expect(session.scenarios).toEqual([]);
    expect(session.conversationHistory).toEqual([]);
  });

  it('throws on a missing current role without calling the model', () => {
    const generator = happyPath();
    const { orchestrator } = setup(generator);
    const { current_role: _dropped, ...profile } = PROFILE;

    expect(() => orchestrator.createSession(profile)).toThrow('Missing required field: currentRole');
    expect(generator.calls).toHaveLength(0);
  });

  it('gives distinct ids to sessions created in the same millisecond', () => {
    const { orchestrator } = setup(happyPath());
    expect(orchestrator.createSession(PROFILE).sessionId).not.toBe(orchestrator.createSession(PROFILE).sessionId);
  });
});

describe('result observers', () => {
  it('receive the result after persistence', async () => {
    const { orchestrator } = setup(happyPath());
    const seen: string[] = [];
    orchestrator.addObserver((result, session) => {
      seen.push(`${result.sessionId}:${orchestrator.memory.get(session.sessionId) ? 'stored' : 'missing'}`);
    });
    const session = orchestrator.createSession(PROFILE);

    await orchestrator.simulateDecision(session, DECISION, ['1yr']);

    expect(seen).toEqual([`${session.sessionId}:stored`]);
  });

  it('cannot fail the run', async () => {
    const later = vi.fn();
    const orchestrator = new DecisionOrchestrator({
      agents: testAgents(happyPath()),
      observers: [
        async () => {
          throw new Error('disk full');
        },
        later
      ]
    });

    const result = await orchestrator.simulateDecision(orchestrator.createSession(PROFILE), DECISION, ['1yr']);

    expect(result.advice).toBe(ADVICE);
    expect(later).toHaveBeenCalledTimes(1);
  });
});

describe('memory snapshots', () => {
  it('are isolated from later changes to the live session', async () => {
    const { orchestrator } = setup(happyPath());
    const session = orchestrator.createSession(PROFILE);
    await orchestrator.simulateDecision(session, DECISION, ['1yr']);

    session.scenarios = [];
    session.userProfile.skills.push('Rust');

    const stored = orchestrator.memory.get(session.sessionId);
    expect(stored?.scenarios).toHaveLength(3);
    expect(stored?.userProfile.skills).toEqual(['TypeScript', 'ML']);
  });
});

describe('decision tracking', () => {
  it('records chosen paths in order with the tracker clock', () => {
    const tracker = new DecisionTracker(() => FIXED_NOW);
    const orchestrator = new DecisionOrchestrator({ agents: testAgents(happyPath()), tracker, memory: new MemoryBank() });

    orchestrator.trackDecision('Switch to AI', '1yr_0', 'Best alignment');
    orchestrator.trackDecision('Stay put', '3yr_1', 'Lower risk');

    expect(orchestrator.decisionHistory()).toEqual([
      { timestamp: '2026-03-01T09:00:00.000Z', decision: 'Switch to AI', chosenPath: '1yr_0', reasoning: 'Best alignment' },
      { timestamp: '2026-03-01T09:00:00.000Z', decision: 'Stay put', chosenPath: '3yr_1', reasoning: 'Lower risk' }
    ]);
  });
});

describe('decision DNA', () => {
  it('cannot be edited through a run result', async () => {
    const generator = happyPath();
    const { orchestrator } = setup(generator);
    const session = orchestrator.createSession(PROFILE);
    const first = await orchestrator.simulateDecision(session, DECISION, ['1yr']);

    expect(Object.isFrozen(first.decisionDna)).toBe(true);
    expect(() => Object.assign(first.decisionDna, { riskTolerance: 5 })).toThrow(TypeError);
    expect(() => Object.assign(first.decisionDna.valuePriorities, ['wealth'])).toThrow(TypeError);

    await orchestrator.simulateDecision(session, 'Should I start a company instead?', ['3yr']);

    expect(session.decisionDna?.riskTolerance).toBe(0.55);
    expect(session.decisionDna?.valuePriorities).toEqual(['career', 'freedom', 'family']);
    const secondSimulation = generator.calls.filter(c => promptKind(c.prompt) === 'simulator')[1];
    expect(secondSimulation.prompt).toContain('"riskTolerance": 0.55');
  });

  it('is frozen again when a session comes back from the memory bank', async () => {
    const { orchestrator } = setup(happyPath());
    const session = orchestrator.createSession(PROFILE);
    await orchestrator.simulateDecision(session, DECISION, ['1yr']);

    const restored = orchestrator.memory.get(session.sessionId);
    if (!restored) throw new Error('session was not stored');
    const dna = await orchestrator.ensureDna(restored);

    expect(Object.isFrozen(dna)).toBe(true);
    expect(Object.isFrozen(dna.decisionPatterns)).toBe(true);
  });
});

describe('failure logging', () => {
  afterEach(() => {
    setLogLevel('silent');
  });

  it('reports a failure inside a pending stage as during that stage', async () => {
    setLogLevel('error');
    const errors = vi.spyOn(console, 'error').mockImplementation(() => {});
    const { orchestrator } = setup(happyPath({ profiler: () => 'not json' }));
    const session = orchestrator.createSession(PROFILE);

    await expect(orchestrator.simulateDecision(session, DECISION)).rejects.toBeInstanceOf(MalformedResponseError);

    expect(errors).toHaveBeenCalledWith(
      expect.stringMatching(
        new RegExp(
          `^\\[Pipeline\\] Run for ${session.sessionId} failed during stage "dna_pending": Invalid JSON response from model \\(Profiler\\)`
        )
      )
    );
  });

  it('reports a failure after a completed stage as after it', async () => {
    setLogLevel('error');
    const errors = vi.spyOn(console, 'error').mockImplementation(() => {});
    const { orchestrator } = setup(happyPath({ analyzer: () => 'not json' }));
    const session = orchestrator.createSession(PROFILE);

    await expect(orchestrator.simulateDecision(session, DECISION, ['1yr'])).rejects.toBeInstanceOf(
      MalformedResponseError
    );

    expect(errors).toHaveBeenCalledWith(
      expect.stringMatching(new RegExp(`^\\[Pipeline\\] Run for ${session.sessionId} failed after stage "scenarios_ready": `))
    );
  });
});
