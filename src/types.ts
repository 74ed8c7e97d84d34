export const TIMELINES = ['1yr', '3yr', '5yr'] as const;
export type Timeline = typeof TIMELINES[number];

export interface UserProfile {
  userId: string;
  age: number;
  currentRole: string;
  skills: string[];
  interests: string[];
  lifeGoals: string[];
  pastDecisions: string[];
  [extra: string]: unknown;
}

/** Produced once per session by the profiler and frozen; never edited afterwards. */
export interface DecisionDNA {
  readonly riskTolerance: number; // 0–1
  readonly timeHorizonPreference: string; // short | medium | long, as the model words it
  readonly valuePriorities: readonly string[];
  readonly decisionPatterns: Readonly<Record<string, unknown>>;
  readonly emotionalDrivers: readonly string[];
}

export interface FutureScenario {
  scenarioId: string; // `${timeline}_${index}`
  timeline: Timeline;
  decisionPath: string;
  outcomes: Record<string, string>;
  probability: number;
  keyEvents: string[];
  risks: string[];
  opportunities: string[];
}

export interface AnalysisResult {
  bestScenario: string;
  riskAnalysis: string;
  opportunityAnalysis: string;
  alignmentScore: Record<string, number>;
  tradeOffs: string;
}

export interface ConversationTurn {
  role: 'user' | 'assistant' | 'system';
  content: string;
}

export interface Session {
  sessionId: string;
  userProfile: UserProfile;
  decisionDna?: DecisionDNA;
  scenarios: FutureScenario[];
  conversationHistory: ConversationTurn[];
  createdAt: string;
}

export interface SimulationResult {
  sessionId: string;
  decisionDna: DecisionDNA;
  scenarios: FutureScenario[];
  analysis: AnalysisResult;
  advice: string;
}

export interface DecisionLogEntry {
  timestamp: string;
  decision: string;
  chosenPath: string;
  reasoning: string;
}

export type PipelineStage =
  | 'created'
  | 'dna_pending'
  | 'dna_ready'
  | 'scenarios_pending'
  | 'scenarios_ready'
  | 'analyzed'
  | 'advised'
  | 'persisted';

export interface GenerateRequest {
  prompt: string;
  model: string;
}

/** The one capability the pipeline needs from a language model. */
export interface TextGenerator {
  generate(request: GenerateRequest): Promise<string | null>;
}

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterRatio: number;
}
