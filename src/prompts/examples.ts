import type { AnalysisResult, DecisionDNA } from '../types';
import type { ScenarioDraft } from '../schemas/agentOutputs';

// One worked example per agent, embedded verbatim in the prompts.

export const EXAMPLE_DNA: DecisionDNA = {
  riskTolerance: 0.7,
  timeHorizonPreference: 'medium',
  valuePriorities: ['career', 'wealth', 'freedom'],
  decisionPatterns: { style: 'analytical', speed: 'deliberate' },
  emotionalDrivers: ['achievement', 'security']
};

export const EXAMPLE_SCENARIO: ScenarioDraft = {
  decisionPath: 'Take the startup role',
  outcomes: { career: 'Senior role', finance: 'Equity growth' },
  probability: 0.7,
  keyEvents: ['Join startup', 'Product launch'],
  risks: ['Startup failure'],
  opportunities: ['Equity upside']
};

export const EXAMPLE_ANALYSIS: AnalysisResult = {
  bestScenario: '1yr_0',
  riskAnalysis: 'Main risks include...',
  opportunityAnalysis: 'Key opportunities are...',
  alignmentScore: { '1yr_0': 0.8, '1yr_1': 0.6 },
  tradeOffs: 'Higher risk vs higher reward...'
};
