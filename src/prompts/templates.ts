import type { AnalysisResult, DecisionDNA, FutureScenario, Timeline, UserProfile } from '../types';
import { EXAMPLE_ANALYSIS, EXAMPLE_DNA, EXAMPLE_SCENARIO } from './examples';

const pretty = (value: unknown) => JSON.stringify(value, null, 2);

export const VALUE_CHOICES = ['career', 'family', 'health', 'wealth', 'freedom', 'creativity', 'impact'];

export function buildProfilerPrompt(profile: UserProfile): string {
  return `Analyze this user profile and extract their Decision DNA:

User Data: ${pretty(profile)}

Extract:
1. Risk tolerance (0-1 scale, float)
2. Time horizon preference (short/medium/long)
3. Top 3 value priorities from: ${VALUE_CHOICES.join(', ')}
4. Decision patterns (how they typically decide)
5. Emotional drivers (what motivates them)

Return ONLY valid JSON with keys: riskTolerance, timeHorizonPreference, valuePriorities, decisionPatterns, emotionalDrivers

Example format:
${pretty(EXAMPLE_DNA)}`;
}

export function buildSimulatorPrompt(decision: string, dna: DecisionDNA, timeline: Timeline): string {
  return `Simulate 3 different future scenarios for this decision:

Decision: ${decision}
Timeline: ${timeline}
Decision DNA: ${pretty(dna)}

For each scenario (optimistic, realistic, pessimistic), provide:
- decisionPath: specific actions taken (string)
- outcomes: concrete results in career, finance, relationships, health, happiness (object of strings)
- probability: likelihood 0-1 (float)
- keyEvents: major milestones (array of strings)
- risks: potential problems (array of strings)
- opportunities: potential gains (array of strings)

Return ONLY a valid JSON array with exactly 3 scenarios.

Example format:
${pretty([EXAMPLE_SCENARIO])}`;
}

export function buildAnalyzerPrompt(scenarios: FutureScenario[], dna: DecisionDNA): string {
  return `Analyze these future scenarios based on the user's Decision DNA:

Scenarios: ${pretty(scenarios)}
Decision DNA: ${pretty(dna)}

Provide:
1. bestScenario: the scenarioId that aligns best with the user's values (string, one of: ${scenarios.map(s => s.scenarioId).join(', ')})
2. riskAnalysis: comprehensive risk assessment (string)
3. opportunityAnalysis: key opportunities across scenarios (string)
4. alignmentScore: how well each scenario matches the user's DNA 0-1 (object with scenarioId as keys)
5. tradeOffs: what the user gains vs loses in each path (string)

Return ONLY valid JSON with these exact keys.

Example format:
${pretty(EXAMPLE_ANALYSIS)}`;
}

export function buildAdvisorPrompt(analysis: AnalysisResult, dna: DecisionDNA): string {
  return `Based on this analysis and Decision DNA, provide personalized advice:

Analysis: ${pretty(analysis)}
Decision DNA: ${pretty(dna)}

Provide:
1. Clear recommendation with reasoning
2. Action steps for next 30/60/90 days
3. Warning signs to watch for
4. Success indicators
5. Contingency plans

Be direct, actionable, and personalized to their DNA. Format as clear, readable text.`;
}
