import { z } from 'zod';

// Field-requirement tables for what each agent accepts back from the model.

export const DecisionDnaSchema = z.object({
  riskTolerance: z.number().min(0).max(1),
  timeHorizonPreference: z.string(),
  valuePriorities: z.array(z.string()),
  decisionPatterns: z.record(z.string(), z.unknown()),
  emotionalDrivers: z.array(z.string())
});

const outcomeText = z.union([z.string(), z.number(), z.boolean()]).transform(v => String(v));

export const ScenarioDraftSchema = z.object({
  decisionPath: z.string(),
  outcomes: z.record(z.string(), outcomeText),
  probability: z.number().min(0).max(1),
  keyEvents: z.array(z.string()),
  risks: z.array(z.string()),
  opportunities: z.array(z.string())
});

export const SCENARIOS_PER_TIMELINE = 3;

export const ScenarioTripleSchema = z
  .array(ScenarioDraftSchema, { invalid_type_error: `Expected a JSON array of ${SCENARIOS_PER_TIMELINE} scenarios` })
  .length(SCENARIOS_PER_TIMELINE, `Expected exactly ${SCENARIOS_PER_TIMELINE} scenarios`);

export const AnalysisSchema = z.object({
  bestScenario: z.string().min(1),
  riskAnalysis: z.string(),
  opportunityAnalysis: z.string(),
  alignmentScore: z.record(z.string(), z.number().min(0).max(1)),
  tradeOffs: z.string()
});

export type ScenarioDraft = z.infer<typeof ScenarioDraftSchema>;
