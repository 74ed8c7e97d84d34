#!/usr/bin/env node
import 'dotenv/config';
import { createInterface } from 'node:readline/promises';
import { loadConfig, type AppConfig } from '../config';
import { AppError } from '../errors';
import { parseSimulationRequest, type SimulationRequest } from '../engine/inputFile';
import { createTextGenerator } from '../openai/client';
import type { TextGenerator, Timeline } from '../types';
import { log, setLogLevel } from '../util/logger';
import { RULE, printResults, printRunFooter, runSimulation } from './simulate';

export type Ask = (question: string) => Promise<string>;

const SECTION = '='.repeat(60);

export const TIMELINE_CHOICES: Record<string, Timeline[]> = {
  '1': ['1yr'],
  '2': ['1yr', '3yr'],
  '3': ['1yr', '3yr', '5yr']
};

export function splitList(text: string): string[] {
  return text
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

// Whole numbers become numbers; anything else is left for the validator to reject
function wholeNumber(text: string): number | string {
  const trimmed = text.trim();
  return /^\d+$/.test(trimmed) ? Number(trimmed) : trimmed;
}

const yes = (answer: string) => answer.trim().toLowerCase().startsWith('y');

/** Asks for the profile in the input file's snake_case shape. Optional answers left blank are omitted. */
export async function collectProfile(ask: Ask): Promise<Record<string, unknown>> {
  console.log(`\n${SECTION}\nUSER PROFILE\n${SECTION}`);

  const profile: Record<string, unknown> = {
    user_id: (await ask('User ID (e.g., john_doe_001): ')).trim(),
    age: wholeNumber(await ask('Age: ')),
    current_role: (await ask('Current Role/Job: ')).trim()
  };

  const experience = (await ask('Years of Experience (optional): ')).trim();
  if (experience) profile.experience_years = wholeNumber(experience);
  const salary = (await ask('Current Annual Salary in USD (optional): ')).trim();
  if (salary) profile.current_salary = wholeNumber(salary);
  const location = (await ask('Current Location (optional): ')).trim();
  if (location) profile.location = location;
  const education = (await ask('Education Background (optional): ')).trim();
  if (education) profile.education = education;

  profile.skills = splitList(await ask('Skills (comma-separated): '));
  profile.interests = splitList(await ask('Interests (comma-separated): '));
  profile.life_goals = splitList(await ask('Life Goals (comma-separated): '));

  console.log('Past major decisions, one per line; leave blank to finish:');
  const pastDecisions: string[] = [];
  for (;;) {
    const entry = (await ask('  Decision: ')).trim();
    if (!entry) break;
    pastDecisions.push(entry);
  }
  profile.past_decisions = pastDecisions;

  return profile;
}

export async function collectPreferences(ask: Ask): Promise<{ timelines: Timeline[]; generateVisuals: boolean }> {
  console.log(`\n${SECTION}\nSIMULATION SETTINGS\n${SECTION}`);
  console.log('Timelines to simulate:');
  console.log('  1. 1 year only (quick)');
  console.log('  2. 1yr + 3yr (medium)');
  console.log('  3. 1yr + 3yr + 5yr (comprehensive)');

  const choice = (await ask('Choice (1-3): ')).trim();
  const timelines = TIMELINE_CHOICES[choice] ?? TIMELINE_CHOICES['1'];
  const generateVisuals = yes(await ask('Generate visualizations? (y/n): '));
  return { timelines: [...timelines], generateVisuals };
}

/** Walks the user through every question and validates the answers as one request. */
export async function collectRequest(ask: Ask): Promise<SimulationRequest> {
  const profile = await collectProfile(ask);

  console.log(`\n${SECTION}\nDECISION\n${SECTION}`);
  console.log('Describe the decision you are facing. Be specific about the options and context.');
  const decision = await ask('Your Decision: ');

  const { timelines, generateVisuals } = await collectPreferences(ask);
  return parseSimulationRequest({
    user_profile: profile,
    decision,
    timelines,
    generate_visuals: generateVisuals
  });
}

export async function confirmRequest(request: SimulationRequest, ask: Ask): Promise<boolean> {
  console.log(`\n${SECTION}\nREADY TO SIMULATE\n${SECTION}`);
  console.log(`User: ${request.profile.userId}`);
  console.log(`Decision: ${request.decision.length > 100 ? `${request.decision.slice(0, 100)}...` : request.decision}`);
  console.log(`Timelines: ${request.timelines.join(', ')}`);
  console.log(`Visuals: ${request.generateVisuals ? 'Yes' : 'No'}`);
  return yes(await ask('Proceed with simulation? (y/n): '));
}

/** Collects a request, confirms it, then runs it. Returns the process exit code. */
export async function runInteractive(
  ask: Ask,
  config: AppConfig,
  generator: TextGenerator,
  outputDir: string = config.resultsDir
): Promise<number> {
  const request = await collectRequest(ask);
  if (!(await confirmRequest(request, ask))) {
    console.log('Simulation cancelled');
    return 0;
  }

  const run = await runSimulation(config, request, generator, outputDir);
  printResults(run.result);
  printRunFooter(run);
  return 0;
}

async function main(): Promise<number> {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  const generator = createTextGenerator(config);

  console.log(`${RULE}\nFUTURE PATHS: INTERACTIVE SIMULATION\n${RULE}`);
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const code = await runInteractive(question => rl.question(question), config, generator);
    const usage = generator.getUsage();
    if (usage.requests > 0) {
      console.log(`Requests: ${usage.requests}, tokens in/out: ${usage.inputTokens}/${usage.outputTokens}`);
    }
    return code;
  } finally {
    rl.close();
  }
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
