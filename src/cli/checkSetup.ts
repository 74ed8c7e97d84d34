#!/usr/bin/env node
import 'dotenv/config';
import { parseArgs } from 'node:util';
import { loadConfig } from '../config';
import { checkEnvironment, checkInputFile, type CheckReport } from '../engine/setupCheck';

function print(title: string, report: CheckReport): void {
  console.log(`\n${title}`);
  for (const error of report.errors) console.log(`  ERROR   ${error}`);
  for (const warning of report.warnings) console.log(`  WARN    ${warning}`);
  for (const info of report.info) console.log(`  OK      ${info}`);
}

function main(): number {
  const config = loadConfig();
  const { values } = parseArgs({ options: { input: { type: 'string', short: 'i' } } });
  const inputPath = values.input ?? config.inputFile;

  console.log('Running setup validation...');
  const environment = checkEnvironment(config);
  const input = checkInputFile(inputPath);
  print('Environment', environment);
  print(`Input file (${inputPath})`, input);

  const valid = environment.valid && input.valid;
  console.log(valid ? '\nSetup validation PASSED - ready to run' : '\nSetup validation FAILED - fix the errors above');
  if (!environment.valid) console.log('  - Copy .env.example to .env and set OPENAI_API_KEY');
  if (!input.valid) console.log(`  - Create ${inputPath} from decision_input.example.json`);
  return valid ? 0 : 1;
}

if (require.main === module) {
  try {
    process.exit(main());
  } catch (error) {
    console.error('[Check] FATAL ERROR:', error);
    process.exit(1);
  }
}
