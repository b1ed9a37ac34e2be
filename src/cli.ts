#!/usr/bin/env node
/**
 * cli.ts
 * Command-line entry point: survey JSON in, HTML report files out.
 *
 * Output layout:
 *   <outputDir>/results-tables.html
 *   <outputDir>/text-appendices.html
 *   <outputDir>/display-logic.html
 *   <outputDir>/uncodeable.html
 *   <outputDir>/summary.json
 *
 * Usage:
 *   npx tsx src/cli.ts <survey.json> [outputDir] [--no-block-headers] [--threshold=<n>] [--debug]
 */

import * as path from 'node:path';
import type { ReportConfigInput } from './models/report-config.js';
import { ReportOrchestrator } from './orchestrator/report-orchestrator.js';
import { SurveyLoader } from './services/survey-loader.js';
import { ConsoleLogger, TeeLogger } from './services/logger.js';

const rawArgs = process.argv.slice(2);
const verbose = rawArgs.includes('--debug');
const positional = rawArgs.filter((a) => !a.startsWith('--'));
const [surveyPath, rawOutputDir] = positional;

function usage(): never {
  console.error('Usage: tsx src/cli.ts <survey.json> [outputDir] [--no-block-headers] [--threshold=<n>] [--debug]');
  console.error('');
  console.error('  survey.json         decoded survey document (blocks, flow, responses)');
  console.error('  outputDir           (optional) defaults to output/<survey-name>');
  console.error('  --no-block-headers  omit block headers from the results-table report');
  console.error('  --threshold=<n>     minimum coded-comment count (exclusive), default 15');
  console.error('  --debug             emit debug-level logs and write a log file');
  process.exit(1);
}

if (surveyPath === undefined) usage();

const config: ReportConfigInput = {};
if (rawArgs.includes('--no-block-headers')) config.includeBlockHeaders = false;
const thresholdArg = rawArgs.find((a) => a.startsWith('--threshold='));
if (thresholdArg !== undefined) {
  const value = Number(thresholdArg.slice('--threshold='.length));
  if (!Number.isInteger(value) || value < 0) {
    console.error(`Invalid --threshold value: ${thresholdArg}`);
    usage();
  }
  config.nThreshold = value;
}

const surveyName = path.basename(surveyPath, path.extname(surveyPath));
const outputDir = path.resolve(rawOutputDir ?? path.join('output', surveyName));

console.log('Survey report generation starting…');
console.log(`  survey   : ${path.resolve(surveyPath)}`);
console.log(`  outputDir: ${outputDir}`);
if (rawOutputDir === undefined) {
  console.log('             (default, no outputDir argument supplied)');
}

const t0 = Date.now();
const logger = verbose ? new TeeLogger('debug') : new ConsoleLogger('warn');

try {
  const survey = SurveyLoader.readFile(surveyPath);
  const bundle = new ReportOrchestrator(config, { outputDir, logger }).run(survey);
  const elapsed = Date.now() - t0;

  const { stats } = bundle;
  console.log('');
  console.log('Reports complete ✓');
  console.log(`  blocks     : ${stats.orderedBlockCount}/${stats.blockCount}`);
  console.log(`  questions  : ${stats.questionCount}`);
  console.log(`  appendices : ${stats.appendixCount}`);
  console.log(`  logic      : ${stats.displayLogicTableCount}`);
  console.log(`  uncodeable : ${stats.uncodeableTags.length}`);
  console.log(`  elapsed    : ${elapsed} ms`);

  if (logger instanceof TeeLogger) {
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-').slice(0, 19);
    const logPath = path.join('logs', surveyName, timestamp, 'reports.log');
    logger.flush(path.resolve(logPath));
    console.log(`  log        : ${logPath}`);
  }

  process.exit(0);
} catch (err) {
  console.error('');
  console.error('Report generation failed:');
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
}
