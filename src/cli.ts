#!/usr/bin/env node
// Failure similarity CLI
//
// Usage:
//   failure-similarity analyze [--log events.jsonl | --csv events.csv] [--report out/report] [--slack]
//   failure-similarity similar "TimeoutException waiting for #login" [--top-k 10]

import 'dotenv/config';
import { parseArgs } from 'util';
import { createAnalysisEngine } from './analysis';
import { loadConfig } from './config';
import { renderReport } from './dashboard';
import { errorMessage } from './errors';
import { isFailure } from './fields';
import { readEventLog, readEventsCsv } from './io';
import { createLogger, logger } from './logger';
import { formatSlackSummary, postSlack } from './slack';
import type { AnalysisReport } from './types';

const USAGE = `Usage:
  failure-similarity analyze [--log <file> | --csv <file>] [--report <dir>] [--slack]
  failure-similarity similar <text...> [--top-k <n>] [--log <file>]`;

async function analyze(values: { log?: string; csv?: string; report?: string; slack?: boolean }) {
  const config = loadConfig({ ...process.env, ...(values.log ? { LOGS_PATH: values.log } : {}) });
  logger.level = config.logLevel;
  const log = createLogger('cli');

  const input = values.csv ?? config.logsPath;
  const { events, rejected } = values.csv
    ? await readEventsCsv(values.csv, createLogger('io'))
    : await readEventLog(config.logsPath, createLogger('io'));
  if (!events.length) {
    console.log(`No events found in ${input}`);
    return;
  }

  const engine = await createAnalysisEngine(config, logger);
  const stats = await engine.loadAndIndex(events);
  const summary = await engine.summary();

  console.log(`Events: ${stats.totalEvents} (rejected ${rejected.length})`);
  console.log(`Passed: ${stats.passed}  Failures indexed: ${stats.failuresIndexed}`);
  console.log(`Failure rate: ${summary.failureRate.toFixed(1)}%`);
  for (const t of summary.failuresByTest) console.log(`  - ${t.name}: ${t.count}`);

  const reports: AnalysisReport[] = [];
  for (const failure of events.filter(isFailure)) {
    const report = await engine.analyze(failure);
    reports.push(report);
    console.log(`\n${report.testName} (${report.className})`);
    console.log(`  ${report.errorMessage.slice(0, 100)}`);
    console.log(`  -> ${report.recommendation}`);
    if (report.similarFailures.length) console.log(`  similar failures: ${report.similarFailures.length}`);
  }

  const outFile = await renderReport({ summary, reports }, values.report ?? config.reportDir);
  console.log(`\nReport: ${outFile}`);

  if (values.slack) {
    const posted = await postSlack(formatSlackSummary(summary, reports), config.slack);
    log.info({ posted }, 'slack summary');
  }
}

async function similar(text: string, values: { log?: string; 'top-k'?: string }) {
  const config = loadConfig({ ...process.env, ...(values.log ? { LOGS_PATH: values.log } : {}) });
  logger.level = config.logLevel;

  const topK = values['top-k'] === undefined ? undefined : Number(values['top-k']);
  if (topK !== undefined && (!Number.isInteger(topK) || topK < 1)) throw new Error('--top-k must be a positive integer');

  const engine = await createAnalysisEngine(config, logger);
  const results = await engine.findSimilar(text, topK);
  if (!results.length) {
    console.log('No similar failures found.');
    return;
  }
  for (const r of results) {
    console.log(`${r.score.toFixed(3)}  ${r.testName} (${r.className})  ${r.timestamp}`);
    console.log(`       ${r.message.slice(0, 120)}`);
  }
}

async function main(argv: string[]) {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      log: { type: 'string' },
      csv: { type: 'string' },
      report: { type: 'string' },
      slack: { type: 'boolean' },
      'top-k': { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  });
  const [command, ...rest] = positionals;

  if (values.help || !command) {
    console.log(USAGE);
    return;
  }
  switch (command) {
    case 'analyze':
      return analyze(values);
    case 'similar':
      if (!rest.length) throw new Error('similar needs a query text');
      return similar(rest.join(' '), values);
    default:
      throw new Error(`Unknown command "${command}"\n${USAGE}`);
  }
}

main(process.argv.slice(2)).catch((err: unknown) => {
  logger.error({ err }, errorMessage(err));
  process.exitCode = 1;
});
