#!/usr/bin/env node
import { parseArgs } from 'node:util';
import { loadConfig } from './config';
import { yesterday } from './engine/dates';
import { ConfigError, InvalidDateError, InvalidRangeError } from './engine/errors';
import { log } from './engine/logger';
import { blockingFailures, type Orchestrator } from './engine/orchestrator';
import { createOrchestrator } from './engine/pipeline';
import { NO_DATA_MESSAGE } from './engine/types';

import 'dotenv/config';

const { values, positionals } = parseArgs({
  allowPositionals: true,
  options: {
    date: { type: 'string', short: 'd' },
    start: { type: 'string', short: 's' },
    end: { type: 'string', short: 'e' },
    force: { type: 'boolean', short: 'f', default: false },
    help: { type: 'boolean', short: 'h', default: false },
  },
});

const command = values.help ? 'help' : positionals[0] ?? 'daily';
const skipExisting = values.force !== true;

const MISSING_PREVIEW = 5;

const dailyCommand = async (pipeline: Orchestrator): Promise<number> => {
  const date = values.date ?? yesterday(new Date());
  const result = await pipeline.runDaily(date, skipExisting);

  switch (result.status) {
    case 'success':
      log.success(`Processed ${result.recordsExtracted.toLocaleString('en-US')} records for ${date}`);
      log.info(`Saved to ${result.sinkLocation}`);
      return 0;
    case 'skipped':
      log.success(`Skipped ${date} (data already exists)`);
      return 0;
    case 'no-data':
      log.warn(`${NO_DATA_MESSAGE} for ${date}`);
      return 0;
    case 'failed':
      log.error(`Failed ${date}: ${result.error}`);
      return 1;
  }
};

const backfillCommand = async (pipeline: Orchestrator): Promise<number> => {
  if (!values.start || !values.end) {
    log.error('backfill requires --start and --end (YYYY-MM-DD)');
    return 1;
  }

  const report = await pipeline.backfill(values.start, values.end, skipExisting);

  for (const failure of report.failed) {
    log.dayError(failure.date, failure.reason === 'no-data' ? 'NO DATA' : 'FAILED', failure.error);
  }

  return blockingFailures(report).length === 0 ? 0 : 1;
};

const testCommand = async (pipeline: Orchestrator): Promise<number> => {
  const report = await pipeline.testConnections();
  return report.source && report.sink ? 0 : 1;
};

const statusCommand = async (pipeline: Orchestrator): Promise<number> => {
  const status = await pipeline.getPipelineStatus();
  const missing = Array.from(status.missingDates).sort().reverse();

  const lines = [
    '',
    'Pipeline status',
    `  source dates available: ${status.sourceDates.size}`,
    `  sink dates available:   ${status.sinkDates.size}`,
    `  missing in sink:        ${missing.length}`,
  ];

  if (missing.length > 0) {
    lines.push(`  missing dates:          ${missing.slice(0, MISSING_PREVIEW).join(', ')}`);
    if (missing.length > MISSING_PREVIEW) {
      lines.push(`                          ... and ${missing.length - MISSING_PREVIEW} more`);
    }
  }

  console.info(lines.join('\n') + '\n');
  return 0;
};

const printUsage = (): void => {
  console.info(`
Usage: tsx src/cli.ts <command> [options]

Commands:
  daily      Load one day into the bronze layer (default)
  backfill   Load every day of a date range, oldest first
  test       Test source and sink connections
  status     Show connections and the dates missing from the sink
  help       Show this help

Options:
  -d, --date <YYYY-MM-DD>    Day to load (daily, default: yesterday)
  -s, --start <YYYY-MM-DD>   First day of the range (backfill)
  -e, --end <YYYY-MM-DD>     Last day of the range, inclusive (backfill)
  -f, --force                Reload days that already exist in the sink

Environment:
  GCP_PROJECT_ID                   Google Cloud project of the analytics export
  GA4_DATASET_ID                   BigQuery dataset holding events_YYYYMMDD tables
  GOOGLE_APPLICATION_CREDENTIALS   Service account key file (default: application default credentials)
  BIGQUERY_LOCATION                Query location (default: US)
  S3_BUCKET                        Bronze layer bucket
  S3_PREFIX                        Key prefix (default: bronze/ga4)
  DATA_TYPE                        Dataset segment of the key (default: events)
  AWS_REGION                       AWS region (default: us-east-1)
  SINK_MODE                        production or sandbox (default: production)
  SANDBOX_ENDPOINT                 Sandbox S3 endpoint (default: http://localhost:4566)

Exit code is 1 when the day failed, or when any backfill day failed for a reason other than missing data.
`);
};

const commands: Record<string, (pipeline: Orchestrator) => Promise<number>> = {
  daily: dailyCommand,
  backfill: backfillCommand,
  test: testCommand,
  status: statusCommand,
};

const main = async (): Promise<number> => {
  const handler = commands[command];
  if (!handler) {
    printUsage();
    return command === 'help' ? 0 : 1;
  }

  const pipeline = createOrchestrator(loadConfig());
  try {
    return await handler(pipeline);
  } finally {
    await pipeline.close();
  }
};

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    if (err instanceof ConfigError) {
      for (const issue of err.issues) log.error(issue);
    } else if (err instanceof InvalidRangeError || err instanceof InvalidDateError) {
      log.error(err.message);
    } else {
      console.error('Fatal error:', err);
    }
    process.exit(1);
  });
