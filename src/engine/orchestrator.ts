import type { EventSource } from '../dialects/source';
import type { ObjectSink } from '../dialects/sink';
import { enumerateDays, isDateKey, parseDateKey, yesterday } from './dates';
import { describeError, InvalidDateError, InvalidRangeError } from './errors';
import { formatError, log } from './logger';
import {
  NO_DATA_MESSAGE,
  type BackfillReport,
  type ConnectivityReport,
  type DailyRunResult,
  type DateKey,
  type FailedDay,
  type StatusReport,
} from './types';

/** Lookback used for both listings in the status report */
export const STATUS_LOOKBACK_DAYS = 30;

export type OrchestratorOptions = {
  /** Clock used to resolve the default day. Defaults to the wall clock. */
  now?: () => Date;
};

const failed = (date: DateKey, error: string, recordsExtracted = 0): DailyRunResult => ({
  status: 'failed',
  date,
  success: false,
  skipped: false,
  recordsExtracted,
  error,
});

/** Failed days other than days without data */
export const blockingFailures = (report: BackfillReport): FailedDay[] =>
  report.failed.filter((failure) => failure.reason === 'error');

/**
 * Pipeline core. Moves one day at a time from the source to the sink and never touches
 * transport details itself.
 */
export class Orchestrator {
  private readonly source: EventSource;
  private readonly sink: ObjectSink;
  private readonly now: () => Date;

  constructor(source: EventSource, sink: ObjectSink, options: OrchestratorOptions = {}) {
    this.source = source;
    this.sink = sink;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Run the pipeline for one day (yesterday when omitted).
   * Every outcome is returned as a result; this never throws.
   */
  async runDaily(date?: DateKey, skipExisting = true): Promise<DailyRunResult> {
    const day = date ?? yesterday(this.now());
    let recordsExtracted = 0;

    log.day(day, 'starting');

    try {
      if (!isDateKey(day)) {
        throw new InvalidDateError(day);
      }

      if (skipExisting && (await this.sink.exists(day))) {
        log.day(day, 'already loaded, skipping');
        return { status: 'skipped', date: day, success: true, skipped: true, recordsExtracted: 0 };
      }

      const extraction = await this.source.extractEvents(day);
      if (extraction.kind === 'empty') {
        log.warn(`No data found for ${day} (${extraction.reason})`);
        return {
          status: 'no-data',
          date: day,
          success: false,
          skipped: false,
          recordsExtracted: 0,
          error: NO_DATA_MESSAGE,
        };
      }

      recordsExtracted = extraction.recordCount;
      log.day(day, `loading ${recordsExtracted.toLocaleString('en-US')} records`);

      const sinkLocation = await this.sink.upload(extraction, day);
      log.day(day, 'done');

      return {
        status: 'success',
        date: day,
        success: true,
        skipped: false,
        recordsExtracted,
        sinkLocation,
      };
    } catch (err) {
      const errorType = err instanceof Error ? err.name : 'Error';
      log.dayError(day, errorType, formatError(err));
      return failed(day, describeError(err), recordsExtracted);
    }
  }

  /**
   * Run every day of `[start, end]` in order. A failing day is recorded and the loop moves on;
   * only malformed bounds or `start > end` throw, before any day runs.
   */
  async backfill(start: DateKey, end: DateKey, skipExisting = true): Promise<BackfillReport> {
    const from = parseDateKey(start);
    const to = parseDateKey(end);
    if (from > to) {
      throw new InvalidRangeError(from, to);
    }

    const startTime = Date.now();
    const days = enumerateDays(from, to);
    const report: BackfillReport = {
      start: from,
      end: to,
      totalDays: days.length,
      successful: [],
      skipped: [],
      failed: [],
      totalRecords: 0,
    };

    log.backfill.start({ start: from, end: to, totalDays: days.length, skipExisting });

    for (const day of days) {
      try {
        const result = await this.runDaily(day, skipExisting);
        switch (result.status) {
          case 'success':
            report.successful.push(day);
            report.totalRecords += result.recordsExtracted;
            break;
          case 'skipped':
            report.skipped.push(day);
            break;
          case 'no-data':
            report.failed.push({ date: day, reason: 'no-data', error: result.error });
            break;
          case 'failed':
            report.failed.push({ date: day, reason: 'error', error: result.error });
            break;
        }
      } catch (err) {
        log.dayError(day, 'UNEXPECTED', formatError(err));
        report.failed.push({ date: day, reason: 'error', error: describeError(err) });
      }
    }

    log.backfill.summary({
      successful: report.successful.length,
      skipped: report.skipped.length,
      failed: report.failed.length,
      totalRecords: report.totalRecords,
      elapsed: Date.now() - startTime,
    });

    return report;
  }

  /** Probe both collaborators. Never throws. */
  async testConnections(): Promise<ConnectivityReport> {
    log.info('Testing connections...');

    const report: ConnectivityReport = {
      source: await this.probe(this.source.name, () => this.source.testConnection()),
      sink: await this.probe(this.sink.name, () => this.sink.testConnection()),
    };

    log.connectivity(report);
    return report;
  }

  /**
   * Connectivity plus the source/sink date listings and what is missing from the sink.
   * A listing that fails leaves its set empty. Never throws.
   */
  async getPipelineStatus(): Promise<StatusReport> {
    const connectivity = await this.testConnections();

    const sourceDates = await this.collectDates(this.source.name, () =>
      this.source.listAvailableDates(STATUS_LOOKBACK_DAYS)
    );
    const sinkDates = await this.collectDates(this.sink.name, async () =>
      new Set(await this.sink.listAvailableDates(STATUS_LOOKBACK_DAYS))
    );

    const missingDates = new Set([...sourceDates].filter((date) => !sinkDates.has(date)));

    return { connectivity, sourceDates, sinkDates, missingDates };
  }

  async close(): Promise<void> {
    if (this.sink.close) {
      await this.sink.close();
    }
    if (this.source.close) {
      await this.source.close();
    }
  }

  private async probe(name: string, test: () => Promise<boolean>): Promise<boolean> {
    try {
      return await test();
    } catch (err) {
      log.error(`${name} connection test failed: ${formatError(err)}`);
      return false;
    }
  }

  private async collectDates(name: string, list: () => Promise<Set<DateKey>>): Promise<Set<DateKey>> {
    try {
      return await list();
    } catch (err) {
      log.error(`Could not list ${name} dates: ${formatError(err)}`);
      return new Set();
    }
  }
}
