import type { ConnectivityReport, DateKey } from './types';

type AnsiColor = {
  reset: string;
  dim: string;
  bold: string;
  red: string;
  green: string;
  yellow: string;
  blue: string;
  cyan: string;
  magenta: string;
};

const COLORS: Readonly<AnsiColor> = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  bold: '\x1b[1m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  magenta: '\x1b[35m',
};

// Consecutive days get different colours so a backfill reads as bands
const DAY_COLORS = [COLORS.blue, COLORS.cyan, COLORS.magenta, COLORS.green, COLORS.yellow];

const pad = (n: number, len = 2): string => String(n).padStart(len, '0');

const timestamp = (): string => {
  const d = new Date();
  return `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
};

const formatNumber = (n: number): string => n.toLocaleString('en-US');

const dayColor = (date: DateKey): string => {
  const dayOfMonth = Number(date.slice(8, 10));
  if (Number.isNaN(dayOfMonth)) return COLORS.dim;
  return DAY_COLORS[dayOfMonth % DAY_COLORS.length];
};

const dayTag = (date: DateKey): string => `${dayColor(date)}${date}${COLORS.reset}`;

const formatElapsed = (elapsed: number): string => {
  if (elapsed < 60_000) {
    return `${(elapsed / 1000).toFixed(1)}s`;
  }

  const minutes = Math.floor(elapsed / 60_000);
  const seconds = Math.round((elapsed % 60_000) / 1000);
  return `${minutes}m ${seconds}s`;
};

const mark = (ok: boolean): string => (ok ? `${COLORS.green}ok${COLORS.reset}` : `${COLORS.red}unreachable${COLORS.reset}`);

export const log = {
  info: (message: string) => {
    console.info(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${message}`);
  },

  success: (message: string) => {
    console.info(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${COLORS.green}${message}${COLORS.reset}`);
  },

  warn: (message: string) => {
    console.warn(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${COLORS.yellow}WARN${COLORS.reset}  ${message}`);
  },

  error: (message: string) => {
    console.error(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${COLORS.red}ERR${COLORS.reset}   ${message}`);
  },

  day: (date: DateKey, message: string) => {
    console.info(`${COLORS.dim}${timestamp()}${COLORS.reset}  ${dayTag(date)}  ${message}`);
  },

  dayError: (date: DateKey, errorType: string, detail: string) => {
    console.error(
      `${COLORS.dim}${timestamp()}${COLORS.reset}  ${dayTag(date)}  ${COLORS.red}${errorType}${COLORS.reset}  ${detail}`
    );
  },

  connectivity: (report: ConnectivityReport) => {
    console.info(
      `${COLORS.dim}${timestamp()}${COLORS.reset}  source ${mark(report.source)}  sink ${mark(report.sink)}`
    );
  },

  backfill: {
    start: (config: { start: DateKey; end: DateKey; totalDays: number; skipExisting: boolean }) => {
      const skip = config.skipExisting ? 'yes' : `${COLORS.yellow}no (forced)${COLORS.reset}`;
      const lines = [
        '',
        `${COLORS.bold}Backfill started${COLORS.reset}`,
        `  range:          ${config.start} .. ${config.end}`,
        `  days:           ${formatNumber(config.totalDays)}`,
        `  skip existing:  ${skip}`,
        '',
      ];
      console.info(lines.join('\n'));
    },

    summary: (stats: { successful: number; skipped: number; failed: number; totalRecords: number; elapsed: number }) => {
      const status = (() => {
        if (stats.failed === 0) {
          return `${COLORS.green}${COLORS.bold}COMPLETED${COLORS.reset}`;
        }

        return `${COLORS.yellow}${COLORS.bold}COMPLETED WITH FAILURES${COLORS.reset}`;
      })();

      const failed = (() => {
        if (stats.failed > 0) {
          return `${COLORS.red}${formatNumber(stats.failed)}${COLORS.reset}`;
        }
        return `0${COLORS.reset}`;
      })();

      const lines = [
        '',
        `${COLORS.dim}${'─'.repeat(50)}${COLORS.reset}`,
        `  ${status}  ${COLORS.dim}(${formatElapsed(stats.elapsed)})${COLORS.reset}`,
        '',
        `  loaded:   ${COLORS.green}${formatNumber(stats.successful)}${COLORS.reset}`,
        `  skipped:  ${COLORS.yellow}${formatNumber(stats.skipped)}${COLORS.reset}`,
        `  failed:   ${failed}`,
        `  records:  ${COLORS.bold}${formatNumber(stats.totalRecords)}${COLORS.reset}`,
        `${COLORS.dim}${'─'.repeat(50)}${COLORS.reset}`,
        '',
      ];
      console.info(lines.join('\n'));
    },
  },
};

interface AwsServiceError {
  name: string;
  message?: string;
  $metadata: { httpStatusCode?: number; requestId?: string };
}

interface GoogleApiError {
  code: number | string;
  message?: string;
}

const isRecord = (value: unknown): value is Record<string, unknown> => value !== null && typeof value === 'object';

const isAwsServiceError = (err: unknown): err is AwsServiceError =>
  isRecord(err) && typeof err.name === 'string' && isRecord(err.$metadata);

const isGoogleApiError = (err: unknown): err is GoogleApiError =>
  err instanceof Error && isRecord(err) && (typeof err.code === 'number' || typeof err.code === 'string');

const firstLine = (message: string): string => message.split('\n')[0].slice(0, 200);

/**
 * One-line rendering of an error for log output.
 */
export const formatError = (err: unknown): string => {
  if (isAwsServiceError(err)) {
    const status = err.$metadata.httpStatusCode;
    const prefix = status === undefined ? err.name : `${err.name} (${status})`;
    return err.message ? `${prefix}: ${firstLine(err.message)}` : prefix;
  }

  if (isGoogleApiError(err)) {
    return `[${err.code}] ${firstLine(err.message ?? '')}`;
  }

  const msg = err instanceof Error ? err.message : String(err);
  return firstLine(msg);
};
