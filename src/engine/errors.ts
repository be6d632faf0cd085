/**
 * Error taxonomy of the pipeline.
 *
 * Source and sink errors are fatal to the day they happen in and are turned into
 * `failed` results at the day boundary. Range and date errors are caller mistakes and
 * are raised before any day runs.
 */

/** Warehouse query or probe failed */
export class SourceError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SourceError';
  }
}

/** Object store transport or permission failure */
export class SinkError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SinkError';
  }
}

/** Sidecar metadata could not be written. Logged, never propagated. */
export class MetadataWriteError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'MetadataWriteError';
  }
}

export class InvalidRangeError extends Error {
  readonly start: string;
  readonly end: string;

  constructor(start: string, end: string) {
    super(`Invalid range: start ${start} is after end ${end}`);
    this.name = 'InvalidRangeError';
    this.start = start;
    this.end = end;
  }
}

export class InvalidDateError extends Error {
  readonly value: string;

  constructor(value: string) {
    super(`Invalid date "${value}": expected YYYY-MM-DD`);
    this.name = 'InvalidDateError';
    this.value = value;
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Text captured in day results for a failure.
 */
export const describeError = (err: unknown): string => {
  if (err instanceof Error) return err.message;
  return String(err);
};
