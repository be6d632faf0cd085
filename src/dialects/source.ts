import type { DateKey, ExtractionResult } from '../engine/types';

/**
 * Event source interface.
 * Implement this to read one day of analytics events from a warehouse.
 */
export interface EventSource {
  /** Unique name for logging and diagnostics */
  readonly name: string;

  /**
   * Extract one day's events. A day whose data is not materialized yet comes back as
   * `{ kind: 'empty' }`; a failing query raises `SourceError`.
   */
  extractEvents(date: DateKey): Promise<ExtractionResult>;

  /** Days with materialized data within the lookback window. Malformed identifiers are ignored. */
  listAvailableDates(daysBack: number): Promise<Set<DateKey>>;

  /** Best-effort reachability probe, never raises */
  testConnection(): Promise<boolean>;

  /** Optional: cleanup resources when done */
  close?(): Promise<void>;
}

/**
 * Configuration for event sources
 */
export type SourceConfig =
  | { type: 'bigquery'; projectId: string; datasetId: string; location: string; credentialsPath?: string }
  | { type: 'custom'; [key: string]: unknown };
