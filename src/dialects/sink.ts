import type { DateKey, ExtractedBatch } from '../engine/types';

export type SinkMode = 'production' | 'sandbox';

/**
 * Object sink interface.
 * Implement this to write daily batches to a date-partitioned store.
 */
export interface ObjectSink {
  /** Unique name for logging and diagnostics */
  readonly name: string;

  /**
   * True iff the day's data object is present. "Not found" is `false`; transport and
   * permission failures raise `SinkError`.
   */
  exists(date: DateKey): Promise<boolean>;

  /**
   * Write the batch to the day's partition, then the metadata sidecar.
   * Returns the location of the data object. Only the data write is fatal.
   */
  upload(batch: ExtractedBatch, date: DateKey): Promise<string>;

  /** Most recent first, at most `limit` days */
  listAvailableDates(limit: number): Promise<DateKey[]>;

  /** Best-effort reachability probe, never raises */
  testConnection(): Promise<boolean>;

  /** Optional: cleanup resources when done */
  close?(): Promise<void>;
}

/**
 * Configuration for object sinks
 */
export type SinkConfig =
  | {
      type: 's3-parquet';
      bucket: string;
      prefix: string;
      dataType: string;
      region: string;
      mode: SinkMode;
      sandboxEndpoint: string;
    }
  | { type: 'custom'; [key: string]: unknown };
