/**
 * Calendar day in `YYYY-MM-DD` form. Lexicographic order is chronological order.
 */
export type DateKey = string;

/** One event row as returned by the warehouse, normalised to JSON-like values */
export type EventRecord = Record<string, unknown>;

/**
 * Why a day produced no batch: the day's table is not materialized yet, or it is empty.
 */
export type EmptyReason = 'table-missing' | 'no-rows';

export type EmptyExtraction = {
  kind: 'empty';
  date: DateKey;
  reason: EmptyReason;
};

/**
 * Storage-neutral column type, taken from the warehouse result schema so every day of a
 * dataset is written with the same types whatever its values.
 */
export type ColumnType = 'string' | 'int64' | 'double' | 'boolean' | 'json';

export type ExtractedBatch = {
  kind: 'batch';
  date: DateKey;
  /** Always > 0 */
  recordCount: number;
  /** Column names in result schema order */
  columns: string[];
  columnTypes: Record<string, ColumnType>;
  records: EventRecord[];
};

/**
 * Output of one `extractEvents` call. Consumed by the sink right away, then dropped.
 */
export type ExtractionResult = EmptyExtraction | ExtractedBatch;

export const NO_DATA_MESSAGE = 'No data found';

/**
 * Terminal outcome of the per-day state machine.
 * The variants are mutually exclusive: `status` is the discriminant, the boolean
 * fields are kept for callers that only care about success/skip.
 */
export type DailyRunResult =
  | {
      status: 'success';
      date: DateKey;
      success: true;
      skipped: false;
      recordsExtracted: number;
      sinkLocation: string;
    }
  | {
      status: 'skipped';
      date: DateKey;
      success: true;
      skipped: true;
      recordsExtracted: 0;
    }
  | {
      status: 'no-data';
      date: DateKey;
      success: false;
      skipped: false;
      recordsExtracted: 0;
      error: typeof NO_DATA_MESSAGE;
    }
  | {
      status: 'failed';
      date: DateKey;
      success: false;
      skipped: false;
      recordsExtracted: number;
      error: string;
    };

/** `no-data` days are benign; `error` days count as failures for the exit code */
export type FailureReason = 'no-data' | 'error';

export type FailedDay = {
  date: DateKey;
  reason: FailureReason;
  error: string;
};

/**
 * Aggregate of a backfill. Every day of the range lands in exactly one of
 * `successful`, `skipped` or `failed`, in chronological order.
 */
export type BackfillReport = {
  start: DateKey;
  end: DateKey;
  totalDays: number;
  successful: DateKey[];
  skipped: DateKey[];
  failed: FailedDay[];
  /** Records of successful, non-skipped days only */
  totalRecords: number;
};

export type ConnectivityReport = {
  source: boolean;
  sink: boolean;
};

export type StatusReport = {
  connectivity: ConnectivityReport;
  sourceDates: Set<DateKey>;
  sinkDates: Set<DateKey>;
  /** `sourceDates` minus `sinkDates` */
  missingDates: Set<DateKey>;
};

/**
 * Metadata sidecar written next to each day's data object.
 */
export type PartitionMetadata = {
  date: DateKey;
  data_type: string;
  record_count: number;
  columns: string[];
  file_size_mb: number;
  upload_timestamp: string;
  sink_location: string;
  dtypes: Record<string, string>;
};
