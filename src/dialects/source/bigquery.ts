import fs from 'node:fs';
import path from 'node:path';
import {
  BigQuery,
  BigQueryDate,
  BigQueryDatetime,
  BigQueryInt,
  BigQueryTime,
  BigQueryTimestamp,
  Geography,
} from '@google-cloud/bigquery';
import { z } from 'zod';
import { daysBetween, formatDateKey, fromCompactDate, toCompactDate } from '../../engine/dates';
import { SourceError } from '../../engine/errors';
import { formatError, log } from '../../engine/logger';
import type { ColumnType, DateKey, EventRecord, ExtractionResult } from '../../engine/types';
import type { EventSource, SourceConfig } from '../source';
import { registerSource } from '../source-registry';

const TABLE_PREFIX = 'events_';
const QUERY_FILE = path.resolve(__dirname, '../../../queries/extract_events.sql');

let queryTemplate: string | undefined;

const loadQueryTemplate = (): string => {
  if (queryTemplate === undefined) {
    queryTemplate = fs.readFileSync(QUERY_FILE, 'utf-8');
  }
  return queryTemplate;
};

/** GA4 daily export table of a day: `events_YYYYMMDD` */
export const tableIdForDate = (date: DateKey): string => `${TABLE_PREFIX}${toCompactDate(date)}`;

export const buildEventsQuery = (template: string, tableName: string): string =>
  template.split('{table_name}').join(tableName);

/**
 * Dates of daily export tables no more than `daysBack` days before `today`.
 * Intraday tables and ids that are not calendar dates are ignored. Newest first.
 */
export const datesFromTableIds = (tableIds: string[], today: DateKey, daysBack: number): DateKey[] => {
  const dates = new Set<DateKey>();

  for (const tableId of tableIds) {
    if (!tableId.startsWith(TABLE_PREFIX)) continue;
    const date = fromCompactDate(tableId.slice(TABLE_PREFIX.length));
    if (!date) continue;
    if (daysBetween(date, today) > daysBack) continue;
    dates.add(date);
  }

  return Array.from(dates).sort().reverse();
};

const isPlainObject = (value: unknown): value is Record<string, unknown> => {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
};

/**
 * BigQuery wraps temporal and geography values in classes; the sink only wants plain data.
 */
export const normalizeValue = (value: unknown): unknown => {
  if (
    value instanceof BigQueryTimestamp ||
    value instanceof BigQueryDate ||
    value instanceof BigQueryDatetime ||
    value instanceof BigQueryTime ||
    value instanceof BigQueryInt ||
    value instanceof Geography
  ) {
    return value.value;
  }
  if (Buffer.isBuffer(value)) return value.toString('base64');
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return value.map(normalizeValue);
  if (isPlainObject(value)) {
    return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, normalizeValue(v)]));
  }
  // NUMERIC and BIGNUMERIC arrive as Big instances
  if (value !== null && typeof value === 'object') return String(value);
  return value;
};

export const normalizeRow = (row: unknown): EventRecord => {
  if (!isPlainObject(row)) return {};
  const record: EventRecord = {};
  for (const [column, value] of Object.entries(row)) {
    record[column] = normalizeValue(value);
  }
  return record;
};

const SchemaFieldSchema = z.object({
  name: z.string(),
  type: z.string(),
  mode: z.string().optional(),
});

// Only the part of the query job resource that carries the result schema
const QueryJobMetadataSchema = z.object({
  statistics: z
    .object({
      query: z
        .object({
          schema: z.object({ fields: z.array(SchemaFieldSchema).optional() }).optional(),
        })
        .optional(),
    })
    .optional(),
});

export type SchemaField = z.infer<typeof SchemaFieldSchema>;

/** Result schema fields of a finished query job; empty when the resource carries none */
export const schemaFieldsOf = (metadata: unknown): SchemaField[] => {
  const parsed = QueryJobMetadataSchema.safeParse(metadata);
  if (!parsed.success) return [];
  return parsed.data.statistics?.query?.schema?.fields ?? [];
};

const FIELD_TYPES: Record<string, ColumnType> = {
  STRING: 'string',
  BYTES: 'string',
  JSON: 'string',
  INTEGER: 'int64',
  INT64: 'int64',
  FLOAT: 'double',
  FLOAT64: 'double',
  BOOLEAN: 'boolean',
  BOOL: 'boolean',
  RECORD: 'json',
  STRUCT: 'json',
};

/**
 * Column type of a result schema field. Repeated fields and records are nested data; NUMERIC,
 * temporal and geography values arrive as strings after normalization.
 */
export const columnTypeForField = (field: SchemaField): ColumnType => {
  if (field.mode === 'REPEATED') return 'json';
  const type: ColumnType | undefined = FIELD_TYPES[field.type.toUpperCase()];
  return type ?? 'string';
};

/** Union of record keys in first-seen order */
export const collectColumns = (records: EventRecord[]): string[] => {
  const columns = new Set<string>();
  for (const record of records) {
    for (const column of Object.keys(record)) columns.add(column);
  }
  return Array.from(columns);
};

/**
 * Column names and types of a result. The schema decides both; columns only seen in the rows
 * are appended as JSON.
 */
export const resultColumns = (
  fields: SchemaField[],
  records: EventRecord[]
): { columns: string[]; columnTypes: Record<string, ColumnType> } => {
  const columnTypes: Record<string, ColumnType> = {};
  for (const field of fields) {
    columnTypes[field.name] = columnTypeForField(field);
  }
  for (const column of collectColumns(records)) {
    if (!(column in columnTypes)) columnTypes[column] = 'json';
  }
  return { columns: Object.keys(columnTypes), columnTypes };
};

export type QueryRequest = {
  query: string;
  location: string;
  params: Record<string, string>;
};

export type QueryResult = {
  rows: unknown[];
  fields: SchemaField[];
};

/**
 * The warehouse calls the source makes.
 */
export interface WarehouseClient {
  datasetExists(datasetId: string): Promise<boolean>;
  tableExists(datasetId: string, tableId: string): Promise<boolean>;
  listTableIds(datasetId: string): Promise<string[]>;
  runQuery(request: QueryRequest): Promise<QueryResult>;
}

/**
 * `WarehouseClient` over the BigQuery client. The result schema is read from the finished job.
 */
export const bigQueryWarehouse = (bigquery: BigQuery): WarehouseClient => ({
  datasetExists: async (datasetId) => {
    const [exists] = await bigquery.dataset(datasetId).exists();
    return exists;
  },

  tableExists: async (datasetId, tableId) => {
    const [exists] = await bigquery.dataset(datasetId).table(tableId).exists();
    return exists;
  },

  listTableIds: async (datasetId) => {
    const [tables] = await bigquery.dataset(datasetId).getTables();
    return tables.flatMap((table) => (table.id ? [table.id] : []));
  },

  runQuery: async (request) => {
    const [job] = await bigquery.createQueryJob(request);
    const [rows] = await job.getQueryResults();
    const [metadata] = await job.getMetadata();
    return { rows, fields: schemaFieldsOf(metadata) };
  },
});

/**
 * BigQuery event source.
 * Reads the GA4 daily export tables (`events_YYYYMMDD`) of one dataset.
 */
export class BigQueryEventSource implements EventSource {
  readonly name = 'bigquery';

  private readonly client: WarehouseClient;
  private readonly projectId: string;
  private readonly datasetId: string;
  private readonly location: string;
  private readonly now: () => Date;

  constructor(config: SourceConfig, options: { client?: WarehouseClient; now?: () => Date } = {}) {
    if (config.type !== 'bigquery') {
      throw new Error('Invalid config type for BigQuery source');
    }
    this.projectId = config.projectId;
    this.datasetId = config.datasetId;
    this.location = config.location;
    this.client =
      options.client ??
      bigQueryWarehouse(
        new BigQuery({
          projectId: config.projectId,
          keyFilename: config.credentialsPath,
          location: config.location,
        })
      );
    this.now = options.now ?? (() => new Date());
  }

  async extractEvents(date: DateKey): Promise<ExtractionResult> {
    const tableId = tableIdForDate(date);
    const tableName = `${this.projectId}.${this.datasetId}.${tableId}`;

    let exists: boolean;
    try {
      exists = await this.client.tableExists(this.datasetId, tableId);
    } catch (err) {
      throw new SourceError(`Could not probe ${tableName}: ${formatError(err)}`, { cause: err });
    }

    if (!exists) {
      log.warn(`Table ${tableName} does not exist`);
      return { kind: 'empty', date, reason: 'table-missing' };
    }

    log.day(date, `extracting events from ${tableName}`);

    let result: QueryResult;
    try {
      result = await this.client.runQuery({
        query: buildEventsQuery(loadQueryTemplate(), tableName),
        location: this.location,
        params: { event_date: toCompactDate(date) },
      });
    } catch (err) {
      throw new SourceError(`Query failed for ${date}: ${formatError(err)}`, { cause: err });
    }

    if (result.rows.length === 0) {
      return { kind: 'empty', date, reason: 'no-rows' };
    }

    const records = result.rows.map(normalizeRow);
    log.day(date, `extracted ${records.length.toLocaleString('en-US')} events`);

    return {
      kind: 'batch',
      date,
      recordCount: records.length,
      ...resultColumns(result.fields, records),
      records,
    };
  }

  async listAvailableDates(daysBack: number): Promise<Set<DateKey>> {
    const tableIds = await this.client.listTableIds(this.datasetId);
    return new Set(datesFromTableIds(tableIds, formatDateKey(this.now()), daysBack));
  }

  async testConnection(): Promise<boolean> {
    try {
      const exists = await this.client.datasetExists(this.datasetId);
      if (!exists) {
        log.error(`BigQuery dataset not found: ${this.projectId}.${this.datasetId}`);
        return false;
      }
      log.success(`Connected to BigQuery dataset ${this.projectId}.${this.datasetId}`);
      return true;
    } catch (err) {
      log.error(`BigQuery connection test failed: ${formatError(err)}`);
      return false;
    }
  }
}

// Register the source
registerSource('bigquery', (config: SourceConfig) => new BigQueryEventSource(config));
