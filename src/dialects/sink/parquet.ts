import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { ParquetSchema, ParquetWriter } from '@dsnp/parquetjs';
import type { ColumnType, EventRecord, ExtractedBatch } from '../../engine/types';

export type ParquetType = 'UTF8' | 'INT64' | 'DOUBLE' | 'BOOLEAN' | 'JSON';

export type EncodedBatch = {
  body: Buffer;
  /** Column name -> Parquet type, as written */
  dtypes: Record<string, ParquetType>;
};

export type BatchEncoder = (batch: ExtractedBatch) => Promise<EncodedBatch>;

const PARQUET_TYPES: Record<ColumnType, ParquetType> = {
  string: 'UTF8',
  int64: 'INT64',
  double: 'DOUBLE',
  boolean: 'BOOLEAN',
  json: 'JSON',
};

/**
 * Parquet type of every column of the batch. Columns the schema does not describe are written as JSON.
 */
export const parquetTypes = (batch: ExtractedBatch): Record<string, ParquetType> => {
  const dtypes: Record<string, ParquetType> = {};
  for (const column of batch.columns) {
    const type: ColumnType | undefined = batch.columnTypes[column];
    dtypes[column] = type === undefined ? 'JSON' : PARQUET_TYPES[type];
  }
  return dtypes;
};

const toText = (value: unknown): string => {
  if (typeof value === 'string') return value;
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
};

const coerce = (value: unknown, type: ParquetType): unknown => {
  switch (type) {
    case 'UTF8':
      return toText(value);
    case 'DOUBLE':
      return Number(value);
    case 'BOOLEAN':
      return typeof value === 'boolean' ? value : toText(value) === 'true';
    case 'INT64':
    case 'JSON':
      return value;
  }
};

const toRow = (record: EventRecord, dtypes: Record<string, ParquetType>): Record<string, unknown> => {
  const row: Record<string, unknown> = {};
  for (const [column, type] of Object.entries(dtypes)) {
    const value = record[column];
    if (value === null || value === undefined) continue;
    row[column] = coerce(value, type);
  }
  return row;
};

/**
 * Encode a batch as a single Parquet file. The writer works on files, so the output goes
 * through a temporary directory that is removed afterwards.
 */
export const encodeParquet: BatchEncoder = async (batch) => {
  const dtypes = parquetTypes(batch);
  const schema = new ParquetSchema(
    Object.fromEntries(batch.columns.map((column) => [column, { type: dtypes[column], optional: true }]))
  );

  const dir = await mkdtemp(path.join(tmpdir(), 'bronze-'));
  const file = path.join(dir, 'data.parquet');

  try {
    const writer = await ParquetWriter.openFile(schema, file);
    try {
      for (const record of batch.records) {
        await writer.appendRow(toRow(record, dtypes));
      }
    } finally {
      await writer.close();
    }

    return { body: await readFile(file), dtypes };
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
};
