import type { EventSource } from '../dialects/source';
import type { ObjectSink } from '../dialects/sink';
import { SinkError, SourceError } from './errors';
import type { ColumnType, DateKey, EventRecord, ExtractedBatch, ExtractionResult } from './types';

/**
 * In-memory event source for tests. Days without records come back empty; days listed in
 * `failing` raise `SourceError`.
 */
export class InMemoryEventSource implements EventSource {
  readonly name = 'memory-source';

  readonly extractCalls: DateKey[] = [];
  reachable = true;
  failListing = false;

  private readonly days: Map<DateKey, EventRecord[]>;
  private readonly failing: Map<DateKey, string>;

  constructor(days: Record<DateKey, EventRecord[]> = {}, failing: Record<DateKey, string> = {}) {
    this.days = new Map(Object.entries(days));
    this.failing = new Map(Object.entries(failing));
  }

  async extractEvents(date: DateKey): Promise<ExtractionResult> {
    this.extractCalls.push(date);

    const failure = this.failing.get(date);
    if (failure !== undefined) throw new SourceError(failure);

    const records = this.days.get(date);
    if (!records) return { kind: 'empty', date, reason: 'table-missing' };
    if (records.length === 0) return { kind: 'empty', date, reason: 'no-rows' };

    const columns = Object.keys(records[0]);
    const columnTypes: Record<string, ColumnType> = {};
    for (const column of columns) columnTypes[column] = 'json';

    return {
      kind: 'batch',
      date,
      recordCount: records.length,
      columns,
      columnTypes,
      records,
    };
  }

  async listAvailableDates(): Promise<Set<DateKey>> {
    if (this.failListing) throw new SourceError('listing failed');
    return new Set(this.days.keys());
  }

  async testConnection(): Promise<boolean> {
    if (!this.reachable) throw new SourceError('source unreachable');
    return true;
  }
}

/**
 * In-memory object sink for tests. Uploads are visible to `exists` right away.
 */
export class InMemoryObjectSink implements ObjectSink {
  readonly name = 'memory-sink';

  readonly uploads: ExtractedBatch[] = [];
  reachable = true;
  failListing = false;
  failExists = false;
  closed = false;

  private readonly stored: Set<DateKey>;
  private readonly failingUploads: Set<DateKey>;

  constructor(existing: DateKey[] = [], failingUploads: DateKey[] = []) {
    this.stored = new Set(existing);
    this.failingUploads = new Set(failingUploads);
  }

  async exists(date: DateKey): Promise<boolean> {
    if (this.failExists) throw new SinkError('access denied');
    return this.stored.has(date);
  }

  async upload(batch: ExtractedBatch, date: DateKey): Promise<string> {
    if (this.failingUploads.has(date)) throw new SinkError(`upload rejected for ${date}`);
    this.uploads.push(batch);
    this.stored.add(date);
    return `memory://${date}/data.parquet`;
  }

  async listAvailableDates(limit: number): Promise<DateKey[]> {
    if (this.failListing) throw new SinkError('listing failed');
    return Array.from(this.stored).sort().reverse().slice(0, limit);
  }

  async testConnection(): Promise<boolean> {
    return this.reachable;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
