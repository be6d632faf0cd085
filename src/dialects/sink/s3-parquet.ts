import {
  CreateBucketCommand,
  HeadBucketCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import { isDateKey, partitionParts } from '../../engine/dates';
import { MetadataWriteError, SinkError } from '../../engine/errors';
import { formatError, log } from '../../engine/logger';
import type { DateKey, ExtractedBatch, PartitionMetadata } from '../../engine/types';
import type { ObjectSink, SinkConfig, SinkMode } from '../sink';
import { registerSink } from '../sink-registry';
import { encodeParquet, type BatchEncoder } from './parquet';

const DATA_FILE = 'data.parquet';
const METADATA_FILE = 'metadata.json';
const PARTITION_PATTERN = /year=(\d{4})\/month=(\d{1,2})\/day=(\d{1,2})\/data\.parquet$/;

// LocalStack accepts any credentials
const SANDBOX_CREDENTIALS = { accessKeyId: 'test', secretAccessKey: 'test' };

export type S3SinkOptions = {
  client?: S3Client;
  encode?: BatchEncoder;
  now?: () => Date;
};

/**
 * `{prefix}/{dataType}/year=YYYY/month=MM/day=DD/{fileName}`
 */
export const partitionKey = (prefix: string, dataType: string, date: DateKey, fileName: string): string => {
  const { year, month, day } = partitionParts(date);
  const base = [prefix, dataType].filter((part) => part !== '').join('/');
  return `${base}/year=${year}/month=${month}/day=${day}/${fileName}`;
};

/**
 * Date of a partition data object key, or undefined for anything else.
 */
export const dateFromPartitionKey = (key: string): DateKey | undefined => {
  const match = PARTITION_PATTERN.exec(key);
  if (!match) return undefined;
  const date = `${match[1]}-${match[2].padStart(2, '0')}-${match[3].padStart(2, '0')}`;
  return isDateKey(date) ? date : undefined;
};

const isNotFound = (err: unknown): boolean => {
  if (!(err instanceof S3ServiceException)) return false;
  return err.name === 'NotFound' || err.name === 'NoSuchKey' || err.$metadata.httpStatusCode === 404;
};

const httpStatus = (err: unknown): number | undefined =>
  err instanceof S3ServiceException ? err.$metadata.httpStatusCode : undefined;

const createClient = (region: string, mode: SinkMode, sandboxEndpoint: string): S3Client => {
  if (mode === 'sandbox') {
    return new S3Client({
      region,
      endpoint: sandboxEndpoint,
      forcePathStyle: true,
      credentials: SANDBOX_CREDENTIALS,
    });
  }
  return new S3Client({ region });
};

/**
 * S3 Parquet sink.
 * Writes each day as one Parquet object plus a JSON metadata sidecar, Hive-style partitioned.
 */
export class S3ParquetSink implements ObjectSink {
  readonly name = 's3-parquet';

  private readonly client: S3Client;
  private readonly bucket: string;
  private readonly prefix: string;
  private readonly dataType: string;
  private readonly mode: SinkMode;
  private readonly encode: BatchEncoder;
  private readonly now: () => Date;

  constructor(config: SinkConfig, options: S3SinkOptions = {}) {
    if (config.type !== 's3-parquet') {
      throw new Error('Invalid config type for S3 Parquet sink');
    }
    this.bucket = config.bucket;
    this.prefix = config.prefix.replace(/^\/+|\/+$/g, '');
    this.dataType = config.dataType;
    this.mode = config.mode;
    this.client = options.client ?? createClient(config.region, config.mode, config.sandboxEndpoint);
    this.encode = options.encode ?? encodeParquet;
    this.now = options.now ?? (() => new Date());

    if (this.mode === 'sandbox') {
      log.info(`Using sandbox S3 at ${config.sandboxEndpoint}`);
    }
  }

  private key(date: DateKey, fileName: string): string {
    return partitionKey(this.prefix, this.dataType, date, fileName);
  }

  private location(key: string): string {
    return `s3://${this.bucket}/${key}`;
  }

  async exists(date: DateKey): Promise<boolean> {
    const key = this.key(date, DATA_FILE);
    try {
      await this.client.send(new HeadObjectCommand({ Bucket: this.bucket, Key: key }));
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw new SinkError(`Existence check failed for ${this.location(key)}: ${formatError(err)}`, { cause: err });
    }
  }

  async upload(batch: ExtractedBatch, date: DateKey): Promise<string> {
    const key = this.key(date, DATA_FILE);
    const location = this.location(key);

    const encoded = await this.encode(batch);

    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: encoded.body,
          ContentType: 'application/octet-stream',
        })
      );
    } catch (err) {
      throw new SinkError(`Upload failed for ${location}: ${formatError(err)}`, { cause: err });
    }

    log.day(date, `uploaded ${batch.recordCount.toLocaleString('en-US')} records to ${location}`);

    const metadata: PartitionMetadata = {
      date,
      data_type: this.dataType,
      record_count: batch.recordCount,
      columns: batch.columns,
      file_size_mb: Math.round((encoded.body.byteLength / (1024 * 1024)) * 100) / 100,
      upload_timestamp: this.now().toISOString(),
      sink_location: location,
      dtypes: encoded.dtypes,
    };

    try {
      await this.writeMetadata(date, metadata);
    } catch (err) {
      if (!(err instanceof MetadataWriteError)) throw err;
      log.warn(err.message);
    }

    return location;
  }

  private async writeMetadata(date: DateKey, metadata: PartitionMetadata): Promise<void> {
    const key = this.key(date, METADATA_FILE);
    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: JSON.stringify(metadata, null, 2),
          ContentType: 'application/json',
        })
      );
    } catch (err) {
      throw new MetadataWriteError(`Failed to write metadata ${this.location(key)}: ${formatError(err)}`, {
        cause: err,
      });
    }
  }

  async listAvailableDates(limit: number): Promise<DateKey[]> {
    const prefix = [this.prefix, this.dataType].filter((part) => part !== '').join('/') + '/';
    const dates = new Set<DateKey>();
    let continuationToken: string | undefined;

    do {
      const response = await this.client.send(
        new ListObjectsV2Command({
          Bucket: this.bucket,
          Prefix: prefix,
          ContinuationToken: continuationToken,
        })
      );

      for (const object of response.Contents ?? []) {
        const date = object.Key ? dateFromPartitionKey(object.Key) : undefined;
        if (date) dates.add(date);
      }

      continuationToken = response.NextContinuationToken;
    } while (continuationToken);

    return Array.from(dates)
      .sort()
      .reverse()
      .slice(0, Math.max(0, limit));
  }

  async testConnection(): Promise<boolean> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: this.bucket }));
      log.success(`Connected to S3 bucket ${this.bucket}`);
      return true;
    } catch (err) {
      if (this.mode === 'sandbox' && isNotFound(err)) {
        return this.createSandboxBucket();
      }

      const status = httpStatus(err);
      if (status === 404) {
        log.error(`S3 bucket not found: ${this.bucket}`);
      } else if (status === 403) {
        log.error(`Access denied to S3 bucket: ${this.bucket}`);
      } else {
        log.error(`S3 connection test failed: ${formatError(err)}`);
      }
      return false;
    }
  }

  private async createSandboxBucket(): Promise<boolean> {
    try {
      log.info(`Creating sandbox bucket ${this.bucket}`);
      await this.client.send(new CreateBucketCommand({ Bucket: this.bucket }));
      return true;
    } catch (err) {
      log.error(`Could not create sandbox bucket ${this.bucket}: ${formatError(err)}`);
      return false;
    }
  }

  async close(): Promise<void> {
    this.client.destroy();
  }
}

// Register the sink
registerSink('s3-parquet', (config: SinkConfig) => new S3ParquetSink(config));
