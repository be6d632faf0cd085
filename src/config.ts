import { z } from 'zod';
import type { SinkConfig, SourceConfig } from './dialects';
import { ConfigError } from './engine/errors';

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value === '' ? undefined : value));

const required = (name: string) => z.string({ required_error: `${name} is required` }).trim().min(1, `${name} is required`);

const EnvSchema = z.object({
  GCP_PROJECT_ID: required('GCP_PROJECT_ID'),
  GA4_DATASET_ID: required('GA4_DATASET_ID'),
  GOOGLE_APPLICATION_CREDENTIALS: optionalString,
  BIGQUERY_LOCATION: z.string().trim().min(1).default('US'),
  S3_BUCKET: required('S3_BUCKET'),
  S3_PREFIX: z.string().trim().default('bronze/ga4'),
  DATA_TYPE: z.string().trim().min(1).default('events'),
  AWS_REGION: z.string().trim().min(1).default('us-east-1'),
  SINK_MODE: z.enum(['production', 'sandbox']).default('production'),
  SANDBOX_ENDPOINT: z.string().trim().url().default('http://localhost:4566'),
});

export type PipelineConfig = {
  readonly source: SourceConfig;
  readonly sink: SinkConfig;
};

/**
 * Build the pipeline configuration from environment variables.
 * Throws `ConfigError` naming every variable that is missing or invalid.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): PipelineConfig => {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const key = issue.path.join('.');
      return issue.message.startsWith(key) ? issue.message : `${key}: ${issue.message}`;
    });
    throw new ConfigError(issues);
  }

  const vars = parsed.data;

  const config: PipelineConfig = {
    source: {
      type: 'bigquery',
      projectId: vars.GCP_PROJECT_ID,
      datasetId: vars.GA4_DATASET_ID,
      location: vars.BIGQUERY_LOCATION,
      credentialsPath: vars.GOOGLE_APPLICATION_CREDENTIALS,
    },
    sink: {
      type: 's3-parquet',
      bucket: vars.S3_BUCKET,
      prefix: vars.S3_PREFIX,
      dataType: vars.DATA_TYPE,
      region: vars.AWS_REGION,
      mode: vars.SINK_MODE,
      sandboxEndpoint: vars.SANDBOX_ENDPOINT,
    },
  };

  return Object.freeze(config);
};
