import type { PipelineConfig } from '../config';
import { createSink, createSource } from '../dialects';
import { Orchestrator, type OrchestratorOptions } from './orchestrator';

// Import dialects to register them
import '../dialects/source/bigquery';
import '../dialects/sink/s3-parquet';

/**
 * Build an orchestrator with the source and sink named by the configuration.
 */
export const createOrchestrator = (config: PipelineConfig, options: OrchestratorOptions = {}): Orchestrator => {
  const source = createSource(config.source);
  const sink = createSink(config.sink);
  return new Orchestrator(source, sink, options);
};
