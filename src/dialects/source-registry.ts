import type { EventSource, SourceConfig } from './source';

type EventSourceFactory = (config: SourceConfig) => EventSource;

const sources: Record<string, EventSourceFactory> = {};

/**
 * Register an event source factory.
 * Call this in each source implementation to register itself.
 */
export const registerSource = (type: string, factory: EventSourceFactory): void => {
  sources[type] = factory;
};

/**
 * Create an event source from configuration
 */
export const createSource = (config: SourceConfig): EventSource => {
  const factory = sources[config.type];
  if (!factory) {
    const available = Object.keys(sources).join(', ');
    throw new Error(`Unknown source type "${config.type}". Available: ${available}`);
  }
  return factory(config);
};

/**
 * List all registered source types
 */
export const listSourceTypes = (): string[] => Object.keys(sources);
