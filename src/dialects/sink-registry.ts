import type { ObjectSink, SinkConfig } from './sink';

type ObjectSinkFactory = (config: SinkConfig) => ObjectSink;

const sinks: Record<string, ObjectSinkFactory> = {};

/**
 * Register an object sink factory.
 * Call this in each sink implementation to register itself.
 */
export const registerSink = (type: string, factory: ObjectSinkFactory): void => {
  sinks[type] = factory;
};

/**
 * Create an object sink from configuration
 */
export const createSink = (config: SinkConfig): ObjectSink => {
  const factory = sinks[config.type];
  if (!factory) {
    const available = Object.keys(sinks).join(', ');
    throw new Error(`Unknown sink type "${config.type}". Available: ${available}`);
  }
  return factory(config);
};

/**
 * List all registered sink types
 */
export const listSinkTypes = (): string[] => Object.keys(sinks);
