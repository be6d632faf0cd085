export type { EventSource, SourceConfig } from './source';
export type { ObjectSink, SinkConfig, SinkMode } from './sink';
export { createSource, listSourceTypes, registerSource } from './source-registry';
export { createSink, listSinkTypes, registerSink } from './sink-registry';
