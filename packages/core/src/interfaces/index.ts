export type { SampleValue, SchemaSource, SampleSource } from './sources.js';
export type { DocumentStore } from './store.js';
