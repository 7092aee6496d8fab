export { JsonSchemaSource } from './json-schema-source.js';
export type { JsonSchemaSourceConfig } from './json-schema-source.js';
