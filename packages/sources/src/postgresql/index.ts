/**
 * PostgreSQL Sources
 *
 * Schema metadata and column samples read through pg.
 */

export { PostgresClient, normalizeType, toSampleValue } from './client.js';
export type { PostgresClientConfig, PostgresColumn } from './client.js';

export { PostgresSchemaSource } from './schema-source.js';
export type { PostgresSchemaSourceOptions } from './schema-source.js';
export { PostgresSampleSource } from './sample-source.js';
