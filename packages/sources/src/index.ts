/**
 * @relscout/sources
 *
 * Schema and sample sources: JSON schema files, CSV sample directories and
 * PostgreSQL databases.
 */

export * from './json/index.js';
export * from './csv/index.js';
export * from './postgresql/index.js';
