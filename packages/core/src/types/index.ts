export * from './schema.js';
export * from './relationship.js';
