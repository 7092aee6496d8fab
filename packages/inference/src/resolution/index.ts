export { resolveConflicts } from './conflict-resolver.js';
export { RelationshipFilter, dedupeTablePairs } from './relationship-filter.js';
export { checkRelationships } from './relationship-check.js';
