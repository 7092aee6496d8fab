export { JsonFileStore, MemoryDocumentStore } from './document-store.js';
export { RelationshipCache, DEFAULT_CACHE_KEY, DEFAULT_CACHE_TTL_HOURS } from './relationship-cache.js';
export type { CacheStats, RelationshipCacheOptions } from './relationship-cache.js';
export { IncrementalProcessor, DEFAULT_STATE_KEY } from './incremental-processor.js';
export type {
  IncrementalState,
  IncrementalStats,
  IncrementalProcessorOptions,
  TableSelection,
} from './incremental-processor.js';
export { tableFingerprint } from './fingerprint.js';
