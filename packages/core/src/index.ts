/**
 * @relscout/core
 *
 * Data model, source interfaces and shared runtime utilities
 */

// Types
export * from './types/index.js';

// Interfaces
export * from './interfaces/index.js';

// Errors
export * from './errors/index.js';

// Validation schemas
export * from './validation/index.js';

// Logging
export * from './logging/index.js';

// Concurrency
export * from './concurrency/index.js';
