export { SourceError, wrapError } from './source-error.js';
export type { SourceErrorCode, SourceErrorDetails } from './source-error.js';
