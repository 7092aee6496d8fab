export { InferenceError, describeError } from './inference-error.js';
export type { InferenceErrorCode, InferenceErrorDetails } from './inference-error.js';
