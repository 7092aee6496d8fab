export { Semaphore, Mutex } from './semaphore.js';
export { withTimeout, TimeoutError, AbortedError } from './timeout.js';
