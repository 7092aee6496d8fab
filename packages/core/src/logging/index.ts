export { Logger, redactSecrets, createQuietLogger } from './logger.js';
export type { LogLevel, LogFormat, LogSink, LoggerOptions } from './logger.js';
