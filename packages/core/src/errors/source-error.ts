/**
 * Errors raised by schema and sample sources
 */

export type SourceErrorCode =
  | 'CONNECTION_FAILED'
  | 'READ_FAILED'
  | 'NOT_FOUND'
  | 'INVALID_IDENTIFIER'
  | 'SCHEMA_INVALID'
  | 'TIMEOUT'
  | 'UNKNOWN';

export interface SourceErrorDetails {
  /** Error code for programmatic handling */
  code: SourceErrorCode;
  message: string;
  /** Source that raised the error */
  sourceId?: string;
  /** Suggested action to resolve */
  suggestion?: string;
  cause?: Error;
  context?: Record<string, unknown>;
}

export class SourceError extends Error {
  readonly code: SourceErrorCode;
  readonly sourceId?: string;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: SourceErrorDetails) {
    super(details.message);
    this.name = 'SourceError';
    this.code = details.code;
    this.sourceId = details.sourceId;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }

    Error.captureStackTrace(this, SourceError);
  }

  /**
   * Structured message with the code, source and suggested action
   */
  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];

    if (this.sourceId) {
      parts.push(`Source: ${this.sourceId}`);
    }

    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }

    return parts.join('\n');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      sourceId: this.sourceId,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}

/**
 * Wrap an unknown thrown value as a SourceError
 */
export function wrapError(
  error: unknown,
  sourceId?: string,
  defaultCode: SourceErrorCode = 'UNKNOWN'
): SourceError {
  if (error instanceof SourceError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return new SourceError({
    code: defaultCode,
    message,
    sourceId,
    cause,
  });
}
