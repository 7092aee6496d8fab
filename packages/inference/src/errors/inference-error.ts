/**
 * Inference Error Types
 */

export type InferenceErrorCode =
  | 'CONFIG_INVALID'
  | 'RULES_INVALID'
  | 'STATE_CORRUPT'
  | 'STORE_ERROR'
  | 'SAMPLE_FAILED'
  | 'GROUP_TIMEOUT'
  | 'RUN_ABORTED';

export interface InferenceErrorDetails {
  code: InferenceErrorCode;
  message: string;
  suggestion?: string;
  cause?: Error;
  context?: Record<string, unknown>;
}

export class InferenceError extends Error {
  readonly code: InferenceErrorCode;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: InferenceErrorDetails) {
    super(details.message);
    this.name = 'InferenceError';
    this.code = details.code;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }
  }

  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];
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
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
