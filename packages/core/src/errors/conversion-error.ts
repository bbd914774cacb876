/**
 * Error type for failures outside the per-line recovery path:
 * file access and input limits.
 */

export type ErrorCode =
  | 'NOT_FOUND'
  | 'PERMISSION_DENIED'
  | 'READ_FAILED'
  | 'WRITE_FAILED'
  | 'INPUT_TOO_LARGE'
  | 'UNKNOWN';

export interface ConversionErrorDetails {
  /** Error code for programmatic handling */
  code: ErrorCode;
  /** Human-readable message */
  message: string;
  /** File or directory the error relates to */
  source?: string;
  /** Suggested action to resolve */
  suggestion?: string;
  /** Original error (if wrapping) */
  cause?: Error;
  /** Additional context */
  context?: Record<string, unknown>;
}

export class ConversionError extends Error {
  readonly code: ErrorCode;
  readonly source?: string;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: ConversionErrorDetails) {
    super(details.message);
    this.name = 'ConversionError';
    this.code = details.code;
    this.source = details.source;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }

    Error.captureStackTrace(this, ConversionError);
  }

  /**
   * Multi-line message for terminal output
   */
  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];

    if (this.source) {
      parts.push(`Source: ${this.source}`);
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
      source: this.source,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}

/**
 * Helper to wrap unknown errors as ConversionError
 */
export function wrapError(
  error: unknown,
  source?: string,
  defaultCode: ErrorCode = 'UNKNOWN'
): ConversionError {
  if (error instanceof ConversionError) {
    if (error.source || !source) {
      return error;
    }
    return new ConversionError({
      code: error.code,
      message: error.message,
      source,
      suggestion: error.suggestion,
      context: error.context,
      cause: error,
    });
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return new ConversionError({
    code: defaultCode,
    message,
    source,
    cause,
  });
}
