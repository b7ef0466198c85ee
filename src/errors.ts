/**
 * Base error for the render pipeline. Every failure surfaced to a caller
 * carries a stable code and the HTTP status it maps to.
 */
export class PipelineError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, statusCode: number, details?: Record<string, unknown>, cause?: Error) {
    super(message, cause ? { cause } : undefined);
    this.name = 'PipelineError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Response body for the error middleware
   */
  toJSON(): Record<string, unknown> {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      ...(this.details ? { details: this.details } : {})
    };
  }
}

/**
 * Missing or malformed caller input, detected before any work starts.
 */
export class ValidationFailure extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_FAILURE', 400, details);
    this.name = 'ValidationFailure';
  }
}

/**
 * Local file or external process failure.
 */
export class IOFailure extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>, cause?: Error) {
    super(message, 'IO_FAILURE', 500, details, cause);
    this.name = 'IOFailure';
  }
}

/**
 * The object store rejected a read or write.
 */
export class RemoteFailure extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>, cause?: Error) {
    super(message, 'REMOTE_FAILURE', 502, details, cause);
    this.name = 'RemoteFailure';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function errorCode(error: unknown): string {
  return error instanceof PipelineError ? error.code : 'UNKNOWN';
}
