// This module provides a typed application error that can be mapped into JSON-RPC and HTTP responses.

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  public constructor(
    statusCode: number,
    code: string,
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

// This error marks failures of the unit-lister or log-reader collaborators.
export class AdapterError extends AppError {
  public constructor(code: 'adapter_error' | 'adapter_timeout', message: string, options?: { cause?: unknown }) {
    super(502, code, message, undefined, options);
    this.name = 'AdapterError';
  }
}

// This helper builds one client-facing parameter validation error with a stable code.
export function validationError(code: string, message: string, details?: Record<string, unknown>): AppError {
  return new AppError(400, code, message, details);
}

// This helper normalizes unknown failures into an AppError without leaking internals.
export function normalizeError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  if (error instanceof Error) {
    return new AppError(500, 'internal_error', error.message, undefined, { cause: error });
  }

  return new AppError(500, 'internal_error', 'An unexpected error occurred.');
}
