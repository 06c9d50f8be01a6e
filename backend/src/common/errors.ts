/**
 * Application errors.
 *
 * Anything thrown as AppError reaches the client through the global
 * handler in app.ts as { ok: false, error: code, message }.
 */

export class AppError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: string,
    message: string
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(400, 'VALIDATION_ERROR', message);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(404, 'NOT_FOUND', message);
    this.name = 'NotFoundError';
  }
}

export class DataStoreUnavailableError extends AppError {
  constructor(message: string, public readonly detail?: string) {
    super(503, 'DATA_STORE_UNAVAILABLE', message);
    this.name = 'DataStoreUnavailableError';
  }
}

export class OperationCancelledError extends AppError {
  constructor(operation: string) {
    super(499, 'CANCELLED', `${operation} was cancelled`);
    this.name = 'OperationCancelledError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
