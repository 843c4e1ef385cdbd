export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500,
    public readonly code: string = 'INTERNAL_ERROR',
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id: string) {
    super(`${resource} '${id}' not found`, 404, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'A valid session is required') {
    super(message, 401, 'UNAUTHORIZED');
    this.name = 'UnauthorizedError';
  }
}

export class ForbiddenError extends AppError {
  constructor(message = 'You do not have access to this resource') {
    super(message, 403, 'FORBIDDEN');
    this.name = 'ForbiddenError';
  }
}

/** Raised when a job's output files have been removed by the retention sweeper. */
export class GoneError extends AppError {
  constructor(jobId: string, purgedAt: Date) {
    super(
      `Output files for job '${jobId}' were removed on ${purgedAt.toISOString()} after the retention period`,
      410,
      'GONE',
    );
    this.name = 'GoneError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

export type QuotaLimitKind = 'tokens' | 'units';

export class QuotaExceededError extends AppError {
  constructor(
    public readonly limitKind: QuotaLimitKind,
    message: string,
  ) {
    super(message, 429, 'QUOTA_EXCEEDED');
    this.name = 'QuotaExceededError';
  }
}

export class ProviderError extends AppError {
  constructor(provider: string, message: string, public readonly status?: number) {
    super(`Provider '${provider}' error: ${message}`, 502, 'PROVIDER_ERROR');
    this.name = 'ProviderError';
  }
}

export class ParseError extends AppError {
  constructor(message: string) {
    super(`Malformed model response: ${message}`, 502, 'PARSE_ERROR');
    this.name = 'ParseError';
  }
}

export class StorageError extends AppError {
  constructor(operation: string, path: string, cause?: unknown) {
    super(
      `Storage ${operation} failed for '${path}'${cause instanceof Error ? `: ${cause.message}` : ''}`,
      500,
      'STORAGE_ERROR',
    );
    this.name = 'StorageError';
  }
}

/** Provider and parse failures are retried locally; everything else ends the item at once. */
export function isRetryableError(error: unknown): boolean {
  return error instanceof ProviderError || error instanceof ParseError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
