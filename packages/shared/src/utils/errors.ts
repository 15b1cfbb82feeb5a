// Centralized error handling utilities

export class AppError extends Error {
  constructor(
    message: string,
    public code: string,
    public status: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id?: string) {
    super(
      id ? `${resource} not found: ${id}` : `${resource} not found`,
      'NOT_FOUND',
      404
    );
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', 400, details);
    this.name = 'ValidationError';
  }
}

export class ExternalApiError extends AppError {
  constructor(service: string, message: string, status: number = 502) {
    super(`${service} API error: ${message}`, 'EXTERNAL_API_ERROR', status);
    this.name = 'ExternalApiError';
  }
}

export class RateLimitError extends AppError {
  constructor(service: string, retryAfter?: number) {
    super(
      `Rate limit exceeded for ${service}`,
      'RATE_LIMIT_ERROR',
      429,
      retryAfter ? { retryAfter } : undefined
    );
    this.name = 'RateLimitError';
  }
}

/**
 * A remote call failed in transport or with a non-success status.
 * Never retried by the core; callers decide.
 */
export class RemoteCallError extends ExternalApiError {
  constructor(
    service: string,
    public operation: string,
    message: string,
    status: number = 502
  ) {
    super(service, `${operation} failed: ${message}`, status);
    this.name = 'RemoteCallError';
  }
}

/**
 * A cache entry exists but cannot be read back. Handled inside the cache as a miss.
 */
export class CacheCorruptionError extends AppError {
  constructor(
    public signature: string,
    cause: unknown
  ) {
    super(`Cache entry for "${signature}" is unreadable: ${describeError(cause)}`, 'CACHE_CORRUPTION', 500);
    this.name = 'CacheCorruptionError';
  }
}

/**
 * No client credentials are available, so no token can ever be obtained.
 */
export class CredentialsMissingError extends AppError {
  constructor(location: string, reason?: string) {
    super(
      reason ? `Credentials unusable at ${location}: ${reason}` : `Credentials not found at ${location}`,
      'CREDENTIALS_MISSING',
      500,
      { location }
    );
    this.name = 'CredentialsMissingError';
  }
}

export class TokenAcquisitionError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Token request failed: ${message}`, 'TOKEN_ACQUISITION_FAILED', 502, details);
    this.name = 'TokenAcquisitionError';
  }
}

/**
 * The remote shape has no handler here: schema drift or a contract violation.
 */
export class UnsupportedModelError extends AppError {
  constructor(model: string, context: string) {
    super(`Unsupported model ${model} for ${context}`, 'UNSUPPORTED_MODEL', 500, { model, context });
    this.name = 'UnsupportedModelError';
  }
}

export class MalformedRemoteResultError extends AppError {
  constructor(operation: string, issues: string[]) {
    super(
      `Malformed result from ${operation}: ${issues.join('; ')}`,
      'MALFORMED_REMOTE_RESULT',
      502,
      { operation, issues }
    );
    this.name = 'MalformedRemoteResultError';
  }
}

/**
 * Type guard to check if an error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Convert unknown error to AppError
 */
export function toAppError(error: unknown): AppError {
  if (isAppError(error)) {
    return error;
  }
  if (error instanceof Error) {
    return new AppError(error.message, 'INTERNAL_ERROR', 500);
  }
  return new AppError('An unexpected error occurred', 'INTERNAL_ERROR', 500);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Create a standardized error response
 */
export function errorResponse(error: AppError): Response {
  return new Response(
    JSON.stringify({
      error: {
        message: error.message,
        code: error.code,
        ...(error.details && { details: error.details }),
      },
    }),
    {
      status: error.status,
      headers: {
        'Content-Type': 'application/json',
      },
    }
  );
}
