export class PlatformError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode: number = 500,
    public details?: unknown
  ) {
    super(message);
    this.name = 'PlatformError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigurationError extends PlatformError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIGURATION_ERROR', 500, details);
    this.name = 'ConfigurationError';
  }
}

export class ExternalAPIError extends PlatformError {
  constructor(
    service: string,
    message: string,
    public originalError?: Error,
    details?: unknown
  ) {
    super(`${service} API error: ${message}`, 'EXTERNAL_API_ERROR', 502, details);
    this.name = 'ExternalAPIError';
  }
}

export class DatabaseError extends PlatformError {
  constructor(
    message: string,
    public originalError?: Error,
    details?: unknown
  ) {
    super(message, 'DATABASE_ERROR', 500, details);
    this.name = 'DatabaseError';
  }
}

export class ValidationError extends PlatformError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400, details);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends PlatformError {
  constructor(resource: string, id: string | number) {
    super(`${resource} ${id} not found`, 'NOT_FOUND', 404, { resource, id });
    this.name = 'NotFoundError';
  }
}

export class CacheError extends PlatformError {
  constructor(
    message: string,
    public originalError?: Error,
    details?: unknown
  ) {
    super(message, 'CACHE_ERROR', 500, details);
    this.name = 'CacheError';
  }
}

/**
 * Normalise an unknown thrown value into a message for logging
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Narrow an unknown thrown value to an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
