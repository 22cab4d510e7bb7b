// src/utils/errors.ts

export class ExportError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

// Configuration errors (fatal before any network call)
export class ConfigError extends ExportError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
  }
}

// API errors
export class ApiError extends ExportError {
  constructor(
    message: string,
    public status: number,
    public body?: unknown,
    details?: Record<string, unknown>
  ) {
    super(message, 'API_ERROR', { ...details, status });
  }
}

export class ApiClientError extends ApiError {
  constructor(message: string, status: number = 400, body?: unknown, details?: Record<string, unknown>) {
    super(message, status, body, details);
    this.code = 'API_CLIENT_ERROR';
  }
}

export class ApiServerError extends ApiError {
  constructor(message: string, status: number = 500, body?: unknown, details?: Record<string, unknown>) {
    super(message, status, body, details);
    this.code = 'API_SERVER_ERROR';
  }
}

export class RateLimitError extends ApiError {
  constructor(
    message: string = 'Rate limit exceeded',
    public retryAfter?: number,
    body?: unknown,
    details?: Record<string, unknown>
  ) {
    super(message, 429, body, { ...details, retryAfter });
    this.code = 'RATE_LIMIT_EXCEEDED';
  }
}

// Network errors
export class NetworkError extends ExportError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NETWORK_ERROR', details);
  }
}

export class NetworkTimeoutError extends NetworkError {
  constructor(message: string = 'Request timeout', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'NETWORK_TIMEOUT';
  }
}

// Record decoding errors
export class ValidationError extends ExportError {
  constructor(
    message: string,
    public field: string,
    public recordId: string,
    details?: Record<string, unknown>
  ) {
    super(message, 'VALIDATION_ERROR', { ...details, field, recordId });
  }
}

/**
 * Log metadata for an unknown thrown value
 */
export function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof ExportError) {
    return { error: error.message, code: error.code, details: error.details };
  }
  if (error instanceof Error) {
    return { error: error.message };
  }
  return { error: String(error) };
}
