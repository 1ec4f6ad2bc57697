// src/utils/errors.ts

export class ScraperError extends Error {
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

// Configuration errors
export class ConfigError extends ScraperError {
  constructor(
    message: string,
    public issues: string[] = [],
    details?: Record<string, unknown>
  ) {
    super(message, 'CONFIG_ERROR', { ...details, issues });
  }
}

// API errors
export class ApiError extends ScraperError {
  constructor(
    message: string,
    public status: number,
    details?: Record<string, unknown>
  ) {
    super(message, 'API_ERROR', { ...details, status });
  }
}

export class ApiClientError extends ApiError {
  constructor(message: string, status: number, details?: Record<string, unknown>) {
    super(message, status, details);
    this.code = 'API_CLIENT_ERROR';
  }
}

export class ApiServerError extends ApiError {
  constructor(message: string, status: number, details?: Record<string, unknown>) {
    super(message, status, details);
    this.code = 'API_SERVER_ERROR';
  }
}

export class RateLimitError extends ApiError {
  constructor(
    message: string,
    public retryAfterMs: number,
    details?: Record<string, unknown>
  ) {
    super(message, 429, { ...details, retryAfterMs });
    this.code = 'RATE_LIMITED';
  }
}

export class InvalidResponseError extends ScraperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_RESPONSE', details);
  }
}

export class RetriesExhaustedError extends ScraperError {
  constructor(
    message: string,
    public attempts: number,
    public lastError?: ScraperError,
    details?: Record<string, unknown>
  ) {
    super(message, 'RETRIES_EXHAUSTED', {
      ...details,
      attempts,
      lastErrorCode: lastError?.code,
    });
  }
}

// Network errors
export class NetworkError extends ScraperError {
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

// Checkpoint errors
export class CheckpointError extends ScraperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CHECKPOINT_ERROR', details);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
