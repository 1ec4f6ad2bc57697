// src/core/http/types.ts

import type {
  ApiClientError,
  ApiServerError,
  InvalidResponseError,
  NetworkError,
  RateLimitError,
  ScraperError,
} from '../../utils/errors';

export type QueryParams = Record<string, string | number | boolean>;

export type Sleep = (ms: number) => Promise<void>;

export interface HttpCoreConfig {
  rateLimitDelayMs: number; // Minimum gap between the end of one request and the next
  maxRetries: number;
  timeoutMs: number;
  backoffBaseMs: number; // Delay unit for 2^attempt backoff
  defaultRetryAfterMs: number; // Used when a 429 has no usable Retry-After
  userAgent: string;
}

/**
 * Result of a single HTTP attempt, classified for the retry policy.
 */
export type AttemptOutcome<T = unknown> =
  | { kind: 'success'; data: T; status: number }
  | { kind: 'rate-limited'; error: RateLimitError }
  | { kind: 'retryable'; error: ApiServerError | NetworkError }
  | { kind: 'fatal'; error: ApiClientError | InvalidResponseError };

/**
 * Final result of a request after retries.
 */
export type HttpResult<T = unknown> = { ok: true; data: T } | { ok: false; error: ScraperError };
