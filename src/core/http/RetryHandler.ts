// src/core/http/RetryHandler.ts

import type { AttemptOutcome, HttpResult, Sleep } from './types';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { ScraperError } from '../../utils/errors';
import { RetriesExhaustedError } from '../../utils/errors';
import { MAX_SLEEP_MS } from '../../utils/sleep';

export interface RetryPolicy {
  backoffBaseMs: number;
}

// Delta-seconds, or an IMF-fixdate such as "Wed, 21 Oct 2015 07:28:30 GMT"
const DELTA_SECONDS = /^\d+(\.\d+)?$/;
const HTTP_DATE = /^[A-Z][a-z]{2}, \d{2} [A-Z][a-z]{2} \d{4} \d{2}:\d{2}:\d{2} GMT$/;

/**
 * Parse a Retry-After header value (delta-seconds or HTTP date) into milliseconds,
 * capped at the longest delay a timer can hold.
 * Returns the fallback when the header is absent or unparseable.
 */
export function parseRetryAfter(
  value: string | undefined,
  fallbackMs: number,
  now: number = Date.now()
): number {
  const trimmed = value?.trim() ?? '';

  if (DELTA_SECONDS.test(trimmed)) {
    return Math.min(MAX_SLEEP_MS, Math.round(parseFloat(trimmed) * 1000));
  }

  if (HTTP_DATE.test(trimmed)) {
    const date = Date.parse(trimmed);
    if (!Number.isNaN(date)) return Math.min(MAX_SLEEP_MS, Math.max(0, date - now));
  }

  return fallbackMs;
}

export function backoffDelay(attempt: number, baseMs: number): number {
  return baseMs * Math.pow(2, attempt);
}

/**
 * The only place that decides what to do with an attempt outcome.
 *
 * - rate-limited: wait the server-provided delay, retry, budget untouched
 * - retryable: back off 2^attempt units, retry while budget remains
 * - fatal: give up immediately
 */
export class RetryHandler {
  constructor(
    private policy: RetryPolicy,
    private logger: Logger,
    private sleep: Sleep,
    private metrics?: MetricsCollector
  ) {}

  async execute<T>(
    attempt: () => Promise<AttemptOutcome<T>>,
    maxRetries: number,
    context: Record<string, unknown> = {}
  ): Promise<HttpResult<T>> {
    let failures = 0;
    let lastError: ScraperError | undefined;

    while (failures < maxRetries) {
      const outcome = await attempt();

      switch (outcome.kind) {
        case 'success':
          return { ok: true, data: outcome.data };

        case 'fatal':
          this.logger.error('Request failed without retry', {
            ...context,
            code: outcome.error.code,
            error: outcome.error.message,
          });
          return { ok: false, error: outcome.error };

        case 'rate-limited':
          this.metrics?.incrementCounter('rate_limit_hits');
          this.metrics?.incrementCounter('http_retries', { reason: 'rate_limited' });
          this.logger.warn('Rate limited, waiting before retry', {
            ...context,
            retryAfterMs: outcome.error.retryAfterMs,
          });
          await this.sleep(outcome.error.retryAfterMs);
          continue;

        case 'retryable': {
          lastError = outcome.error;
          failures++;
          if (failures >= maxRetries) break;

          const delay = backoffDelay(failures - 1, this.policy.backoffBaseMs);
          this.metrics?.incrementCounter('http_retries', { reason: outcome.error.code });
          this.logger.warn('Retrying request', {
            ...context,
            attempt: failures,
            maxRetries,
            delay,
            code: outcome.error.code,
            error: outcome.error.message,
          });
          await this.sleep(delay);
          continue;
        }
      }
    }

    const error = new RetriesExhaustedError(
      `Max retries reached (${maxRetries})`,
      failures,
      lastError,
      context
    );
    this.logger.error('Max retries reached', {
      ...context,
      maxRetries,
      lastError: lastError?.message,
    });
    return { ok: false, error };
  }
}
