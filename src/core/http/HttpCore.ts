// src/core/http/HttpCore.ts

import axios, { AxiosInstance, AxiosResponse } from 'axios';
import * as http from 'http';
import * as https from 'https';
import type { AttemptOutcome, HttpCoreConfig, HttpResult, QueryParams, Sleep } from './types';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { Logger } from '../../observability/Logger';
import { RateLimiter } from './RateLimiter';
import { RetryHandler, parseRetryAfter } from './RetryHandler';
import {
  ApiClientError,
  ApiServerError,
  InvalidResponseError,
  NetworkError,
  NetworkTimeoutError,
  RateLimitError,
} from '../../utils/errors';
import { withHttpSpan } from '../../observability/tracing';
import { sleep as defaultSleep } from '../../utils/sleep';

export interface HttpCoreOptions {
  sleep?: Sleep; // Used for rate limiting, 429 waits and backoff
  now?: () => number;
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

export class HttpCore {
  private axiosInstance: AxiosInstance;
  private limiter: RateLimiter;
  private retryHandler: RetryHandler;
  private now: () => number;

  constructor(
    private config: HttpCoreConfig,
    private metrics: MetricsCollector,
    private logger: Logger,
    options: HttpCoreOptions = {}
  ) {
    const sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.limiter = new RateLimiter(config.rateLimitDelayMs, {
      sleep,
      now: this.now,
      metrics,
      logger,
    });
    this.retryHandler = new RetryHandler(
      { backoffBaseMs: config.backoffBaseMs },
      logger,
      sleep,
      metrics
    );

    this.axiosInstance = axios.create({
      timeout: config.timeoutMs,
      httpAgent: new http.Agent({ keepAlive: true }),
      httpsAgent: new https.Agent({ keepAlive: true }),
      headers: {
        Accept: 'application/json',
        'User-Agent': config.userAgent,
      },
      // Keep the raw body; JSON parsing failures are classified below
      responseType: 'text',
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
    });
  }

  /**
   * GET with rate limiting and retries.
   *
   * Never throws for HTTP or transport failures; they come back as
   * `{ ok: false, error }`.
   */
  async get(
    url: string,
    params: QueryParams = {},
    maxRetries: number = this.config.maxRetries
  ): Promise<HttpResult<unknown>> {
    const requestId = this.generateRequestId();

    return withHttpSpan('GET', url, () =>
      this.retryHandler.execute(
        () => this.limiter.schedule(() => this.attempt(url, params, requestId)),
        maxRetries,
        { requestId, url }
      )
    );
  }

  private async attempt(
    url: string,
    params: QueryParams,
    requestId: string
  ): Promise<AttemptOutcome<unknown>> {
    const endpoint = this.endpointLabel(url);
    const startTime = this.now();

    this.logger.debug('HTTP request', { requestId, url, query: params });

    let response: AxiosResponse<unknown>;
    try {
      response = await this.axiosInstance.get<unknown>(url, { params });
    } catch (error: unknown) {
      this.metrics.incrementCounter('http_requests', { endpoint, status: 'error' });
      return { kind: 'retryable', error: this.transformTransportError(error, url) };
    }

    const duration = this.now() - startTime;
    this.metrics.incrementCounter('http_requests', { endpoint, status: response.status });
    this.metrics.recordLatency('http_request_duration', duration, {
      endpoint,
      status: response.status,
    });
    this.logger.debug('HTTP response', { requestId, url, status: response.status, duration });

    return this.classifyResponse(response, url);
  }

  private classifyResponse(response: AxiosResponse<unknown>, url: string): AttemptOutcome<unknown> {
    const status = response.status;

    if (status === 200) {
      try {
        const body = typeof response.data === 'string' ? response.data : '';
        return { kind: 'success', data: JSON.parse(body), status };
      } catch (error: unknown) {
        return {
          kind: 'fatal',
          error: new InvalidResponseError('Response body is not valid JSON', {
            url,
            cause: error instanceof Error ? error.message : String(error),
          }),
        };
      }
    }

    if (status === 429) {
      const header = response.headers['retry-after'];
      const retryAfter =
        typeof header === 'string' || typeof header === 'number' ? String(header) : undefined;
      const retryAfterMs = parseRetryAfter(retryAfter, this.config.defaultRetryAfterMs, this.now());
      return {
        kind: 'rate-limited',
        error: new RateLimitError('Rate limit exceeded', retryAfterMs, { url }),
      };
    }

    if (status >= 500) {
      return {
        kind: 'retryable',
        error: new ApiServerError(`Server error: ${status}`, status, { url }),
      };
    }

    this.logger.debug('HTTP error response', { url, status, data: this.snippet(response.data) });
    return {
      kind: 'fatal',
      error: new ApiClientError(`Client error: ${status}`, status, {
        url,
        response: this.snippet(response.data),
      }),
    };
  }

  private transformTransportError(error: unknown, url: string): NetworkError {
    if (axios.isAxiosError(error)) {
      if (error.code !== undefined && TIMEOUT_CODES.has(error.code)) {
        return new NetworkTimeoutError('Request timeout', { url, code: error.code });
      }
      return new NetworkError(`Network error: ${error.message}`, { url, code: error.code });
    }
    return new NetworkError('Network error', {
      url,
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  private endpointLabel(url: string): string {
    try {
      return new URL(url).pathname.split('/').filter(Boolean).pop() ?? 'root';
    } catch {
      return 'unknown';
    }
  }

  private snippet(data: unknown): string {
    return typeof data === 'string' ? data.slice(0, 500) : '';
  }

  private generateRequestId(): string {
    return `req_${Date.now()}_${Math.random().toString(36).substring(7)}`;
  }
}
