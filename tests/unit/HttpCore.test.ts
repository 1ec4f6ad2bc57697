// tests/unit/HttpCore.test.ts

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import nock from 'nock';
import { HttpCore } from '../../src/core/http/HttpCore';
import type { HttpCoreConfig } from '../../src/core/http/types';
import { Logger } from '../../src/observability/Logger';
import { MetricsCollector } from '../../src/observability/MetricsCollector';
import {
  ApiClientError,
  ApiServerError,
  InvalidResponseError,
  NetworkError,
  NetworkTimeoutError,
  RetriesExhaustedError,
} from '../../src/utils/errors';

const BASE = 'https://jira.test';

const config: HttpCoreConfig = {
  rateLimitDelayMs: 0,
  maxRetries: 3,
  timeoutMs: 5000,
  backoffBaseMs: 100,
  defaultRetryAfterMs: 60000,
  userAgent: 'test-agent/1.0',
};

describe('HttpCore', () => {
  const sleep = vi.fn(async (_ms: number) => {});
  let metrics: MetricsCollector;
  let httpCore: HttpCore;

  beforeEach(() => {
    sleep.mockClear();
    nock.cleanAll();
    metrics = new MetricsCollector();
    httpCore = new HttpCore(config, metrics, new Logger({ silent: true }), { sleep });
  });

  afterEach(() => {
    nock.cleanAll();
  });

  it('returns the parsed body of a 200 response', async () => {
    nock(BASE).get('/api/search').query(true).reply(200, { issues: [], total: 0 });

    const result = await httpCore.get(`${BASE}/api/search`, { startAt: 0 });

    expect(result).toEqual({ ok: true, data: { issues: [], total: 0 } });
    expect(sleep).not.toHaveBeenCalled();
  });

  it('sends query parameters and the configured headers', async () => {
    const scope = nock(BASE)
      .get('/api/search')
      .matchHeader('User-Agent', 'test-agent/1.0')
      .matchHeader('Accept', 'application/json')
      .query({ startAt: '50', maxResults: '25' })
      .reply(200, {});

    const result = await httpCore.get(`${BASE}/api/search`, { startAt: 50, maxResults: 25 });

    expect(result.ok).toBe(true);
    expect(scope.isDone()).toBe(true);
  });

  it('waits Retry-After seconds on 429 and then succeeds', async () => {
    nock(BASE)
      .get('/api/item')
      .reply(429, 'slow down', { 'Retry-After': '2' })
      .get('/api/item')
      .reply(200, { value: 1 });

    const result = await httpCore.get(`${BASE}/api/item`);

    expect(result).toEqual({ ok: true, data: { value: 1 } });
    expect(sleep.mock.calls).toEqual([[2000]]);
  });

  it('uses the default wait when a 429 has no Retry-After', async () => {
    nock(BASE).get('/api/item').reply(429).get('/api/item').reply(200, { value: 2 });

    const result = await httpCore.get(`${BASE}/api/item`);

    expect(result.ok).toBe(true);
    expect(sleep.mock.calls).toEqual([[60000]]);
  });

  it('does not count 429s against the retry budget', async () => {
    nock(BASE).get('/api/item').times(3).reply(429, '', { 'Retry-After': '1' });
    nock(BASE).get('/api/item').reply(200, { value: 3 });

    const result = await httpCore.get(`${BASE}/api/item`, {}, 1);

    expect(result).toEqual({ ok: true, data: { value: 3 } });
    expect(sleep).toHaveBeenCalledTimes(3);
  });

  it('performs exactly k backoff sleeps for k server errors before success', async () => {
    nock(BASE).get('/api/item').times(2).reply(503).get('/api/item').reply(200, { value: 4 });

    const result = await httpCore.get(`${BASE}/api/item`);

    expect(result).toEqual({ ok: true, data: { value: 4 } });
    expect(sleep.mock.calls).toEqual([[100], [200]]);
  });

  it('returns RetriesExhaustedError after maxRetries server errors', async () => {
    const scope = nock(BASE).get('/api/item').times(3).reply(500);

    const result = await httpCore.get(`${BASE}/api/item`);

    expect(scope.isDone()).toBe(true);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(RetriesExhaustedError);
    if (!(result.error instanceof RetriesExhaustedError)) return;
    expect(result.error.attempts).toBe(3);
    expect(result.error.lastError).toBeInstanceOf(ApiServerError);
    expect(sleep.mock.calls).toEqual([[100], [200]]);
  });

  it('fails immediately on other client errors', async () => {
    const scope = nock(BASE).get('/api/item').reply(404, 'missing');

    const result = await httpCore.get(`${BASE}/api/item`);

    expect(scope.isDone()).toBe(true);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ApiClientError);
    if (!(result.error instanceof ApiClientError)) return;
    expect(result.error.status).toBe(404);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('treats a 200 with a non-JSON body as a fatal invalid response', async () => {
    nock(BASE).get('/api/item').reply(200, '<html>maintenance</html>');

    const result = await httpCore.get(`${BASE}/api/item`);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(InvalidResponseError);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('retries timeouts and reports them as NetworkTimeoutError', async () => {
    nock(BASE)
      .get('/api/item')
      .times(2)
      .replyWithError({ code: 'ETIMEDOUT', message: 'timed out' });

    const result = await httpCore.get(`${BASE}/api/item`, {}, 2);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    if (!(result.error instanceof RetriesExhaustedError)) throw result.error;
    expect(result.error.lastError).toBeInstanceOf(NetworkTimeoutError);
    expect(sleep.mock.calls).toEqual([[100]]);
  });

  it('recovers from a transport error', async () => {
    nock(BASE)
      .get('/api/item')
      .replyWithError({ code: 'ECONNRESET', message: 'socket hang up' })
      .get('/api/item')
      .reply(200, { value: 5 });

    const result = await httpCore.get(`${BASE}/api/item`);

    expect(result).toEqual({ ok: true, data: { value: 5 } });
    expect(sleep.mock.calls).toEqual([[100]]);
  });

  it('classifies connection failures as NetworkError', async () => {
    nock(BASE).get('/api/item').replyWithError({ code: 'ECONNREFUSED', message: 'refused' });

    const result = await httpCore.get(`${BASE}/api/item`, {}, 1);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    if (!(result.error instanceof RetriesExhaustedError)) throw result.error;
    expect(result.error.lastError).toBeInstanceOf(NetworkError);
    expect(result.error.lastError).not.toBeInstanceOf(NetworkTimeoutError);
  });

  it('records request metrics per endpoint and status', async () => {
    nock(BASE).get('/api/search').reply(200, {});

    await httpCore.get(`${BASE}/api/search`);

    const text = await metrics.getMetrics();
    expect(text).toContain('http_requests_total{endpoint="search",status="200"} 1');
  });
});
