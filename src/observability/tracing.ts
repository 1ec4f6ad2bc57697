/**
 * OpenTelemetry Tracing (Opt-in)
 *
 * Spans around HTTP attempts and page processing. No-op unless a tracer
 * provider is registered by the host process and tracing is enabled:
 * - OTEL_ENABLED=1
 */

import { trace, SpanStatusCode, SpanKind, Span } from '@opentelemetry/api';
import { v4 as uuidv4 } from 'uuid';

const TRACER_NAME = 'issue-corpus-scraper';

export function isOTelEnabled(): boolean {
  return process.env.OTEL_ENABLED === '1' || process.env.OTEL_ENABLED === 'true';
}

export function getTracer() {
  if (!isOTelEnabled()) {
    return null;
  }
  return trace.getTracer(TRACER_NAME);
}

/**
 * Generate a unique correlation ID (one per scrape run)
 */
export function generateCorrelationId(): string {
  return uuidv4();
}

/**
 * Execute a function within a span
 *
 * @param name - Span name
 * @param fn - Function to execute; receives null when tracing is disabled
 * @param attributes - Optional span attributes
 */
export async function withSpan<T>(
  name: string,
  fn: (span: Span | null) => Promise<T>,
  attributes?: Record<string, string | number | boolean>,
  kind: SpanKind = SpanKind.INTERNAL
): Promise<T> {
  const tracer = getTracer();

  if (!tracer) {
    return fn(null);
  }

  return tracer.startActiveSpan(name, { kind, attributes }, async (span) => {
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error: unknown) {
      const err = error instanceof Error ? error : new Error(String(error));
      span.recordException(err);
      span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
      throw error;
    } finally {
      span.end();
    }
  });
}

/**
 * Span for one outbound HTTP request (all attempts included)
 */
export async function withHttpSpan<T>(
  method: string,
  url: string,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan(`HTTP ${method}`, fn, { 'http.method': method, 'http.url': url }, SpanKind.CLIENT);
}

/**
 * Span for one page of a project: search, comment fan-out, write, checkpoint
 */
export async function withPageSpan<T>(
  project: string,
  offset: number,
  fn: (span: Span | null) => Promise<T>
): Promise<T> {
  return withSpan('Scrape page', fn, { 'scrape.project': project, 'scrape.offset': offset });
}
