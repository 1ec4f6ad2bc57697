// src/observability/MetricsCollector.ts

import { Registry, Counter, Histogram, Gauge } from 'prom-client';
import * as http from 'http';
import type { Logger } from './Logger';

export interface MetricsConfig {
  enabled?: boolean;
  port?: number;
  path?: string;
}

type Labels = Record<string, string | number>;

export class MetricsCollector {
  private registry: Registry;
  private counters: Map<string, Counter> = new Map();
  private histograms: Map<string, Histogram> = new Map();
  private gauges: Map<string, Gauge> = new Map();
  private server?: http.Server;
  private logger?: Logger;

  constructor(config: MetricsConfig = {}, logger?: Logger) {
    this.logger = logger;
    this.registry = new Registry();

    if (config.enabled !== false) {
      this.initializeMetrics();

      if (config.port) {
        this.exposeMetrics(config.port, config.path ?? '/metrics');
      }
    }
  }

  private initializeMetrics(): void {
    // HTTP metrics
    this.addCounter('http_requests', 'Total HTTP requests', ['endpoint', 'status']);
    this.addCounter('http_retries', 'HTTP attempts retried', ['reason']);
    this.addCounter('rate_limit_hits', 'HTTP 429 responses received', []);
    this.histograms.set(
      'http_request_duration',
      new Histogram({
        name: 'http_request_duration_seconds',
        help: 'HTTP request duration',
        labelNames: ['endpoint', 'status'],
        buckets: [0.1, 0.5, 1, 2, 5, 10, 30],
        registers: [this.registry],
      })
    );
    this.gauges.set(
      'rate_limit_queue_size',
      new Gauge({
        name: 'rate_limit_queue_size',
        help: 'Requests waiting for the rate limiter',
        registers: [this.registry],
      })
    );

    // Scrape metrics
    this.addCounter('pages_fetched', 'Search pages fetched', ['project']);
    this.addCounter('records_written', 'Issue records written', ['project']);
    this.addCounter('comments_fetched', 'Comments fetched', ['project']);
    this.addCounter('scrape_errors', 'Errors encountered while scraping', ['project', 'stage']);
    this.gauges.set(
      'checkpoint_offset',
      new Gauge({
        name: 'checkpoint_offset',
        help: 'Persisted checkpoint offset',
        labelNames: ['project'],
        registers: [this.registry],
      })
    );
    this.histograms.set(
      'page_duration',
      new Histogram({
        name: 'page_duration_seconds',
        help: 'Time to fetch, enrich and write one page',
        labelNames: ['project'],
        buckets: [1, 5, 10, 30, 60, 120, 300],
        registers: [this.registry],
      })
    );
  }

  private addCounter(name: string, help: string, labelNames: string[]): void {
    this.counters.set(
      name,
      new Counter({
        name: `${name}_total`,
        help,
        labelNames,
        registers: [this.registry],
      })
    );
  }

  incrementCounter(name: string, labels: Labels = {}, value = 1): void {
    const counter = this.counters.get(name);
    counter?.inc(labels, value);
  }

  recordLatency(name: string, durationMs: number, labels: Labels = {}): void {
    const histogram = this.histograms.get(name);
    histogram?.observe(labels, durationMs / 1000);
  }

  recordGauge(name: string, value: number, labels: Labels = {}): void {
    const gauge = this.gauges.get(name);
    gauge?.set(labels, value);
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  private exposeMetrics(port: number, path: string): void {
    this.server = http.createServer((req, res) => {
      if (req.url !== path) {
        res.statusCode = 404;
        res.end('Not Found');
        return;
      }
      this.getMetrics()
        .then((body) => {
          res.setHeader('Content-Type', this.registry.contentType);
          res.end(body);
        })
        .catch((error: unknown) => {
          res.statusCode = 500;
          res.end();
          this.logger?.error('Failed to render metrics', {
            error: error instanceof Error ? error.message : String(error),
          });
        });
    });

    this.server.on('error', (error: Error) => {
      this.logger?.error('MetricsCollector server error', { port, error: error.message });
    });

    this.server.listen(port, () => {
      this.logger?.info(`Metrics exposed on http://localhost:${port}${path}`);
    });
  }

  async close(): Promise<void> {
    const server = this.server;
    if (!server) return;
    await new Promise<void>((resolve) => server.close(() => resolve()));
    this.server = undefined;
  }
}
