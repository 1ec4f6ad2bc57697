// src/core/http/RateLimiter.ts

import PQueue from 'p-queue';
import type { Sleep } from './types';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import type { Logger } from '../../observability/Logger';

export interface RateLimiterOptions {
  sleep: Sleep;
  now?: () => number;
  metrics?: MetricsCollector;
  logger?: Logger;
}

/**
 * Serialises requests and keeps at least `minIntervalMs` between the end of
 * one request and the start of the next. Shared by every caller of a client.
 */
export class RateLimiter {
  private queue = new PQueue({ concurrency: 1 });
  private lastCompletedAt?: number;
  private sleep: Sleep;
  private now: () => number;

  constructor(
    private minIntervalMs: number,
    private options: RateLimiterOptions
  ) {
    this.sleep = options.sleep;
    this.now = options.now ?? Date.now;
  }

  async schedule<T>(task: () => Promise<T>): Promise<T> {
    const { metrics } = this.options;
    metrics?.recordGauge('rate_limit_queue_size', this.queue.size + 1);

    return this.queue.add(async () => {
      try {
        await this.waitForSlot();
        return await task();
      } finally {
        this.lastCompletedAt = this.now();
        metrics?.recordGauge('rate_limit_queue_size', this.queue.size);
      }
    });
  }

  get pending(): number {
    return this.queue.size + this.queue.pending;
  }

  private async waitForSlot(): Promise<void> {
    if (this.lastCompletedAt === undefined) return;

    const waitMs = this.lastCompletedAt + this.minIntervalMs - this.now();
    if (waitMs > 0) {
      this.options.logger?.debug('Rate limiting: waiting before request', { waitMs });
      await this.sleep(waitMs);
    }
  }
}
