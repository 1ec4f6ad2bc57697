// src/core/fetcher/CommentFetcher.ts

import PQueue from 'p-queue';
import type { IssueSource } from '../../connectors/types';
import type { IssueComment } from '../normalizer/types';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import { errorMessage } from '../../utils/errors';

export interface CommentFetchResult {
  results: ReadonlyMap<string, IssueComment[]>;
  commentCount: number;
  failures: number;
}

export interface CommentFetcherDeps {
  source: IssueSource;
  logger: Logger;
  metrics?: MetricsCollector;
}

/**
 * Fetches the comments of a page's issues on a bounded worker pool.
 * A failing issue gets [] and never affects its siblings.
 */
export class CommentFetcher {
  constructor(
    private concurrency: number,
    private deps: CommentFetcherDeps
  ) {}

  async fetchAll(keys: readonly string[], project: string): Promise<CommentFetchResult> {
    const queue = new PQueue({ concurrency: this.concurrency });
    const results = new Map<string, IssueComment[]>();
    let commentCount = 0;
    let failures = 0;

    const tasks = [...new Set(keys)].map((key) =>
      queue.add(async () => {
        try {
          const comments = await this.deps.source.getComments(key);
          results.set(key, comments);
          commentCount += comments.length;
        } catch (error: unknown) {
          failures++;
          results.set(key, []);
          this.deps.metrics?.incrementCounter('scrape_errors', { project, stage: 'comments' });
          this.deps.logger.error('Failed to fetch comments', {
            project,
            issueKey: key,
            error: errorMessage(error),
          });
        }
      })
    );

    await Promise.all(tasks);

    this.deps.metrics?.incrementCounter('comments_fetched', { project }, commentCount);
    return { results, commentCount, failures };
  }
}
