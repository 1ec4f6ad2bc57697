// src/scraper.ts

import * as path from 'path';
import type { IssueSource, SearchPage } from './connectors/types';
import type { ScraperConfig, ScraperConfigInput } from './config/ConfigValidator';
import { validateConfig } from './config/ConfigValidator';
import { JiraConnector } from './connectors/jira/JiraConnector';
import { HttpCore } from './core/http/HttpCore';
import { CheckpointStore } from './core/checkpoint/CheckpointStore';
import { CommentFetcher } from './core/fetcher/CommentFetcher';
import { Normalizer } from './core/normalizer/Normalizer';
import { extractIssueKey } from './core/normalizer/FieldExtractors';
import { JsonlWriter } from './core/output/JsonlWriter';
import { Logger } from './observability/Logger';
import { MetricsCollector } from './observability/MetricsCollector';
import { generateCorrelationId, withPageSpan } from './observability/tracing';
import { errorMessage } from './utils/errors';

export interface ScraperDeps {
  logger: Logger;
  metrics: MetricsCollector;
  source: IssueSource;
  checkpoints: CheckpointStore;
  fetcher: CommentFetcher;
  normalizer: Normalizer;
}

export interface ProjectSummary {
  project: string;
  outputFile: string;
  startOffset: number;
  endOffset: number;
  recordsWritten: number;
  commentsFetched: number;
  errors: number;
  pages: number;
  completed: boolean; // Every issue the server reported was processed
}

export interface RunSummary {
  runId: string;
  recordsWritten: number;
  commentsFetched: number;
  errors: number;
  durationMs: number;
  outputDir: string;
  interrupted: boolean;
  projects: ProjectSummary[];
}

type PageOutcome =
  | { kind: 'failed' }
  | { kind: 'empty' }
  | { kind: 'processed'; nextOffset: number; exhausted: boolean };

export class IssueScraper {
  private stopRequested = false;

  private constructor(
    private config: ScraperConfig,
    private deps: ScraperDeps
  ) {}

  /**
   * Validate the configuration and wire the default collaborators.
   *
   * @param overrides - Replacement collaborators, e.g. a fake source in tests
   * @throws {ConfigError} If the configuration is invalid
   *
   * @example
   * ```typescript
   * const scraper = IssueScraper.create({ projects: ['SPARK', 'KAFKA'], testModeLimit: 100 });
   * const summary = await scraper.run();
   * ```
   */
  static create(config: ScraperConfigInput, overrides: Partial<ScraperDeps> = {}): IssueScraper {
    const validated = validateConfig(config);

    const logger = overrides.logger ?? new Logger(validated.logging);
    const metrics = overrides.metrics ?? new MetricsCollector(validated.metrics, logger);
    const source =
      overrides.source ??
      new JiraConnector(
        {
          baseUrl: validated.baseUrl,
          pageSize: validated.pageSize,
          fields: validated.fields,
          maxRetries: validated.http.maxRetries,
        },
        { http: new HttpCore(validated.http, metrics, logger), logger }
      );
    const checkpoints =
      overrides.checkpoints ?? new CheckpointStore(validated.checkpointFile, logger, metrics);
    const fetcher =
      overrides.fetcher ?? new CommentFetcher(validated.concurrency, { source, logger, metrics });
    const normalizer = overrides.normalizer ?? new Normalizer(validated.classification);

    return new IssueScraper(validated, { logger, metrics, source, checkpoints, fetcher, normalizer });
  }

  /**
   * Scrape every configured project in order, resuming from the checkpoint.
   * Never rejects for per-project failures; they are counted in the summary.
   */
  async run(): Promise<RunSummary> {
    const runId = generateCorrelationId();
    const startedAt = Date.now();
    const { logger } = this.deps;

    this.deps.checkpoints.load();
    logger.info('Scrape started', {
      runId,
      projects: this.config.projects,
      outputDir: this.config.outputDir,
      appendMode: this.config.appendMode,
      testModeLimit: this.config.testModeLimit,
    });

    const projects: ProjectSummary[] = [];
    for (const project of this.config.projects) {
      if (this.stopRequested) break;
      projects.push(await this.scrapeProject(project));
    }

    const summary: RunSummary = {
      runId,
      recordsWritten: projects.reduce((sum, p) => sum + p.recordsWritten, 0),
      commentsFetched: projects.reduce((sum, p) => sum + p.commentsFetched, 0),
      errors: projects.reduce((sum, p) => sum + p.errors, 0),
      durationMs: Date.now() - startedAt,
      outputDir: this.config.outputDir,
      interrupted: this.stopRequested,
      projects,
    };

    logger.info('Scrape finished', {
      runId,
      recordsWritten: summary.recordsWritten,
      commentsFetched: summary.commentsFetched,
      errors: summary.errors,
      durationMs: summary.durationMs,
      interrupted: summary.interrupted,
    });

    return summary;
  }

  /**
   * Scrape one project until it is exhausted, a page fails, the test limit
   * is reached or a stop is requested.
   */
  async scrapeProject(project: string): Promise<ProjectSummary> {
    const summary: ProjectSummary = {
      project,
      outputFile: this.outputFileFor(project),
      startOffset: 0,
      endOffset: 0,
      recordsWritten: 0,
      commentsFetched: 0,
      errors: 0,
      pages: 0,
      completed: false,
    };

    try {
      await this.paginate(project, summary);
    } catch (error: unknown) {
      summary.errors++;
      this.deps.metrics.incrementCounter('scrape_errors', { project, stage: 'project' });
      this.deps.logger.error('Project aborted', { project, error: errorMessage(error) });
    }

    this.deps.logger.info('Project finished', { ...summary });
    return summary;
  }

  /**
   * Stop after the page in progress has been written and checkpointed.
   */
  requestStop(): void {
    if (this.stopRequested) return;
    this.stopRequested = true;
    this.deps.logger.warn('Stop requested, finishing current page');
  }

  get stopping(): boolean {
    return this.stopRequested;
  }

  async close(): Promise<void> {
    await this.deps.metrics.close();
    await this.deps.logger.close();
  }

  private async paginate(project: string, summary: ProjectSummary): Promise<void> {
    const { checkpoints, logger } = this.deps;
    const writer = new JsonlWriter(summary.outputFile, this.config.appendMode ? 'append' : 'overwrite');
    writer.open();

    try {
      if (!this.config.appendMode) {
        checkpoints.reset(project);
      }

      let offset = checkpoints.progress(project);
      summary.startOffset = offset;
      summary.endOffset = offset;
      logger.info('Scraping project', { project, offset, outputFile: summary.outputFile });

      const limit = this.config.testModeLimit;
      let processed = 0;

      while (!this.stopRequested) {
        if (limit !== undefined && processed >= limit) {
          logger.info('Test mode limit reached', { project, limit });
          break;
        }

        const remaining = limit === undefined ? undefined : limit - processed;
        const outcome = await withPageSpan(project, offset, () =>
          this.processPage(project, offset, remaining, writer, summary)
        );

        if (outcome.kind === 'failed') break;
        if (outcome.kind === 'empty') {
          summary.completed = true;
          break;
        }

        processed += outcome.nextOffset - offset;
        offset = outcome.nextOffset;
        summary.endOffset = offset;

        if (outcome.exhausted) {
          summary.completed = true;
          break;
        }
      }
    } finally {
      writer.close();
    }
  }

  private async processPage(
    project: string,
    offset: number,
    remaining: number | undefined,
    writer: JsonlWriter,
    summary: ProjectSummary
  ): Promise<PageOutcome> {
    const { logger, metrics, checkpoints, fetcher, normalizer } = this.deps;
    const startTime = Date.now();

    const result = await this.deps.source.search(project, offset);
    if (!result.ok) {
      summary.errors++;
      metrics.incrementCounter('scrape_errors', { project, stage: 'page' });
      logger.error('Failed to fetch page, stopping project', {
        project,
        offset,
        code: result.error.code,
        error: result.error.message,
      });
      return { kind: 'failed' };
    }

    const page: SearchPage = result.data;
    if (page.issues.length === 0) {
      logger.debug('No more issues', { project, offset, total: page.total });
      return { kind: 'empty' };
    }

    const issues = remaining === undefined ? page.issues : page.issues.slice(0, remaining);
    const entries = issues.map((issue) => ({ issue, key: extractIssueKey(issue) }));

    const comments = await fetcher.fetchAll(
      entries.map((entry) => entry.key),
      project
    );
    summary.commentsFetched += comments.commentCount;
    summary.errors += comments.failures;

    for (const { issue, key } of entries) {
      try {
        const record = normalizer.transform(issue, comments.results.get(key) ?? []);
        writer.write(normalizer.serialize(record));
        summary.recordsWritten++;
        metrics.incrementCounter('records_written', { project });
      } catch (error: unknown) {
        summary.errors++;
        metrics.incrementCounter('scrape_errors', { project, stage: 'record' });
        logger.error('Failed to write record, skipping', {
          project,
          issueKey: key,
          error: errorMessage(error),
        });
      }
    }

    const nextOffset = offset + issues.length;
    checkpoints.advance(project, nextOffset);
    summary.pages++;

    metrics.incrementCounter('pages_fetched', { project });
    metrics.recordLatency('page_duration', Date.now() - startTime, { project });
    logger.info('Page processed', {
      project,
      offset: nextOffset,
      total: page.total,
      issues: issues.length,
      comments: comments.commentCount,
    });

    return { kind: 'processed', nextOffset, exhausted: nextOffset >= page.total };
  }

  private outputFileFor(project: string): string {
    return path.join(this.config.outputDir, `${project.toLowerCase()}_issues.jsonl`);
  }
}
