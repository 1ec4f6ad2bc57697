// src/core/checkpoint/CheckpointStore.ts

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import { CheckpointError, errorMessage } from '../../utils/errors';

const CheckpointFileSchema = z.object({
  projects: z.record(z.number().int().nonnegative()),
});

export type CheckpointState = z.infer<typeof CheckpointFileSchema>;

/**
 * Per-project resume offsets, persisted as a small JSON file.
 *
 * Every mutation rewrites the whole file synchronously, so the file on disk
 * always matches the last page that was fully written.
 */
export class CheckpointStore {
  private projects: Map<string, number> = new Map();

  constructor(
    private filePath: string,
    private logger: Logger,
    private metrics?: MetricsCollector
  ) {}

  get path(): string {
    return this.filePath;
  }

  /**
   * Read the file into memory. A missing file is an empty state; an
   * unreadable or malformed one is logged and treated as empty.
   */
  load(): void {
    this.projects = new Map();

    if (!fs.existsSync(this.filePath)) {
      this.logger.debug('No checkpoint file, starting fresh', { file: this.filePath });
      return;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
    } catch (error: unknown) {
      this.logger.warn('Checkpoint file unreadable, starting fresh', {
        file: this.filePath,
        error: errorMessage(error),
      });
      return;
    }

    const parsed = CheckpointFileSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn('Checkpoint file has an unexpected shape, starting fresh', {
        file: this.filePath,
        issues: parsed.error.issues.map((issue) => issue.message),
      });
      return;
    }

    for (const [project, offset] of Object.entries(parsed.data.projects)) {
      this.projects.set(project, offset);
    }
    this.logger.info('Loaded checkpoint', { file: this.filePath, projects: parsed.data.projects });
  }

  progress(project: string): number {
    return this.projects.get(project) ?? 0;
  }

  /**
   * @throws CheckpointError when `offset` is below the stored one or the file cannot be written
   */
  advance(project: string, offset: number): void {
    if (!Number.isInteger(offset) || offset < 0) {
      throw new CheckpointError(`Invalid checkpoint offset: ${offset}`, { project, offset });
    }

    const current = this.progress(project);
    if (offset < current) {
      throw new CheckpointError(`Checkpoint for ${project} cannot move back from ${current} to ${offset}`, {
        project,
        current,
        offset,
      });
    }

    this.projects.set(project, offset);
    this.persist();
    this.metrics?.recordGauge('checkpoint_offset', offset, { project });
  }

  reset(project: string): void {
    this.projects.delete(project);
    this.persist();
    this.metrics?.recordGauge('checkpoint_offset', 0, { project });
    this.logger.info('Checkpoint reset', { project });
  }

  snapshot(): Readonly<Record<string, number>> {
    return Object.freeze(Object.fromEntries(this.projects));
  }

  private persist(): void {
    const state: CheckpointState = { projects: Object.fromEntries(this.projects) };
    try {
      fs.mkdirSync(path.dirname(path.resolve(this.filePath)), { recursive: true });
      fs.writeFileSync(this.filePath, JSON.stringify(state, null, 2), 'utf-8');
    } catch (error: unknown) {
      throw new CheckpointError('Failed to write checkpoint file', {
        file: this.filePath,
        error: errorMessage(error),
      });
    }
  }
}
