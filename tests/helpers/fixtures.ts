// tests/helpers/fixtures.ts

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { IssueSource, SearchPage } from '../../src/connectors/types';
import type { HttpResult } from '../../src/core/http/types';
import type { IssueComment } from '../../src/core/normalizer/types';
import { ApiServerError } from '../../src/utils/errors';

export function makeTempDir(prefix = 'scraper-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function readLines(file: string): string[] {
  return fs
    .readFileSync(file, 'utf-8')
    .split('\n')
    .filter((line) => line !== '');
}

export function rawIssue(key: string, fields: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    key,
    fields: {
      summary: `Summary of ${key}`,
      description: `Description of ${key}`,
      status: { name: 'Open' },
      priority: { name: 'Major' },
      issuetype: { name: 'Task' },
      reporter: { displayName: 'Reporter Example' },
      created: '2024-01-01T00:00:00.000+0000',
      updated: '2024-01-02T00:00:00.000+0000',
      labels: [],
      components: [],
      ...fields,
    },
  };
}

export function comment(author: string, body: string): IssueComment {
  return { author, created: '2024-01-05T00:00:00.000+0000', body };
}

export interface FakeSourceOptions {
  pageSize?: number;
  comments?: Record<string, IssueComment[]>;
  failingProjects?: string[];
  failingCommentKeys?: string[];
  onSearch?: (project: string, offset: number) => void;
}

/**
 * In-memory issue source: every project serves the same ordered issue list.
 */
export class FakeSource implements IssueSource {
  readonly searches: Array<{ project: string; offset: number }> = [];
  readonly commentRequests: string[] = [];

  constructor(
    private issuesByProject: Record<string, unknown[]>,
    private options: FakeSourceOptions = {}
  ) {}

  async search(project: string, offset: number): Promise<HttpResult<SearchPage>> {
    this.searches.push({ project, offset });
    this.options.onSearch?.(project, offset);

    if (this.options.failingProjects?.includes(project)) {
      return { ok: false, error: new ApiServerError('Server error: 503', 503) };
    }

    const issues = this.issuesByProject[project] ?? [];
    const pageSize = this.options.pageSize ?? 50;
    return {
      ok: true,
      data: { issues: issues.slice(offset, offset + pageSize), total: issues.length, startAt: offset },
    };
  }

  async getComments(issueKey: string): Promise<IssueComment[]> {
    this.commentRequests.push(issueKey);
    if (this.options.failingCommentKeys?.includes(issueKey)) {
      throw new ApiServerError('Server error: 500', 500);
    }
    return this.options.comments?.[issueKey] ?? [];
  }
}
