// src/connectors/types.ts

import type { HttpResult } from '../core/http/types';
import type { IssueComment } from '../core/normalizer/types';

export interface SearchPage {
  issues: unknown[]; // Raw issues, transformed later
  total: number;
  startAt: number;
}

/**
 * Remote operations the scraper needs from an issue tracker.
 */
export interface IssueSource {
  /**
   * One page of a project's issues in stable creation order, starting at `offset`.
   */
  search(project: string, offset: number): Promise<HttpResult<SearchPage>>;

  /**
   * All comments of an issue in the order the tracker returns them.
   * Resolves to [] when the collection is absent or malformed; rejects when
   * the request itself fails.
   */
  getComments(issueKey: string): Promise<IssueComment[]>;
}
