// src/connectors/jira/JiraConnector.ts

import type { IssueSource, SearchPage } from '../types';
import type { JiraConnectorConfig } from './types';
import type { HttpCore } from '../../core/http/HttpCore';
import type { HttpResult } from '../../core/http/types';
import type { IssueComment } from '../../core/normalizer/types';
import type { Logger } from '../../observability/Logger';
import { JiraCommentsResponseSchema, JiraSearchResponseSchema } from './types';
import { extractComment, isObject } from '../../core/normalizer/FieldExtractors';
import { InvalidResponseError } from '../../utils/errors';

export interface JiraConnectorDeps {
  http: HttpCore;
  logger: Logger;
}

/**
 * Jira REST v2 connector
 *
 * Reads a project's issues page by page, oldest first, and the comment
 * collection of single issues.
 *
 * @example
 * ```typescript
 * const jira = new JiraConnector({ baseUrl, pageSize: 50, fields }, { http, logger });
 * const page = await jira.search('KAFKA', 0);
 * ```
 */
export class JiraConnector implements IssueSource {
  constructor(
    private config: JiraConnectorConfig,
    private deps: JiraConnectorDeps
  ) {}

  async search(project: string, offset: number): Promise<HttpResult<SearchPage>> {
    const url = `${this.baseUrl()}/search`;
    const result = await this.deps.http.get(
      url,
      {
        jql: `project=${project} ORDER BY created ASC`,
        startAt: offset,
        maxResults: this.config.pageSize,
        fields: this.config.fields.join(','),
      },
      this.config.maxRetries
    );

    if (!result.ok) return result;

    if (!isObject(result.data)) {
      return {
        ok: false,
        error: new InvalidResponseError('Search response is not an object', { url, project, offset }),
      };
    }

    const body = JiraSearchResponseSchema.parse(result.data);
    return {
      ok: true,
      data: {
        issues: body.issues,
        total: body.total,
        startAt: body.startAt ?? offset,
      },
    };
  }

  /**
   * Comments of one issue in server order.
   *
   * @throws ScraperError when the request fails; a missing or malformed
   *   collection resolves to []
   */
  async getComments(issueKey: string): Promise<IssueComment[]> {
    const url = `${this.baseUrl()}/issue/${encodeURIComponent(issueKey)}/comment`;
    const result = await this.deps.http.get(url, {}, this.config.maxRetries);

    if (!result.ok) throw result.error;

    const parsed = JiraCommentsResponseSchema.safeParse(result.data);
    if (!parsed.success) {
      this.deps.logger.debug('Comment collection missing or malformed', { issueKey });
      return [];
    }

    return parsed.data.comments.map(extractComment);
  }

  private baseUrl(): string {
    return this.config.baseUrl.replace(/\/+$/, '');
  }
}
