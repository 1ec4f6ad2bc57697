// src/connectors/jira/types.ts

import { z } from 'zod';

export interface JiraConnectorConfig {
  baseUrl: string; // e.g. https://issues.apache.org/jira/rest/api/2
  pageSize: number;
  fields: string[];
  maxRetries?: number;
}

// Envelope of GET /search. Issue bodies stay raw; the normalizer owns their shape.
export const JiraSearchResponseSchema = z.object({
  issues: z.array(z.unknown()).catch([]),
  total: z.number().int().nonnegative().catch(0),
  startAt: z.number().int().nonnegative().optional().catch(undefined),
});

// Envelope of GET /issue/{key}/comment
export const JiraCommentsResponseSchema = z.object({
  comments: z.array(z.unknown()),
});
