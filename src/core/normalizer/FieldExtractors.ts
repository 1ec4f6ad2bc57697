// src/core/normalizer/FieldExtractors.ts
//
// One extractor per output field, each with its own default. Every extractor
// accepts anything and never throws.

import type { IssueComment } from './types';

export const DEFAULT_TITLE = 'No Title';
export const DEFAULT_DESCRIPTION = 'No Description';
export const UNKNOWN = 'Unknown';
export const UNKNOWN_ISSUE_KEY = 'UNKNOWN';

type JsonObject = Record<string, unknown>;

export function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function prop(value: unknown, key: string): unknown {
  return isObject(value) ? value[key] : undefined;
}

// Non-empty string or undefined
function text(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function fieldsOf(issue: unknown): JsonObject {
  const fields = prop(issue, 'fields');
  return isObject(fields) ? fields : {};
}

function namedField(issue: unknown, field: string, attribute: string): string | undefined {
  return text(prop(prop(fieldsOf(issue), field), attribute));
}

export function extractIssueId(issue: unknown): string {
  const key = prop(issue, 'key');
  return typeof key === 'string' ? key : '';
}

/** Key used to look up fetched comments; matches the key sent to the comment endpoint. */
export function extractIssueKey(issue: unknown): string {
  return text(prop(issue, 'key')) ?? UNKNOWN_ISSUE_KEY;
}

export function extractProject(issueId: string): string {
  return issueId === '' ? '' : (issueId.split('-')[0] ?? '');
}

export function extractTitle(issue: unknown): string {
  return text(fieldsOf(issue).summary) ?? DEFAULT_TITLE;
}

export function extractDescription(issue: unknown): string {
  return text(fieldsOf(issue).description) ?? DEFAULT_DESCRIPTION;
}

export function extractStatus(issue: unknown): string {
  return namedField(issue, 'status', 'name') ?? UNKNOWN;
}

export function extractPriority(issue: unknown): string {
  return namedField(issue, 'priority', 'name') ?? UNKNOWN;
}

export function extractIssueType(issue: unknown): string {
  return namedField(issue, 'issuetype', 'name') ?? UNKNOWN;
}

export function extractReporter(issue: unknown): string {
  return namedField(issue, 'reporter', 'displayName') ?? UNKNOWN;
}

export function extractAssignee(issue: unknown): string | null {
  return namedField(issue, 'assignee', 'displayName') ?? null;
}

export function extractCreatedDate(issue: unknown): string {
  const created = fieldsOf(issue).created;
  return typeof created === 'string' ? created : '';
}

export function extractUpdatedDate(issue: unknown): string {
  const updated = fieldsOf(issue).updated;
  return typeof updated === 'string' ? updated : '';
}

export function extractResolvedDate(issue: unknown): string | null {
  const resolved = fieldsOf(issue).resolutiondate;
  return typeof resolved === 'string' ? resolved : null;
}

export function extractLabels(issue: unknown): string[] {
  const labels = fieldsOf(issue).labels;
  if (!Array.isArray(labels)) return [];
  return labels.filter((label): label is string => typeof label === 'string');
}

export function extractComponents(issue: unknown): string[] {
  const components = fieldsOf(issue).components;
  if (!Array.isArray(components)) return [];
  return components.map((component) => {
    const name = prop(component, 'name');
    return typeof name === 'string' ? name : '';
  });
}

/**
 * Comment entry as returned by the comment endpoint.
 */
export function extractComment(raw: unknown): IssueComment {
  const author = text(prop(prop(raw, 'author'), 'displayName'));
  const created = prop(raw, 'created');
  const body = prop(raw, 'body');
  return {
    author: author ?? UNKNOWN,
    created: typeof created === 'string' ? created : '',
    body: typeof body === 'string' ? body : '',
  };
}
