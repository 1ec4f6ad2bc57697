// src/core/normalizer/Normalizer.ts

import { z } from 'zod';
import type { ClassificationThresholds, IssueComment, IssueRecord } from './types';
import { TRAINING_TASKS } from './types';
import { DEFAULT_THRESHOLDS, classifyTrainingTask } from './Classifier';
import {
  extractAssignee,
  extractComponents,
  extractCreatedDate,
  extractDescription,
  extractIssueId,
  extractIssueType,
  extractLabels,
  extractPriority,
  extractProject,
  extractReporter,
  extractResolvedDate,
  extractStatus,
  extractTitle,
  extractUpdatedDate,
} from './FieldExtractors';

// Validation schema of one output line (exported for JSON Schema generation)
export const IssueRecordLineSchema = z.object({
  issue_id: z.string(),
  project: z.string(),
  title: z.string(),
  description: z.string(),
  status: z.string(),
  priority: z.string(),
  issue_type: z.string(),
  reporter: z.string(),
  assignee: z.string().nullable(),
  created_date: z.string(),
  updated_date: z.string(),
  resolved_date: z.string().nullable(),
  labels: z.array(z.string()),
  components: z.array(z.string()),
  comments: z.array(
    z.object({
      author: z.string(),
      created: z.string(),
      body: z.string(),
    })
  ),
  training_task: z.enum(TRAINING_TASKS),
});

export type IssueRecordLine = z.infer<typeof IssueRecordLineSchema>;

export class Normalizer {
  constructor(private thresholds: ClassificationThresholds = DEFAULT_THRESHOLDS) {}

  /**
   * Build a record from a raw issue and its already-fetched comments.
   * Pure: malformed input yields defaults instead of throwing.
   */
  transform(raw: unknown, comments: readonly IssueComment[]): IssueRecord {
    const issueId = extractIssueId(raw);
    const issueType = extractIssueType(raw);
    const description = extractDescription(raw);

    return {
      issueId,
      project: extractProject(issueId),
      title: extractTitle(raw),
      description,
      status: extractStatus(raw),
      priority: extractPriority(raw),
      issueType,
      reporter: extractReporter(raw),
      assignee: extractAssignee(raw),
      createdDate: extractCreatedDate(raw),
      updatedDate: extractUpdatedDate(raw),
      resolvedDate: extractResolvedDate(raw),
      labels: extractLabels(raw),
      components: extractComponents(raw),
      comments: comments.map((comment) => ({ ...comment })),
      trainingTask: classifyTrainingTask(issueType, description, comments.length, this.thresholds),
    };
  }

  toLine(record: IssueRecord): IssueRecordLine {
    return {
      issue_id: record.issueId,
      project: record.project,
      title: record.title,
      description: record.description,
      status: record.status,
      priority: record.priority,
      issue_type: record.issueType,
      reporter: record.reporter,
      assignee: record.assignee,
      created_date: record.createdDate,
      updated_date: record.updatedDate,
      resolved_date: record.resolvedDate,
      labels: [...record.labels],
      components: [...record.components],
      comments: record.comments.map(({ author, created, body }) => ({ author, created, body })),
      training_task: record.trainingTask,
    };
  }

  /**
   * One JSON Lines entry, without the trailing newline. Non-ASCII text is kept as is.
   */
  serialize(record: IssueRecord): string {
    return JSON.stringify(this.toLine(record));
  }
}
