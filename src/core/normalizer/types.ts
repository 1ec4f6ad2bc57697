// src/core/normalizer/types.ts

export interface IssueComment {
  author: string;
  created: string; // Source timestamp, verbatim
  body: string;
}

export const TRAINING_TASKS = [
  'question_answering',
  'summarization',
  'classification',
  'general',
] as const;

export type TrainingTask = (typeof TRAINING_TASKS)[number];

export interface ClassificationThresholds {
  summarizationMinLength: number; // Description must be longer than this
  qaMinComments: number; // Bug must have more comments than this
}

export interface IssueRecord {
  issueId: string;
  project: string;
  title: string;
  description: string;
  status: string;
  priority: string;
  issueType: string;
  reporter: string;
  assignee: string | null;
  createdDate: string;
  updatedDate: string;
  resolvedDate: string | null;
  labels: string[];
  components: string[];
  comments: IssueComment[];
  trainingTask: TrainingTask;
}
