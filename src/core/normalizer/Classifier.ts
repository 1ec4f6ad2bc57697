// src/core/normalizer/Classifier.ts

import type { ClassificationThresholds, TrainingTask } from './types';

export const DEFAULT_THRESHOLDS: ClassificationThresholds = {
  summarizationMinLength: 500,
  qaMinComments: 2,
};

const CLASSIFIABLE_TYPES = new Set(['bug', 'improvement', 'new feature', 'task']);

/**
 * Pick the training task for an issue. First matching rule wins:
 * discussed bugs, then long descriptions, then the known issue types.
 */
export function classifyTrainingTask(
  issueType: string,
  description: string,
  commentCount: number,
  thresholds: ClassificationThresholds = DEFAULT_THRESHOLDS
): TrainingTask {
  const type = issueType.toLowerCase();

  if (type === 'bug' && commentCount > thresholds.qaMinComments) {
    return 'question_answering';
  }
  // Length in code points, so astral characters count once
  if ([...description].length > thresholds.summarizationMinLength) {
    return 'summarization';
  }
  if (CLASSIFIABLE_TYPES.has(type)) {
    return 'classification';
  }
  return 'general';
}
