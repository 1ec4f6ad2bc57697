// tests/unit/Classifier.test.ts

import { describe, it, expect } from 'vitest';
import { classifyTrainingTask } from '../../src/core/normalizer/Classifier';

const LONG = 'x'.repeat(501);
const EXACTLY_500 = 'x'.repeat(500);

describe('classifyTrainingTask', () => {
  it('sends discussed bugs to question answering', () => {
    expect(classifyTrainingTask('Bug', 'short', 3)).toBe('question_answering');
    expect(classifyTrainingTask('BUG', LONG, 10)).toBe('question_answering');
  });

  it('needs more than two comments for question answering', () => {
    expect(classifyTrainingTask('Bug', 'short', 2)).toBe('classification');
  });

  it('sends long descriptions to summarization', () => {
    expect(classifyTrainingTask('Bug', LONG, 2)).toBe('summarization');
    expect(classifyTrainingTask('Wish', LONG, 0)).toBe('summarization');
  });

  it('needs more than 500 characters for summarization', () => {
    expect(classifyTrainingTask('Task', EXACTLY_500, 0)).toBe('classification');
  });

  it('measures descriptions in characters, not UTF-16 units', () => {
    const emoji = '🐛'.repeat(300);

    expect(emoji.length).toBe(600);
    expect(classifyTrainingTask('Task', emoji, 0)).toBe('classification');
    expect(classifyTrainingTask('Task', '🐛'.repeat(501), 0)).toBe('summarization');
  });

  it('classifies the known issue types case-insensitively', () => {
    expect(classifyTrainingTask('Improvement', 'short', 0)).toBe('classification');
    expect(classifyTrainingTask('new feature', 'short', 5)).toBe('classification');
    expect(classifyTrainingTask('TASK', 'short', 1)).toBe('classification');
  });

  it('falls back to general', () => {
    expect(classifyTrainingTask('Epic', 'short', 10)).toBe('general');
    expect(classifyTrainingTask('Unknown', 'No Description', 0)).toBe('general');
  });

  it('honours custom thresholds', () => {
    const thresholds = { summarizationMinLength: 5, qaMinComments: 0 };

    expect(classifyTrainingTask('Bug', 'short', 1, thresholds)).toBe('question_answering');
    expect(classifyTrainingTask('Epic', 'longer', 0, thresholds)).toBe('summarization');
  });
});
