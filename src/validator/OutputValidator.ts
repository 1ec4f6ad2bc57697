// src/validator/OutputValidator.ts

import * as fs from 'fs';
import * as path from 'path';
import { IssueRecordLineSchema } from '../core/normalizer/Normalizer';
import { isObject } from '../core/normalizer/FieldExtractors';
import { errorMessage } from '../utils/errors';

export const REQUIRED_FIELDS = [
  'issue_id',
  'project',
  'title',
  'description',
  'status',
  'priority',
  'issue_type',
  'reporter',
  'created_date',
  'training_task',
] as const;

const MAX_REPORTED_ERRORS = 10;
const MAX_REPORTED_MISSING_FIELDS = 5;

export interface ValidateOptions {
  strict?: boolean; // Also check every line against the full record schema
}

export interface FileValidation {
  file: string;
  exists: boolean;
  totalLines: number;
  validLines: number;
  invalidLines: number;
  missingFields: Record<string, number>;
  trainingTasks: Record<string, number>;
  projects: Record<string, number>;
  errors: string[];
}

export interface DirectoryValidation {
  dir: string;
  exists: boolean;
  files: FileValidation[];
  totalLines: number;
  validLines: number;
  invalidLines: number;
  allValid: boolean;
}

function increment(counts: Record<string, number>, key: string): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

function stringField(line: Record<string, unknown>, key: string): string {
  const value = line[key];
  return typeof value === 'string' ? value : 'unknown';
}

function emptyStats(file: string, exists: boolean): FileValidation {
  return {
    file,
    exists,
    totalLines: 0,
    validLines: 0,
    invalidLines: 0,
    missingFields: {},
    trainingTasks: {},
    projects: {},
    errors: [],
  };
}

// Returns an error message, or undefined when the line is valid
function checkLine(
  text: string,
  lineNumber: number,
  stats: FileValidation,
  options: ValidateOptions
): string | undefined {
  if (text.trim() === '') return `Line ${lineNumber}: Empty line`;

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error: unknown) {
    return `Line ${lineNumber}: Invalid JSON - ${errorMessage(error)}`;
  }

  if (!isObject(data)) return `Line ${lineNumber}: Not a JSON object`;
  const record = data;

  const missing = REQUIRED_FIELDS.filter((field) => !(field in record));
  for (const field of missing) increment(stats.missingFields, field);
  if (missing.length > 0) {
    return `Line ${lineNumber}: Missing fields ${missing.join(', ')}`;
  }

  if (options.strict) {
    const parsed = IssueRecordLineSchema.safeParse(record);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      return `Line ${lineNumber}: Schema mismatch - ${issues.join('; ')}`;
    }
  }

  increment(stats.trainingTasks, stringField(record, 'training_task'));
  increment(stats.projects, stringField(record, 'project'));
  return undefined;
}

/**
 * Check every line of one JSON Lines file and collect statistics.
 */
export function validateJsonlFile(file: string, options: ValidateOptions = {}): FileValidation {
  if (!fs.existsSync(file)) return emptyStats(file, false);

  const stats = emptyStats(file, true);
  const lines = fs.readFileSync(file, 'utf-8').split(/\r?\n/);
  // A trailing newline is not an extra line
  if (lines[lines.length - 1] === '') lines.pop();

  lines.forEach((text, index) => {
    stats.totalLines++;
    const error = checkLine(text, index + 1, stats, options);
    if (error === undefined) {
      stats.validLines++;
    } else {
      stats.invalidLines++;
      stats.errors.push(error);
    }
  });

  return stats;
}

/**
 * Validate every *.jsonl file in a directory, in name order.
 */
export function validateOutputDir(dir: string, options: ValidateOptions = {}): DirectoryValidation {
  const result: DirectoryValidation = {
    dir,
    exists: fs.existsSync(dir),
    files: [],
    totalLines: 0,
    validLines: 0,
    invalidLines: 0,
    allValid: false,
  };
  if (!result.exists) return result;

  const names = fs
    .readdirSync(dir)
    .filter((name) => name.endsWith('.jsonl'))
    .sort();

  for (const name of names) {
    const stats = validateJsonlFile(path.join(dir, name), options);
    result.files.push(stats);
    result.totalLines += stats.totalLines;
    result.validLines += stats.validLines;
    result.invalidLines += stats.invalidLines;
  }

  result.allValid = result.files.length > 0 && result.invalidLines === 0;
  return result;
}

function mostCommon(counts: Record<string, number>): Array<[string, number]> {
  return Object.entries(counts).sort((a, b) => b[1] - a[1]);
}

function percent(part: number, whole: number, digits: number): string {
  return `${((part / whole) * 100).toFixed(digits)}%`;
}

function formatFile(stats: FileValidation): string[] {
  const lines = [`Validating: ${stats.file}`];
  if (!stats.exists) {
    lines.push(`  File not found: ${stats.file}`);
    return lines;
  }

  lines.push(`  Total lines: ${stats.totalLines}`);
  lines.push(`  Valid: ${stats.validLines}`);
  lines.push(`  Invalid: ${stats.invalidLines}`);
  if (stats.validLines > 0) {
    lines.push(`  Success rate: ${percent(stats.validLines, stats.totalLines, 2)}`);
  }

  const tasks = mostCommon(stats.trainingTasks);
  if (tasks.length > 0) {
    lines.push('  Training tasks:');
    for (const [task, count] of tasks) {
      lines.push(`    ${task}: ${count} (${percent(count, stats.validLines, 1)})`);
    }
  }

  const projects = mostCommon(stats.projects);
  if (projects.length > 0) {
    lines.push('  Projects:');
    for (const [project, count] of projects) {
      lines.push(`    ${project}: ${count} issues`);
    }
  }

  const missing = mostCommon(stats.missingFields).slice(0, MAX_REPORTED_MISSING_FIELDS);
  if (missing.length > 0) {
    lines.push('  Most common missing fields:');
    for (const [field, count] of missing) {
      lines.push(`    ${field}: ${count} occurrences`);
    }
  }

  if (stats.errors.length > 0) {
    lines.push(`  Errors (showing first ${MAX_REPORTED_ERRORS}):`);
    for (const error of stats.errors.slice(0, MAX_REPORTED_ERRORS)) {
      lines.push(`    ${error}`);
    }
    if (stats.errors.length > MAX_REPORTED_ERRORS) {
      lines.push(`    ... and ${stats.errors.length - MAX_REPORTED_ERRORS} more errors`);
    }
  }

  return lines;
}

/**
 * Human-readable report of a directory validation, one entry per line.
 */
export function formatValidationReport(result: DirectoryValidation): string[] {
  if (!result.exists) return [`Output directory not found: ${result.dir}`];
  if (result.files.length === 0) return [`No JSONL files found in ${result.dir}`];

  const lines = [`Found ${result.files.length} JSONL file(s) in ${result.dir}`];
  for (const stats of result.files) {
    lines.push('', ...formatFile(stats));
  }

  lines.push('', 'Overall summary');
  lines.push(`  Total issues: ${result.totalLines}`);
  lines.push(`  Valid issues: ${result.validLines}`);
  lines.push(`  Invalid issues: ${result.invalidLines}`);
  if (result.totalLines > 0) {
    lines.push(`  Overall success rate: ${percent(result.validLines, result.totalLines, 2)}`);
  }
  lines.push(result.allValid ? 'All files are valid' : 'Some files have validation errors');

  return lines;
}
