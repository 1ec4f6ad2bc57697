// src/cli/options.ts

import { InvalidArgumentError } from 'commander';
import type { LogLevel } from '../observability/Logger';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export const DEFAULT_CHECKPOINT_FILE = 'checkpoint.json';
export const DEFAULT_OUTPUT_DIR = 'output';

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function parseLogLevel(value: string): LogLevel {
  const level = LOG_LEVELS.find((candidate) => candidate === value);
  if (level === undefined) {
    throw new InvalidArgumentError(`Expected one of: ${LOG_LEVELS.join(', ')}.`);
  }
  return level;
}

// Flag, then environment, then default
export function resolvePath(flag: string | undefined, envValue: string | undefined, fallback: string): string {
  if (flag !== undefined && flag !== '') return flag;
  if (envValue !== undefined && envValue !== '') return envValue;
  return fallback;
}
