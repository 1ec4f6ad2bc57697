// src/config/loadConfig.ts

import * as fs from 'fs';
import { z } from 'zod';
import { validateConfig } from './ConfigValidator';
import type { ScraperConfig, ScraperConfigInput } from './ConfigValidator';
import { ConfigError, errorMessage } from '../utils/errors';

export interface LoadConfigOptions {
  file?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: Partial<ScraperConfigInput>;
}

const booleanFromEnv = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const EnvSchema = z.object({
  SCRAPER_PROJECTS: z.string().optional(),
  SCRAPER_BASE_URL: z.string().optional(),
  SCRAPER_PAGE_SIZE: z.coerce.number().optional(),
  SCRAPER_CONCURRENCY: z.coerce.number().optional(),
  SCRAPER_RATE_LIMIT_DELAY_MS: z.coerce.number().optional(),
  SCRAPER_MAX_RETRIES: z.coerce.number().optional(),
  SCRAPER_REQUEST_TIMEOUT_MS: z.coerce.number().optional(),
  SCRAPER_CHECKPOINT_FILE: z.string().optional(),
  SCRAPER_OUTPUT_DIR: z.string().optional(),
  SCRAPER_APPEND_MODE: booleanFromEnv.optional(),
  SCRAPER_TEST_LIMIT: z.coerce.number().optional(),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  LOG_FORMAT: z.enum(['json', 'pretty']).optional(),
  LOG_FILE: z.string().optional(),
});

function readConfigFile(file: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${file}: ${errorMessage(error)}`);
  }
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigError(`Config file ${file} must contain a JSON object`);
  }
  return { ...parsed };
}

/**
 * Map recognised environment variables onto config fields.
 * Empty variables are ignored; unset ones come back as undefined and are
 * dropped by the merge.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): Partial<ScraperConfigInput> {
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== ''));
  const result = EnvSchema.safeParse(present);
  if (!result.success) {
    const issues = result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`);
    throw new ConfigError(`Invalid environment: ${issues.join(', ')}`, issues);
  }
  const e = result.data;

  return {
    projects: e.SCRAPER_PROJECTS?.split(',')
      .map((p) => p.trim())
      .filter((p) => p.length > 0),
    baseUrl: e.SCRAPER_BASE_URL,
    pageSize: e.SCRAPER_PAGE_SIZE,
    concurrency: e.SCRAPER_CONCURRENCY,
    checkpointFile: e.SCRAPER_CHECKPOINT_FILE,
    outputDir: e.SCRAPER_OUTPUT_DIR,
    appendMode: e.SCRAPER_APPEND_MODE,
    testModeLimit: e.SCRAPER_TEST_LIMIT,
    http: {
      rateLimitDelayMs: e.SCRAPER_RATE_LIMIT_DELAY_MS,
      maxRetries: e.SCRAPER_MAX_RETRIES,
      timeoutMs: e.SCRAPER_REQUEST_TIMEOUT_MS,
    },
    logging: {
      level: e.LOG_LEVEL,
      format: e.LOG_FORMAT,
      file: e.LOG_FILE,
    },
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Later layers win; undefined values never overwrite
function mergeLayers(...layers: Array<Record<string, unknown>>): Record<string, unknown> {
  const merged: Record<string, unknown> = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value === undefined) continue;
      const current = merged[key];
      if (isPlainObject(value)) {
        merged[key] = mergeLayers(isPlainObject(current) ? current : {}, value);
      } else {
        merged[key] = value;
      }
    }
  }
  return merged;
}

/**
 * Resolve configuration from (lowest to highest precedence) a JSON file,
 * environment variables and explicit overrides, then validate it.
 */
export function loadConfig(options: LoadConfigOptions = {}): ScraperConfig {
  const fromFile = options.file ? readConfigFile(options.file) : {};
  const fromEnv = configFromEnv(options.env ?? process.env);
  return validateConfig(mergeLayers(fromFile, fromEnv, options.overrides ?? {}));
}
