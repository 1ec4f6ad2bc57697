// src/config/ConfigValidator.ts

import { z } from 'zod';
import { ConfigError } from '../utils/errors';

export const DEFAULT_FIELDS = [
  'summary',
  'description',
  'status',
  'priority',
  'issuetype',
  'reporter',
  'assignee',
  'created',
  'updated',
  'resolutiondate',
  'labels',
  'components',
];

// HTTP client configuration schema
const HttpConfigSchema = z
  .object({
    rateLimitDelayMs: z.number().min(0, 'rateLimitDelayMs must be positive').default(1000),
    maxRetries: z.number().int().min(1, 'maxRetries must be at least 1').max(10).default(5),
    timeoutMs: z.number().int().min(1000, 'timeoutMs must be at least 1000').default(30000),
    backoffBaseMs: z.number().min(0).default(1000),
    defaultRetryAfterMs: z.number().min(0).default(60000),
    userAgent: z.string().min(1).default('issue-corpus-scraper/1.0'),
  })
  .default({});

// Training-task classification thresholds
const ClassificationConfigSchema = z
  .object({
    summarizationMinLength: z.number().int().min(0).default(500),
    qaMinComments: z.number().int().min(0).default(2),
  })
  .default({});

// Logger configuration schema
const LoggerConfigSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    format: z.enum(['json', 'pretty']).default('json'),
    file: z.string().min(1).optional(),
    silent: z.boolean().optional(),
  })
  .default({});

// Metrics configuration schema
const MetricsConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
    port: z.number().int().min(1024).max(65535).optional(),
    path: z.string().startsWith('/').optional(),
  })
  .default({});

export const ScraperConfigSchema = z.object({
  projects: z
    .array(z.string().trim().min(1, 'Project names cannot be empty'))
    .min(1, 'projects cannot be empty'),
  baseUrl: z.string().url().default('https://issues.apache.org/jira/rest/api/2'),
  fields: z.array(z.string().min(1)).min(1).default(DEFAULT_FIELDS),
  pageSize: z.number().int().min(1).max(1000).default(50),
  concurrency: z.number().int().min(1).max(50).default(5),
  http: HttpConfigSchema,
  checkpointFile: z.string().min(1).default('checkpoint.json'),
  outputDir: z.string().min(1).default('output'),
  appendMode: z.boolean().default(true),
  classification: ClassificationConfigSchema,
  testModeLimit: z.number().int().positive().optional(),
  logging: LoggerConfigSchema,
  metrics: MetricsConfigSchema,
});

/** Configuration as accepted from callers; every field with a default may be omitted. */
export type ScraperConfigInput = z.input<typeof ScraperConfigSchema>;
/** Fully-resolved configuration. */
export type ScraperConfig = z.output<typeof ScraperConfigSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((err) =>
    err.path.length > 0 ? `${err.path.join('.')}: ${err.message}` : err.message
  );
}

/**
 * Validate scraper configuration
 *
 * @returns Validated configuration with defaults applied
 * @throws {ConfigError} Listing every invalid field
 */
export function validateConfig(config: unknown): ScraperConfig {
  const result = ScraperConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigError(`Configuration errors: ${issues.join(', ')}`, issues);
  }
  return result.data;
}

/**
 * Validate configuration and return user-friendly errors
 */
export function validateConfigSafe(
  config: unknown
): { success: true; data: ScraperConfig } | { success: false; errors: string[] } {
  const result = ScraperConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return { success: false, errors: formatIssues(result.error) };
}
