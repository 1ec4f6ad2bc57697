// src/index.ts

export { IssueScraper } from './scraper';
export type { ScraperDeps, RunSummary, ProjectSummary } from './scraper';
export { loadConfig, configFromEnv } from './config/loadConfig';
export type { LoadConfigOptions } from './config/loadConfig';
export { ScraperConfigSchema, validateConfig, validateConfigSafe } from './config/ConfigValidator';
export type { ScraperConfig, ScraperConfigInput } from './config/ConfigValidator';
export { HttpCore } from './core/http/HttpCore';
export type { HttpResult } from './core/http/types';
export { JiraConnector } from './connectors/jira/JiraConnector';
export type { IssueSource, SearchPage } from './connectors/types';
export { CheckpointStore } from './core/checkpoint/CheckpointStore';
export { CommentFetcher } from './core/fetcher/CommentFetcher';
export { Normalizer, IssueRecordLineSchema } from './core/normalizer/Normalizer';
export type { IssueRecordLine } from './core/normalizer/Normalizer';
export { classifyTrainingTask } from './core/normalizer/Classifier';
export type { IssueRecord, IssueComment, TrainingTask } from './core/normalizer/types';
export { JsonlWriter } from './core/output/JsonlWriter';
export {
  validateJsonlFile,
  validateOutputDir,
  formatValidationReport,
} from './validator/OutputValidator';
export type { FileValidation, DirectoryValidation } from './validator/OutputValidator';
export { Logger } from './observability/Logger';
export { MetricsCollector } from './observability/MetricsCollector';

// Export error classes for error handling
export {
  ScraperError,
  ConfigError,
  ApiError,
  ApiClientError,
  ApiServerError,
  RateLimitError,
  InvalidResponseError,
  RetriesExhaustedError,
  NetworkError,
  NetworkTimeoutError,
  CheckpointError,
} from './utils/errors';
