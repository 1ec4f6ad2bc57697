// src/cli/commands/scrape.ts

import type { Command } from 'commander';
import type { ScraperConfigInput } from '../../config/ConfigValidator';
import type { LogLevel } from '../../observability/Logger';
import type { RunSummary } from '../../scraper';
import { loadConfig } from '../../config/loadConfig';
import { IssueScraper } from '../../scraper';
import { parseLogLevel, parsePositiveInt } from '../options';
import { errorMessage } from '../../utils/errors';

interface ScrapeOptions {
  config?: string;
  outputDir?: string;
  checkpoint?: string;
  overwrite?: boolean;
  limit?: number;
  logLevel?: LogLevel;
}

export const EXIT_INTERRUPTED = 130;

export function buildOverrides(projects: string[], options: ScrapeOptions): Partial<ScraperConfigInput> {
  const overrides: Partial<ScraperConfigInput> = {};
  if (projects.length > 0) overrides.projects = projects;
  if (options.outputDir !== undefined) overrides.outputDir = options.outputDir;
  if (options.checkpoint !== undefined) overrides.checkpointFile = options.checkpoint;
  if (options.overwrite === true) overrides.appendMode = false;
  if (options.limit !== undefined) overrides.testModeLimit = options.limit;
  if (options.logLevel !== undefined) overrides.logging = { level: options.logLevel };
  return overrides;
}

export function exitCodeFor(summary: RunSummary): number {
  if (summary.interrupted) return EXIT_INTERRUPTED;
  return summary.errors > 0 ? 1 : 0;
}

function printSummary(summary: RunSummary): void {
  console.log('\nScrape summary');
  console.log('─'.repeat(60));
  for (const project of summary.projects) {
    const state = project.completed ? 'complete' : 'partial';
    console.log(
      `${project.project.padEnd(16)}${String(project.recordsWritten).padStart(8)} records  ` +
        `offset ${project.startOffset} → ${project.endOffset}  ${state}` +
        (project.errors > 0 ? `  (${project.errors} errors)` : '')
    );
  }
  console.log('─'.repeat(60));
  console.log(`Records written:  ${summary.recordsWritten}`);
  console.log(`Comments fetched: ${summary.commentsFetched}`);
  console.log(`Errors:           ${summary.errors}`);
  console.log(`Duration:         ${(summary.durationMs / 1000).toFixed(1)}s`);
  console.log(`Output:           ${summary.outputDir}`);
  if (summary.interrupted) {
    console.log('\nInterrupted; run again to resume from the checkpoint.');
  }
}

function createScraper(projects: string[], options: ScrapeOptions): IssueScraper | undefined {
  try {
    const config = loadConfig({ file: options.config, overrides: buildOverrides(projects, options) });
    return IssueScraper.create(config);
  } catch (error: unknown) {
    console.error(`Error: ${errorMessage(error)}`);
    return undefined;
  }
}

export function registerScrapeCommand(program: Command): void {
  program
    .command('scrape')
    .description('Scrape issues and comments of one or more projects into JSON Lines files')
    .argument('[projects...]', 'Project keys (default: from config or SCRAPER_PROJECTS)')
    .option('-c, --config <file>', 'JSON configuration file')
    .option('-o, --output-dir <dir>', 'Directory for <project>_issues.jsonl files')
    .option('--checkpoint <file>', 'Checkpoint file')
    .option('--overwrite', 'Truncate output files and restart every project from the beginning')
    .option('--limit <n>', 'Process at most n issues per project', parsePositiveInt)
    .option('--log-level <level>', 'debug, info, warn or error', parseLogLevel)
    .action(async (projects: string[], options: ScrapeOptions) => {
      const scraper = createScraper(projects, options);
      if (scraper === undefined) {
        process.exitCode = 1;
        return;
      }

      const onSigint = (): void => scraper.requestStop();
      process.once('SIGINT', onSigint);

      try {
        const summary = await scraper.run();
        printSummary(summary);
        process.exitCode = exitCodeFor(summary);
      } catch (error: unknown) {
        console.error(`Scrape failed: ${errorMessage(error)}`);
        process.exitCode = 1;
      } finally {
        process.removeListener('SIGINT', onSigint);
        await scraper.close();
      }
    });
}
