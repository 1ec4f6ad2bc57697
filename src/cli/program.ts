// src/cli/program.ts

import { Command } from 'commander';
import { registerScrapeCommand } from './commands/scrape';
import { registerValidateCommand } from './commands/validate';
import { registerCheckpointCommand } from './commands/checkpoint';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('issue-scraper')
    .description('Scrape issue-tracker projects into JSON Lines training corpora')
    .version('1.0.0');

  registerScrapeCommand(program);
  registerValidateCommand(program);
  registerCheckpointCommand(program);

  return program;
}
