// src/cli/commands/validate.ts

import type { Command } from 'commander';
import { formatValidationReport, validateOutputDir } from '../../validator/OutputValidator';
import { DEFAULT_OUTPUT_DIR, resolvePath } from '../options';

export function registerValidateCommand(program: Command): void {
  program
    .command('validate')
    .description('Check every *.jsonl file in the output directory')
    .argument('[dir]', 'Output directory (default: SCRAPER_OUTPUT_DIR or ./output)')
    .option('--strict', 'Also check field types and training-task values')
    .action((dir: string | undefined, options: { strict?: boolean }) => {
      const target = resolvePath(dir, process.env.SCRAPER_OUTPUT_DIR, DEFAULT_OUTPUT_DIR);
      const result = validateOutputDir(target, { strict: options.strict === true });

      for (const line of formatValidationReport(result)) {
        console.log(line);
      }

      if (!result.allValid) {
        process.exitCode = 1;
      }
    });
}
