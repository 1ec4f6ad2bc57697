// src/cli/commands/checkpoint.ts

import type { Command } from 'commander';
import { CheckpointStore } from '../../core/checkpoint/CheckpointStore';
import { Logger } from '../../observability/Logger';
import { DEFAULT_CHECKPOINT_FILE, resolvePath } from '../options';
import { errorMessage } from '../../utils/errors';

function openStore(file: string | undefined): CheckpointStore {
  const path = resolvePath(file, process.env.SCRAPER_CHECKPOINT_FILE, DEFAULT_CHECKPOINT_FILE);
  const store = new CheckpointStore(path, new Logger({ level: 'warn' }));
  store.load();
  return store;
}

export function registerCheckpointCommand(program: Command): void {
  const checkpoint = program.command('checkpoint').description('Inspect or reset resume offsets');

  checkpoint
    .command('show')
    .description('Print the stored offset of every project')
    .option('--checkpoint <file>', 'Checkpoint file')
    .action((options: { checkpoint?: string }) => {
      const store = openStore(options.checkpoint);
      const entries = Object.entries(store.snapshot());

      if (entries.length === 0) {
        console.log(`No checkpoints recorded in ${store.path}`);
        return;
      }

      console.log(`Checkpoints in ${store.path}:`);
      for (const [project, offset] of entries) {
        console.log(`  ${project.padEnd(16)}${offset}`);
      }
    });

  checkpoint
    .command('reset')
    .description('Forget the offset of a project so the next scrape starts from the beginning')
    .argument('<project>', 'Project key')
    .option('--checkpoint <file>', 'Checkpoint file')
    .action((project: string, options: { checkpoint?: string }) => {
      try {
        const store = openStore(options.checkpoint);
        const previous = store.progress(project);
        store.reset(project);
        console.log(`Reset ${project} (was ${previous})`);
      } catch (error: unknown) {
        console.error(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });
}
