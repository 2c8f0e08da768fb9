/**
 * Sync Command
 *
 * Reconcile the search index with the Drive folder tree.
 */

import type { Command } from 'commander';

import type { SyncMode } from '../../types/index.js';
import { formatPlan, formatSyncReport } from '../format.js';
import { reportFailure } from '../helpers.js';
import type { CliServices } from '../services.js';

interface SyncCommandOptions {
  incremental?: boolean;
  clean?: boolean;
  dryRun?: boolean;
}

export function registerSyncCommand(program: Command, services: CliServices): void {
  program
    .command('sync')
    .description('Index new and changed Drive files and remove deleted ones')
    .option('-i, --incremental', 'Skip files not modified since they were indexed')
    .option('-c, --clean', 'Delete every indexed document before syncing')
    .option('--dry-run', 'Print the plan without writing to the index')
    .action(async (options: SyncCommandOptions) => {
      const mode: SyncMode = options.incremental ? 'incremental' : 'full';

      try {
        const runner = services.createSyncRunner(services.loadConfig());

        if (options.dryRun) {
          console.log(formatPlan(await runner.preview(mode, options.clean ?? false)));
          return;
        }

        const report = await runner.runSync({ mode, clean: options.clean ?? false });
        console.log(formatSyncReport(report));

        if (report.failed > 0) {
          console.warn(`Warning: ${report.failed} file(s) failed and will be retried next run`);
        }
      } catch (error) {
        reportFailure(error);
      }
    });
}
