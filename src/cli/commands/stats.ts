/**
 * Stats Command
 */

import type { Command } from 'commander';

import { reportFailure } from '../helpers.js';
import type { CliServices } from '../services.js';

export function registerStatsCommand(program: Command, services: CliServices): void {
  program
    .command('stats')
    .description('Print the number of indexed documents')
    .action(async () => {
      try {
        const config = services.loadConfig();
        const store = services.createIndexStore(config);

        if (!(await store.ping())) {
          console.error(`Error: Cannot connect to Elasticsearch at ${config.elasticsearch.url}`);
          process.exitCode = 1;
          return;
        }

        const total = await store.count();
        console.log(`Index '${config.elasticsearch.indexName}': ${total} document(s)`);
      } catch (error) {
        reportFailure(error);
      }
    });
}
