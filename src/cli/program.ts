import { Command } from 'commander';

import { SERVICE_VERSION } from '../api/search-handler.js';
import { registerSearchCommand } from './commands/search.js';
import { registerServeCommand } from './commands/serve.js';
import { registerStatsCommand } from './commands/stats.js';
import { registerSyncCommand } from './commands/sync.js';
import type { CliServices } from './services.js';

export function createProgram(services: CliServices): Command {
  const program = new Command();

  program
    .name('drive-search')
    .description('Index Google Drive documents into Elasticsearch and search them')
    .version(SERVICE_VERSION);

  registerSyncCommand(program, services);
  registerSearchCommand(program, services);
  registerServeCommand(program, services);
  registerStatsCommand(program, services);

  return program;
}
