/**
 * Serve Command
 */

import type { Command } from 'commander';

import { parsePort, reportFailure } from '../helpers.js';
import type { CliServices } from '../services.js';

interface ServeCommandOptions {
  port?: string;
  host?: string;
}

export function registerServeCommand(program: Command, services: CliServices): void {
  program
    .command('serve')
    .description('Start the HTTP search API')
    .option('-p, --port <port>', 'Port to listen on (default: API_PORT)')
    .option('--host <host>', 'Interface to bind (default: API_HOST)')
    .action(async (options: ServeCommandOptions) => {
      try {
        const config = services.loadConfig();

        let port = config.server.port;
        if (options.port !== undefined) {
          const parsed = parsePort(options.port);
          if (parsed === undefined) {
            console.error(`Error: Invalid port ${options.port}`);
            process.exitCode = 1;
            return;
          }
          port = parsed;
        }

        await services.startServer(services.createSearchHandler(config), {
          host: options.host ?? config.server.host,
          port,
        });
      } catch (error) {
        reportFailure(error);
      }
    });
}
