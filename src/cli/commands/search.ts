/**
 * Search Command
 *
 * Query the running search API and print ranked results.
 */

import type { Command } from 'commander';

import { toError } from '../../errors/index.js';
import { formatSearchResults } from '../format.js';
import { MAX_LIMIT, MIN_LIMIT, parseLimit, reportFailure } from '../helpers.js';
import type { CliServices } from '../services.js';

interface SearchCommandOptions {
  limit: string;
  url?: string;
}

export function registerSearchCommand(program: Command, services: CliServices): void {
  program
    .command('search')
    .description('Search indexed documents through the search API')
    .argument('<query>', 'Search term or phrase')
    .option('-l, --limit <limit>', 'Max results', '10')
    .option('-u, --url <url>', 'Search API base URL (default: SEARCH_API_URL)')
    .action(async (query: string, options: SearchCommandOptions) => {
      const limit = parseLimit(options.limit);
      if (limit === undefined) {
        console.error(`Error: Limit must be between ${MIN_LIMIT} and ${MAX_LIMIT}`);
        process.exitCode = 1;
        return;
      }

      try {
        const baseUrl = options.url ?? services.loadConfig().searchApiUrl;
        const client = services.createSearchClient(baseUrl);

        try {
          const health = await client.health();
          if (health.status !== 'healthy') {
            console.warn(`Warning: search API reports ${health.status} (index '${health.index_name}')`);
          }
        } catch (error) {
          console.error(`Error: Search API is not running at ${baseUrl} (${toError(error).message})`);
          console.error('Start it with: drive-search serve');
          process.exitCode = 1;
          return;
        }

        console.log(formatSearchResults(await client.search(query, limit)));
      } catch (error) {
        reportFailure(error);
      }
    });
}
