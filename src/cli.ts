#!/usr/bin/env node

/**
 * drive-search CLI
 *
 * Commands:
 * - sync: Index the Drive folder tree into Elasticsearch
 * - search: Query the search API
 * - serve: Start the search API
 * - stats: Count indexed documents
 */

import 'dotenv/config';

import { createProgram } from './cli/program.js';
import { defaultServices } from './cli/services.js';

await createProgram(defaultServices).parseAsync(process.argv);
