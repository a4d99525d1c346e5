#!/usr/bin/env tsx
/**
 * @catfreq/cli - Command-line interface for catfreq
 *
 * Word frequencies across the pages of a wiki category.
 */

import { Command } from 'commander';
import { VERSION } from '@catfreq/core';
import { loadEnvFile } from './utils/context.js';

// Load .env before anything reads process.env
loadEnvFile();

// Import commands
import { freqCommand } from './commands/freq.js';
import { cacheClearCommand, cachePathCommand } from './commands/cache.js';
import { serveCommand } from './commands/serve.js';

const program = new Command();

program
  .name('catfreq')
  .description('Cumulative frequency of non-common words across all pages in a wiki category')
  .version(VERSION);

// Frequency table (default command)
program
  .command('freq <category>', { isDefault: true })
  .description('Print word frequencies for a category (with or without the Category: prefix)')
  .option('--top <n>', 'Only print the top N words (0 = all)', '0')
  .option('--sleep <seconds>', 'Pause between page batches (politeness)', '0')
  .option('--refresh', 'Recompute instead of using cached counts')
  .option('--min-count <n>', 'Drop words seen fewer than N times', '1')
  .option('--metric <metric>', 'Value for --json items: count|frequency', 'count')
  .option('--json', 'Output JSON instead of a table')
  .option('--no-meta', 'Omit meta block from JSON output')
  .action(freqCommand);

// Cache operations
const cache = program
  .command('cache')
  .description('Cached category counts')
  .action(() => cache.help());

cache
  .command('path <category>')
  .description('Print the cache file for a category')
  .action(cachePathCommand);

cache
  .command('clear <category>')
  .description('Delete the cached counts for a category')
  .action(cacheClearCommand);

// Query server
program
  .command('serve')
  .description('Run the HTTP query server')
  .option('-p, --port <n>', 'Port to listen on (default: $PORT or 8000)')
  .action(serveCommand);

// Parse and run
await program.parseAsync();
