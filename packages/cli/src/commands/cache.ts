/**
 * cache command - Inspect or drop cached category counts
 */

import chalk from 'chalk';
import { normalizeCategory, requireCategory } from '@catfreq/core';
import { withContext } from '../utils/context.js';
import { printError, printSuccess, printWarning } from '../utils/format.js';

export async function cachePathCommand(category: string): Promise<void> {
  try {
    await withContext(async (ctx) => {
      console.log(ctx.cache.pathFor(requireCategory(category)));
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    printError(message);
    process.exit(1);
  }
}

export async function cacheClearCommand(category: string): Promise<void> {
  try {
    await withContext(async (ctx) => {
      const name = requireCategory(category);
      if (ctx.cache.remove(name)) {
        printSuccess(`Removed cached counts for ${chalk.bold(normalizeCategory(name))}`);
      } else {
        printWarning(`No cached counts for ${normalizeCategory(name)}`);
      }
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    printError(message);
    process.exit(1);
  }
}
