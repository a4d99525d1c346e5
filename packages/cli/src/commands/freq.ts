/**
 * freq command - Word frequencies for a category
 *
 * Thin wrapper around the @catfreq/core pipeline and view builder.
 */

import ora from 'ora';
import {
  buildCumulativeRows,
  buildReport,
  parseDelaySeconds,
  parseMetric,
  parseNonNegativeInt,
  parsePositiveInt,
  rankWords,
  requireCategory,
  totalWords,
  InvalidParameterError,
  type Metric,
} from '@catfreq/core';
import { withContext } from '../utils/context.js';
import { buildMeta, withMeta } from '../utils/meta.js';
import { formatCumulativeTable, printError, printInfo } from '../utils/format.js';

/** Exit status when the category has no pages */
export const EXIT_NO_PAGES = 2;

export interface FreqOptions {
  top?: string;
  sleep?: string;
  refresh?: boolean;
  minCount?: string;
  metric?: string;
  json?: boolean;
  meta?: boolean;
}

export async function freqCommand(categoryArg: string, options: FreqOptions): Promise<void> {
  let category: string;
  let topN: number;
  let minCount: number;
  let delayMs: number;
  let metric: Metric;
  try {
    category = requireCategory(categoryArg);
    topN = parseNonNegativeInt(options.top, '--top', 0);
    minCount = parsePositiveInt(options.minCount, '--min-count', 1);
    delayMs = parseDelaySeconds(options.sleep, '--sleep');
    metric = parseMetric(options.metric);
  } catch (error) {
    if (error instanceof InvalidParameterError) {
      printError(error.message);
      process.exit(1);
    }
    throw error;
  }

  const spinner = ora('Loading word frequencies...').start();

  let status = 0;
  try {
    status = await withContext(async (ctx) => {
      const result = await ctx.pipeline.getFrequencies(category, {
        refresh: options.refresh,
        delayMs,
        onProgress: (message, current, total) => {
          if (current === undefined) {
            spinner.text = message;
          } else {
            spinner.text = total === undefined ? `${message} (${current})` : `${message} (${current}/${total})`;
          }
        },
      });

      if (result.outcome === 'empty-category') {
        spinner.fail('No pages found for category.');
        return EXIT_NO_PAGES;
      }

      if (result.outcome === 'cache-hit') {
        spinner.succeed(`Loaded cached counts for ${category}`);
      } else {
        spinner.succeed(`Counted words across ${result.pageCount} pages`);
        printInfo(`API requests: ${ctx.client.totalRequests}`);
      }

      if (options.json) {
        const report = buildReport(category, result.counts, {
          metric,
          topN,
          minCount,
        });
        const output = options.meta === false ? report : withMeta(report, buildMeta(ctx));
        console.log(JSON.stringify(output, null, 2));
        return 0;
      }

      const rows = rankWords(result.counts, { minCount, topN });
      console.log(formatCumulativeTable(buildCumulativeRows(rows, totalWords(result.counts))));
      return 0;
    });
  } catch (error) {
    spinner.fail('Word frequency run failed');
    const message = error instanceof Error ? error.message : String(error);
    printError(message);
    status = 1;
  }

  if (status !== 0) {
    process.exit(status);
  }
}
