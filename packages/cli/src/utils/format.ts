/**
 * CLI output formatting utilities
 *
 * Status messages go to stderr so stdout carries only the report.
 */

import chalk from 'chalk';
import type { CumulativeRow } from '@catfreq/core';

export const TABLE_HEADER = ['rank', 'word', 'count', 'cum_count', 'cum_pct'].join('\t');

/**
 * Tab-separated cumulative frequency table
 */
export function formatCumulativeTable(rows: CumulativeRow[]): string {
  const lines = [TABLE_HEADER];
  for (const row of rows) {
    lines.push([
      row.rank,
      row.word,
      row.count,
      row.cumulativeCount,
      row.cumulativePercent.toFixed(4),
    ].join('\t'));
  }
  return lines.join('\n');
}

/**
 * Print success message
 */
export function printSuccess(message: string): void {
  console.error(chalk.green('✓'), message);
}

/**
 * Print error message
 */
export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

/**
 * Print warning message
 */
export function printWarning(message: string): void {
  console.error(chalk.yellow('!'), message);
}

/**
 * Print info message
 */
export function printInfo(message: string): void {
  console.error(chalk.blue('i'), message);
}
