/**
 * Ranked views over word counts
 */

import { totalWords, type WordCounts } from '../models/frequency.js';

/** [word, count] */
export type RankedRow = [word: string, count: number];

export type Metric = 'count' | 'frequency';

export const METRICS: readonly Metric[] = ['count', 'frequency'];

export interface RankOptions {
  /** Drop words counted fewer times than this (default 1) */
  minCount?: number;
  /** Keep at most this many rows; 0 keeps all */
  topN?: number;
}

/** Word with its metric value */
export interface WordItem {
  text: string;
  value: number;
}

/** Table row with running totals */
export interface CumulativeRow {
  rank: number;
  word: string;
  count: number;
  cumulativeCount: number;
  /** Share of the grand total covered so far, 0-100 */
  cumulativePercent: number;
}

/**
 * Order words by count (desc), then word (asc); filter, then truncate
 */
export function rankWords(counts: WordCounts, options: RankOptions = {}): RankedRow[] {
  const { minCount = 1, topN = 0 } = options;

  let rows: RankedRow[] = [...counts.entries()].sort((a, b) => {
    if (a[1] !== b[1]) return b[1] - a[1];
    return a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0;
  });

  rows = rows.filter(([, count]) => count >= minCount);
  if (topN > 0) {
    rows = rows.slice(0, topN);
  }
  return rows;
}

/**
 * Attach metric values. Frequencies are relative to the whole mapping's total,
 * not just the rows shown.
 */
export function buildWordItems(rows: RankedRow[], metric: Metric, total: number): WordItem[] {
  if (metric === 'frequency') {
    const denom = total || 1;
    return rows.map(([text, count]) => ({ text, value: count / denom }));
  }
  return rows.map(([text, count]) => ({ text, value: count }));
}

/**
 * Running count and percentage of the grand total
 */
export function buildCumulativeRows(rows: RankedRow[], total: number): CumulativeRow[] {
  let cumulativeCount = 0;
  return rows.map(([word, count], index) => {
    cumulativeCount += count;
    return {
      rank: index + 1,
      word,
      count,
      cumulativeCount,
      cumulativePercent: total ? (cumulativeCount / total) * 100 : 0,
    };
  });
}

/** Structured response for the query surface and `--json` output */
export interface FrequencyReport {
  category: string;
  metric: Metric;
  total_words: number;
  items: WordItem[];
}

/**
 * Rank, filter and annotate a mapping in one step
 */
export function buildReport(
  category: string,
  counts: WordCounts,
  options: RankOptions & { metric?: Metric } = {}
): FrequencyReport {
  const metric = options.metric ?? 'count';
  const total = totalWords(counts);
  const rows = rankWords(counts, options);
  return {
    category,
    metric,
    total_words: total,
    items: buildWordItems(rows, metric, total),
  };
}

export function isMetric(value: string): value is Metric {
  return (METRICS as readonly string[]).includes(value);
}
