/**
 * Word frequency mapping
 */

/** Word → occurrence count */
export type WordCounts = Map<string, number>;

/**
 * Sum of all counts
 */
export function totalWords(counts: WordCounts): number {
  let total = 0;
  for (const count of counts.values()) {
    total += count;
  }
  return total;
}
