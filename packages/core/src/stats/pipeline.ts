/**
 * Frequency pipeline - builds or loads word counts for a category
 *
 * Coordinates between:
 * - MediaWiki API (category members, extracts)
 * - Tokenizer (non-common words)
 * - Frequency store (cached results)
 */

import { sleep, type MediaWikiClient } from '../api/client.js';
import { countableWords } from '../parser/tokenize.js';
import type { WordCounts } from '../models/frequency.js';
import type { FrequencyStore } from '../storage/cache.js';

/** Page ids per round of extract requests; the politeness delay falls between rounds */
export const PAGE_BATCH_SIZE = 200;

/** Frequency options */
export interface FrequencyOptions {
  /** Ignore the cache and rebuild from the API */
  refresh?: boolean;
  /** Pause between page batches (ms) */
  delayMs?: number;
  /** Progress callback */
  onProgress?: (message: string, current?: number, total?: number) => void;
}

/** How a frequency mapping was obtained */
export type FrequencyResult =
  | { outcome: 'cache-hit'; counts: WordCounts }
  | { outcome: 'empty-category'; counts: WordCounts }
  | { outcome: 'aggregated'; counts: WordCounts; pageCount: number };

/** The parts of the API client the pipeline uses */
export type PageSource = Pick<MediaWikiClient, 'getCategoryMembers' | 'getPlaintextExtracts'>;

/** Pipeline dependencies */
export interface PipelineDeps {
  client: PageSource;
  store: FrequencyStore;
  /** Delay implementation (tests replace it) */
  wait?: (ms: number) => Promise<void>;
}

/**
 * Frequency pipeline
 */
export class FrequencyPipeline {
  private client: PageSource;
  private store: FrequencyStore;
  private wait: (ms: number) => Promise<void>;

  constructor(deps: PipelineDeps) {
    this.client = deps.client;
    this.store = deps.store;
    this.wait = deps.wait ?? sleep;
  }

  /**
   * Get word counts for a category, from cache unless refresh is set
   */
  async getFrequencies(category: string, options: FrequencyOptions = {}): Promise<FrequencyResult> {
    const { refresh = false, delayMs = 0, onProgress } = options;

    if (!refresh) {
      const cached = this.store.load(category);
      if (cached) {
        return { outcome: 'cache-hit', counts: cached };
      }
    }

    const pageIds: number[] = [];
    const members = this.client.getCategoryMembers(category, {
      onProgress: (listed) => onProgress?.('Listing category members', listed),
    });
    for await (const page of members) {
      pageIds.push(page.pageId);
    }

    // Not cached, so a later run re-checks without --refresh
    if (pageIds.length === 0) {
      return { outcome: 'empty-category', counts: new Map() };
    }

    const counts: WordCounts = new Map();

    for (let i = 0; i < pageIds.length; i += PAGE_BATCH_SIZE) {
      if (i > 0 && delayMs > 0) {
        await this.wait(delayMs);
      }

      const batch = pageIds.slice(i, i + PAGE_BATCH_SIZE);
      const extracts = await this.client.getPlaintextExtracts(batch, {
        onProgress: (fetched) => onProgress?.('Fetching extracts', i + fetched, pageIds.length),
      });

      for (const text of extracts.values()) {
        for (const word of countableWords(text)) {
          counts.set(word, (counts.get(word) ?? 0) + 1);
        }
      }
    }

    this.store.save(category, counts);
    return { outcome: 'aggregated', counts, pageCount: pageIds.length };
  }
}

/**
 * Create a frequency pipeline
 */
export function createFrequencyPipeline(
  client: PageSource,
  store: FrequencyStore,
  options: { wait?: (ms: number) => Promise<void> } = {}
): FrequencyPipeline {
  return new FrequencyPipeline({ client, store, wait: options.wait });
}
