/**
 * Frequency cache
 *
 * One JSON record per category under the cache directory. Records are
 * replaced wholesale and never expire; callers force a rebuild with refresh.
 */

import { randomUUID } from 'node:crypto';
import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, unlinkSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { categoryKey, normalizeCategory } from '../models/category.js';
import { totalWords, type WordCounts } from '../models/frequency.js';

/** Persisted form of a frequency mapping */
export interface CacheRecord {
  category: string;
  /** Epoch seconds */
  created_at: number;
  total_words: number;
  counts: Record<string, number>;
}

/**
 * Key-value store for computed frequencies
 */
export interface FrequencyStore {
  /** Stored counts, or null on a miss (including unreadable records) */
  load(category: string): WordCounts | null;
  save(category: string, counts: WordCounts): void;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * File-backed frequency store
 */
export class FileFrequencyCache implements FrequencyStore {
  constructor(private cacheDir: string) {}

  /**
   * Absolute path of the record for a category
   */
  pathFor(category: string): string {
    return join(this.cacheDir, `category_${categoryKey(category)}.json`);
  }

  load(category: string): WordCounts | null {
    const filepath = this.pathFor(category);
    if (!existsSync(filepath)) return null;

    let data: unknown;
    try {
      data = JSON.parse(readFileSync(filepath, 'utf-8'));
    } catch {
      // Corrupt or unreadable: rebuild on next save
      return null;
    }

    if (!isRecord(data) || !isRecord(data.counts)) return null;

    const counts: WordCounts = new Map();
    for (const [word, count] of Object.entries(data.counts)) {
      if (typeof count === 'number' && Number.isInteger(count)) {
        counts.set(word, count);
      }
    }
    return counts;
  }

  save(category: string, counts: WordCounts): void {
    const filepath = this.pathFor(category);
    if (!existsSync(this.cacheDir)) {
      mkdirSync(this.cacheDir, { recursive: true });
    }

    const record: CacheRecord = {
      category: normalizeCategory(category),
      created_at: Date.now() / 1000,
      total_words: totalWords(counts),
      counts: Object.fromEntries(counts),
    };

    // Readers only ever see a complete file; concurrent writers race on the rename
    const tmpPath = `${filepath}.${process.pid}.${randomUUID()}.tmp`;
    try {
      writeFileSync(tmpPath, JSON.stringify(record), 'utf-8');
      renameSync(tmpPath, filepath);
    } catch (error) {
      rmSync(tmpPath, { force: true });
      throw error;
    }
  }

  /**
   * Delete the record for a category. Returns false if there was none.
   */
  remove(category: string): boolean {
    const filepath = this.pathFor(category);
    if (!existsSync(filepath)) return false;
    unlinkSync(filepath);
    return true;
  }
}

/**
 * Create a file-backed frequency store
 */
export function createFrequencyCache(cacheDir: string): FileFrequencyCache {
  return new FileFrequencyCache(cacheDir);
}
