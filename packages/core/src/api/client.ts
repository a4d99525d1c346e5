/**
 * MediaWiki API Client
 *
 * Read-only HTTP client for category listings and plain-text extracts,
 * with timeout and retry/backoff on transient failures.
 */

import {
  getApiError,
  parseCategoryMembersResponse,
  parseExtractsResponse,
  type BatchOptions,
  type PageRef,
} from './types.js';
import { categoryTitle } from '../models/category.js';

/** Client configuration */
export interface ClientConfig {
  /** Wiki API URL (e.g., https://en.wikipedia.org/w/api.php) */
  apiUrl: string;
  /** User agent string */
  userAgent?: string;
  /** Request timeout (ms) */
  timeoutMs?: number;
  /** Retries after the first attempt */
  maxRetries?: number;
  /** Base retry delay (ms), doubled on each retry */
  retryDelayMs?: number;
}

/** Default configuration */
const DEFAULT_CONFIG: Required<Omit<ClientConfig, 'apiUrl'>> = {
  userAgent: 'catfreq/1.0 (category word frequencies)',
  timeoutMs: 30000,
  maxRetries: 5,
  retryDelayMs: 800,
};

/** API maximum for cmlimit */
export const CATEGORY_BATCH_SIZE = 500;

/** Extracts are large; stay well under the server's per-request limits */
export const EXTRACT_BATCH_SIZE = 20;

const RETRYABLE_STATUSES = new Set([429, 500, 502, 503, 504]);

type QueryParams = Record<string, string | number | undefined>;

/**
 * Raised when a request fails for good (retries exhausted, non-retryable
 * status, or an API error payload)
 */
export class ApiRequestError extends Error {
  constructor(
    message: string,
    readonly status: number | null = null,
    readonly code: string | null = null
  ) {
    super(message);
    this.name = 'ApiRequestError';
  }
}

/**
 * Sleep for a given number of milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * MediaWiki API Client
 */
export class MediaWikiClient {
  private config: Required<ClientConfig>;
  private requestCount: number = 0;

  constructor(config: ClientConfig) {
    this.config = {
      ...DEFAULT_CONFIG,
      ...config,
    };
  }

  /**
   * Determine retry delay with exponential backoff
   */
  private getRetryDelayMs(attempt: number): number {
    return this.config.retryDelayMs * Math.pow(2, attempt);
  }

  /**
   * Connection failures and timeouts are retryable; anything else is not
   */
  private isRetryableError(error: unknown): boolean {
    if (error instanceof ApiRequestError) return false;
    if (!(error instanceof Error)) return false;
    if (error.name === 'AbortError' || error.name === 'TimeoutError') return true;
    // undici reports network failures as TypeError("fetch failed")
    if (error instanceof TypeError) return true;
    return /ECONNRESET|ECONNREFUSED|ETIMEDOUT|EAI_AGAIN|ENOTFOUND|socket hang up/i.test(error.message);
  }

  private buildUrl(params: QueryParams): string {
    const url = new URL(this.config.apiUrl);
    url.searchParams.set('format', 'json');
    url.searchParams.set('formatversion', '2');

    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }
    return url.toString();
  }

  /**
   * Make a GET request with retry/backoff and timeout
   */
  async get(params: QueryParams): Promise<unknown> {
    const url = this.buildUrl(params);
    const maxRetries = this.config.maxRetries;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      this.requestCount++;

      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs);

      try {
        const response = await fetch(url, {
          headers: { 'User-Agent': this.config.userAgent },
          signal: controller.signal,
        });

        if (!response.ok) {
          if (attempt < maxRetries && RETRYABLE_STATUSES.has(response.status)) {
            await sleep(this.getRetryDelayMs(attempt));
            continue;
          }
          throw new ApiRequestError(
            `HTTP ${response.status}: ${response.statusText}`,
            response.status
          );
        }

        const result: unknown = await response.json();
        const apiError = getApiError(result);
        if (apiError) {
          throw new ApiRequestError(
            `API error ${apiError.code}: ${apiError.info}`,
            response.status,
            apiError.code
          );
        }
        return result;
      } catch (error) {
        if (attempt < maxRetries && this.isRetryableError(error)) {
          await sleep(this.getRetryDelayMs(attempt));
          continue;
        }
        if (error instanceof ApiRequestError) throw error;
        const message = error instanceof Error ? error.message : String(error);
        throw new ApiRequestError(`Request failed after ${attempt + 1} attempt(s): ${message}`);
      } finally {
        clearTimeout(timeout);
      }
    }

    throw new ApiRequestError('Request failed after retries');
  }

  // =========================================================================
  // Category queries
  // =========================================================================

  /**
   * Enumerate the pages (not subcategories) in a category
   */
  async *getCategoryMembers(category: string, options: BatchOptions = {}): AsyncGenerator<PageRef> {
    const cmtitle = categoryTitle(category);
    let continueToken: string | undefined;
    let seen = 0;

    do {
      const result = parseCategoryMembersResponse(await this.get({
        action: 'query',
        list: 'categorymembers',
        cmtitle,
        cmtype: 'page',
        cmlimit: CATEGORY_BATCH_SIZE,
        cmcontinue: continueToken,
      }));

      for (const member of result.members) {
        seen++;
        yield { pageId: member.pageid, title: member.title };
      }

      continueToken = result.continueToken;
      options.onProgress?.(seen, -1);
    } while (continueToken);
  }

  /**
   * Get plain-text extracts for pages (batched). Pages without an extract map to ''.
   */
  async getPlaintextExtracts(pageIds: number[], options: BatchOptions = {}): Promise<Map<number, string>> {
    const results = new Map<number, string>();
    for (let i = 0; i < pageIds.length; i += EXTRACT_BATCH_SIZE) {
      const batch = pageIds.slice(i, i + EXTRACT_BATCH_SIZE);

      const result = parseExtractsResponse(await this.get({
        action: 'query',
        prop: 'extracts',
        explaintext: 1,
        exsectionformat: 'plain',
        pageids: batch.join('|'),
      }));

      for (const page of result.pages) {
        results.set(page.pageid, page.extract);
      }

      options.onProgress?.(Math.min(i + EXTRACT_BATCH_SIZE, pageIds.length), pageIds.length);
    }

    return results;
  }

  // =========================================================================
  // Utility methods
  // =========================================================================

  /**
   * Number of HTTP attempts made so far, retries included
   */
  get totalRequests(): number {
    return this.requestCount;
  }
}
