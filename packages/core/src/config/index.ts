/**
 * Runtime configuration
 *
 * Everything is read from environment variables; the CLI and server load
 * .env files into process.env before calling loadConfig().
 */

import { resolve } from 'node:path';
import type { ClientConfig } from '../api/client.js';

export const DEFAULT_API_URL = 'https://en.wikipedia.org/w/api.php';

export const DEFAULT_ALLOWED_ORIGINS = [
  'http://localhost:5173',
  'http://127.0.0.1:5173',
];

export interface AppConfig {
  client: ClientConfig;
  /** Directory holding one cache record per category */
  cacheDir: string;
  /** Query server port */
  port: number;
  /** Origins allowed to call the query server from a browser */
  allowedOrigins: string[];
}

function parseIntEnv(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function parseListEnv(value: string | undefined, fallback: string[]): string[] {
  if (!value) return fallback;
  return value.split(',').map(item => item.trim()).filter(Boolean);
}

/**
 * Build configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const client: ClientConfig = {
    apiUrl: env.CATFREQ_API_URL || DEFAULT_API_URL,
    timeoutMs: parseIntEnv(env.CATFREQ_HTTP_TIMEOUT_MS, 30000),
    maxRetries: parseIntEnv(env.CATFREQ_HTTP_RETRIES, 5),
    retryDelayMs: parseIntEnv(env.CATFREQ_HTTP_RETRY_DELAY_MS, 800),
  };
  if (env.CATFREQ_USER_AGENT) {
    client.userAgent = env.CATFREQ_USER_AGENT;
  }

  return {
    client,
    cacheDir: resolve(env.CATFREQ_CACHE_DIR || '.cache'),
    port: parseIntEnv(env.PORT, 8000),
    allowedOrigins: parseListEnv(env.CATFREQ_ALLOWED_ORIGINS, DEFAULT_ALLOWED_ORIGINS),
  };
}
