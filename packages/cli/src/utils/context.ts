/**
 * CLI context utilities
 *
 * Provides shared context (config, client, cache, pipeline) for CLI commands.
 */

import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { config as dotenvConfig } from 'dotenv';
import {
  createFrequencyCache,
  createFrequencyPipeline,
  loadConfig,
  MediaWikiClient,
  type AppConfig,
  type FileFrequencyCache,
  type FrequencyPipeline,
} from '@catfreq/core';

/** CLI context with all dependencies */
export interface CliContext {
  config: AppConfig;
  client: MediaWikiClient;
  cache: FileFrequencyCache;
  pipeline: FrequencyPipeline;
}

/**
 * Load .env from the working directory, if present
 */
export function loadEnvFile(cwd: string = process.cwd()): void {
  const envPath = resolve(cwd, '.env');
  if (existsSync(envPath)) {
    dotenvConfig({ path: envPath });
  }
}

/**
 * Create CLI context from the current environment
 */
export function createContext(env: NodeJS.ProcessEnv = process.env): CliContext {
  const config = loadConfig(env);
  const client = new MediaWikiClient(config.client);
  const cache = createFrequencyCache(config.cacheDir);
  const pipeline = createFrequencyPipeline(client, cache);

  return { config, client, cache, pipeline };
}

/**
 * Run a command with a fresh context
 */
export async function withContext<T>(fn: (ctx: CliContext) => Promise<T>): Promise<T> {
  return fn(createContext());
}
