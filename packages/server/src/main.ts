/**
 * Query server entry point
 */

import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { config as dotenvConfig } from 'dotenv';
import {
  createFrequencyCache,
  createFrequencyPipeline,
  loadConfig,
  MediaWikiClient,
} from '@catfreq/core';
import { startServer } from './index.js';
import { logger } from './utils/logger.js';

const envPath = resolve(process.cwd(), '.env');
if (existsSync(envPath)) {
  dotenvConfig({ path: envPath });
}

const config = loadConfig();
const pipeline = createFrequencyPipeline(
  new MediaWikiClient(config.client),
  createFrequencyCache(config.cacheDir)
);

try {
  await startServer(config, pipeline);
} catch (error) {
  logger.error('Failed to start query server', {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
}
