/**
 * @catfreq/server - HTTP query surface for catfreq
 */

import type { Server } from 'node:http';
import type { AppConfig, FrequencyPipeline } from '@catfreq/core';
import { createApp } from './app.js';
import { logger } from './utils/logger.js';

export { createApp, DEFAULT_MIN_COUNT, DEFAULT_TOP_N, type AppOptions } from './app.js';
export { logger, log, type LogLevel } from './utils/logger.js';

/**
 * Start the query server; resolves once it is listening
 */
export function startServer(
  config: Pick<AppConfig, 'port' | 'allowedOrigins'>,
  pipeline: Pick<FrequencyPipeline, 'getFrequencies'>
): Promise<Server> {
  const app = createApp({ pipeline, allowedOrigins: config.allowedOrigins });

  return new Promise((resolve, reject) => {
    const server = app.listen(config.port);
    server.once('listening', () => {
      const address = server.address();
      const port = typeof address === 'object' && address !== null ? address.port : config.port;
      logger.info('Query server listening', { port });
      resolve(server);
    });
    server.once('error', reject);
  });
}
