// MARK: - Query Server
// Express app serving ranked word frequencies for a category

import express, { type NextFunction, type Request, type Response } from 'express';
import {
  buildReport,
  InvalidParameterError,
  parseBoolean,
  parseDelaySeconds,
  parseMetric,
  parseNonNegativeInt,
  parsePositiveInt,
  requireCategory,
  type FrequencyPipeline,
} from '@catfreq/core';
import { logger } from './utils/logger.js';

export const DEFAULT_TOP_N = 200;
export const DEFAULT_MIN_COUNT = 1;

export interface AppOptions {
  pipeline: Pick<FrequencyPipeline, 'getFrequencies'>;
  /** Browser origins allowed by CORS */
  allowedOrigins?: string[];
}

/**
 * Single string value of a query parameter (first one if repeated)
 */
function queryParam(req: Request, name: string): string | undefined {
  const value = req.query[name];
  if (typeof value === 'string') return value;
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
  return undefined;
}

/**
 * Create the express app
 */
export function createApp(options: AppOptions): express.Express {
  const app = express();
  const allowedOrigins = new Set(options.allowedOrigins ?? []);

  app.disable('x-powered-by');

  // CORS for the browser front end
  app.use((req: Request, res: Response, next: NextFunction) => {
    const origin = req.headers.origin;
    if (origin && allowedOrigins.has(origin)) {
      res.setHeader('Access-Control-Allow-Origin', origin);
      res.setHeader('Access-Control-Allow-Credentials', 'true');
      res.setHeader('Access-Control-Allow-Methods', 'GET, OPTIONS');
      res.setHeader('Access-Control-Allow-Headers', req.headers['access-control-request-headers'] ?? '*');
      res.setHeader('Vary', 'Origin');
    }
    if (req.method === 'OPTIONS') {
      res.sendStatus(204);
      return;
    }
    next();
  });

  /**
   * Health check endpoint
   */
  app.get('/health', (req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  /**
   * Word frequencies for a category
   */
  app.get('/api/wordfreq', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const category = requireCategory(queryParam(req, 'category'));
      const refresh = parseBoolean(queryParam(req, 'refresh'), 'refresh');
      const delayMs = parseDelaySeconds(queryParam(req, 'sleep'), 'sleep');
      const topN = parseNonNegativeInt(queryParam(req, 'top'), 'top', DEFAULT_TOP_N);
      const metricName = queryParam(req, 'metric');
      const metric = parseMetric(metricName);
      const minCount = parsePositiveInt(queryParam(req, 'min_count'), 'min_count', DEFAULT_MIN_COUNT);

      const result = await options.pipeline.getFrequencies(category, { refresh, delayMs });
      logger.info('Word frequencies served', {
        category,
        outcome: result.outcome,
        words: result.counts.size,
      });

      if (result.counts.size === 0) {
        res.status(404).json({ detail: 'no pages or no words found for category' });
        return;
      }

      const report = buildReport(category, result.counts, { metric, topN, minCount });
      if (report.items.length === 0) {
        res.status(404).json({ detail: `no words with count >= ${minCount}` });
        return;
      }

      // Echo the alias the caller used
      res.json(metricName === 'freq' ? { ...report, metric: metricName } : report);
    } catch (error) {
      next(error);
    }
  });

  // Error handler (4 args so express treats it as one)
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof InvalidParameterError) {
      res.status(400).json({ detail: error.message });
      return;
    }

    const message = error instanceof Error ? error.message : String(error);
    logger.error('Request failed', { path: req.path, error: message });
    res.status(500).json({ detail: message });
  });

  return app;
}
