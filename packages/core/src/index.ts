/**
 * @catfreq/core - Core library for catfreq
 *
 * Provides the MediaWiki API client, tokenizer, frequency cache,
 * aggregation pipeline and ranked views.
 */

export const VERSION = '1.0.0';

// Re-export all modules
export * from './api/index.js';
export * from './config/index.js';
export * from './models/index.js';
export * from './parser/index.js';
export * from './stats/index.js';
export * from './storage/index.js';
