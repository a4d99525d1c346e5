/**
 * Storage module exports
 */

export * from './cache.js';
