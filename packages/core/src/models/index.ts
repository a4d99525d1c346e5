/**
 * Models module exports
 */

export * from './category.js';
export * from './frequency.js';
