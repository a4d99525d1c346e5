/**
 * Stats module exports
 */

export * from './pipeline.js';
export * from './view.js';
export * from './params.js';
