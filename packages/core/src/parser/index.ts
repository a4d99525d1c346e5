/**
 * Parser module exports
 */

export { tokenize, isNonCommon, countableWords, STOPWORDS } from './tokenize.js';
