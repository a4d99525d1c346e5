/**
 * Word tokenization and stopword filtering
 *
 * Operates on plain-text extracts; markup is expected to be gone already.
 */

import { readFileSync } from 'node:fs';

const WORD_PATTERN = /[A-Za-z]+(?:'[A-Za-z]+)?/g;

/** Words this short carry no signal */
const MIN_WORD_LENGTH = 3;

function loadStopwords(): ReadonlySet<string> {
  const raw: unknown = JSON.parse(
    readFileSync(new URL('./stopwords.json', import.meta.url), 'utf-8')
  );
  if (!Array.isArray(raw)) {
    throw new Error('stopwords.json must contain an array of words');
  }
  return new Set(raw.filter((word): word is string => typeof word === 'string'));
}

/** English function words, including contracted forms */
export const STOPWORDS: ReadonlySet<string> = loadStopwords();

/**
 * Lazily split text into lowercase words. Contractions stay whole ("don't").
 */
export function* tokenize(text: string): Generator<string> {
  for (const match of text.matchAll(WORD_PATTERN)) {
    const word = match[0].toLowerCase().replace(/^'+|'+$/g, '');
    if (word) {
      yield word;
    }
  }
}

/**
 * Whether a word is worth counting (not a stopword, longer than two letters)
 */
export function isNonCommon(word: string): boolean {
  if (STOPWORDS.has(word.toLowerCase())) return false;
  if (word.length < MIN_WORD_LENGTH) return false;
  return true;
}

/**
 * Tokenize and keep only non-common words
 */
export function* countableWords(text: string): Generator<string> {
  for (const word of tokenize(text)) {
    if (isNonCommon(word)) {
      yield word;
    }
  }
}
