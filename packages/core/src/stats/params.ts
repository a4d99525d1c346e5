/**
 * Request parameter parsing shared by the CLI and the query server
 *
 * Raw values arrive as strings (argv, query string). Anything out of range
 * is rejected before the pipeline runs.
 */

import { normalizeCategory } from '../models/category.js';
import { isMetric, type Metric } from './view.js';

export class InvalidParameterError extends Error {
  constructor(message: string, readonly param: string) {
    super(message);
    this.name = 'InvalidParameterError';
  }
}

function parseInteger(raw: string | undefined, name: string, fallback: number, min: number): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new InvalidParameterError(`${name} must be an integer >= ${min}`, name);
  }
  return parsed;
}

/** Integer >= 0 (e.g. top N, where 0 means unlimited) */
export function parseNonNegativeInt(raw: string | undefined, name: string, fallback: number): number {
  return parseInteger(raw, name, fallback, 0);
}

/** Integer >= 1 (e.g. minimum count) */
export function parsePositiveInt(raw: string | undefined, name: string, fallback: number): number {
  return parseInteger(raw, name, fallback, 1);
}

/** Longest delay a timer can hold (2^31 - 1 ms), in whole seconds */
export const MAX_DELAY_SECONDS = Math.floor(0x7fffffff / 1000);

/**
 * Seconds (fractional allowed, >= 0) converted to milliseconds
 */
export function parseDelaySeconds(raw: string | undefined, name: string, fallbackMs = 0): number {
  if (raw === undefined || raw.trim() === '') return fallbackMs;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > MAX_DELAY_SECONDS) {
    throw new InvalidParameterError(
      `${name} must be a number of seconds >= 0 and <= ${MAX_DELAY_SECONDS}`,
      name
    );
  }
  return Math.round(parsed * 1000);
}

/**
 * Metric name; "freq" is accepted for "frequency"
 */
export function parseMetric(raw: string | undefined, fallback: Metric = 'count'): Metric {
  if (raw === undefined || raw === '') return fallback;
  const value = raw === 'freq' ? 'frequency' : raw;
  if (!isMetric(value)) {
    throw new InvalidParameterError('metric must be one of: count, frequency', 'metric');
  }
  return value;
}

export function parseBoolean(raw: string | undefined, name: string, fallback = false): boolean {
  if (raw === undefined || raw === '') return fallback;
  switch (raw.toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      throw new InvalidParameterError(`${name} must be true or false`, name);
  }
}

/**
 * Trimmed category name with something left after the Category: prefix
 */
export function requireCategory(raw: string | undefined): string {
  const category = raw?.trim() ?? '';
  if (!normalizeCategory(category)) {
    throw new InvalidParameterError('category is required', 'category');
  }
  return category;
}
