/**
 * Category identifiers
 *
 * Categories may be given with or without the namespace prefix. The bare name
 * is used as the cache key; the prefixed title is what the API expects.
 */

export const CATEGORY_PREFIX = 'Category:';

/**
 * Strip the Category: prefix (repeatedly) and surrounding whitespace.
 */
export function normalizeCategory(category: string): string {
  let name = category.trim();
  while (name.startsWith(CATEGORY_PREFIX)) {
    name = name.slice(CATEGORY_PREFIX.length).trim();
  }
  return name;
}

/**
 * Full category page title for API queries
 */
export function categoryTitle(category: string): string {
  return `${CATEGORY_PREFIX}${normalizeCategory(category)}`;
}

/**
 * Filesystem-safe key for a category. Not collision-free: "A B" and "A_B" share a key.
 */
export function categoryKey(category: string): string {
  return normalizeCategory(category).replace(/[^A-Za-z0-9._-]+/g, '_') || '_';
}
