/**
 * MediaWiki API type definitions
 *
 * Raw responses are untrusted JSON; the parse* functions narrow them into
 * these shapes and default anything optional.
 */

/** API error */
export interface ApiError {
  code: string;
  info: string;
}

/** Category member (list=categorymembers) */
export interface CategoryMember {
  pageid: number;
  title: string;
}

/** One page of a category member listing */
export interface CategoryMembersResponse {
  members: CategoryMember[];
  /** cmcontinue token; absent on the last page */
  continueToken?: string;
}

/** Page extract (prop=extracts) */
export interface PageExtract {
  pageid: number;
  /** Empty when the page has no extract */
  extract: string;
}

/** Extract listing */
export interface ExtractsResponse {
  pages: PageExtract[];
}

/** Page reference yielded during category enumeration */
export interface PageRef {
  pageId: number;
  title: string;
}

/** Batch query options */
export interface BatchOptions {
  /** Callback for progress reporting; total is -1 when unknown */
  onProgress?: (completed: number, total: number) => void;
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function objectField(value: JsonObject, key: string): JsonObject {
  const field = value[key];
  return isObject(field) ? field : {};
}

function arrayField(value: JsonObject, key: string): unknown[] {
  const field = value[key];
  return Array.isArray(field) ? field : [];
}

function toPageId(value: unknown): number | null {
  const id = typeof value === 'string' ? Number(value) : value;
  return typeof id === 'number' && Number.isInteger(id) ? id : null;
}

/**
 * Extract the API-level error, if the response carries one
 */
export function getApiError(raw: unknown): ApiError | null {
  if (!isObject(raw) || !isObject(raw.error)) return null;
  const { code, info } = raw.error;
  return {
    code: typeof code === 'string' ? code : 'unknown',
    info: typeof info === 'string' ? info : 'Unknown error',
  };
}

/**
 * Narrow a list=categorymembers response
 */
export function parseCategoryMembersResponse(raw: unknown): CategoryMembersResponse {
  const root = isObject(raw) ? raw : {};
  const members: CategoryMember[] = [];

  for (const item of arrayField(objectField(root, 'query'), 'categorymembers')) {
    if (!isObject(item)) continue;
    const pageid = toPageId(item.pageid);
    if (pageid === null) continue;
    members.push({ pageid, title: typeof item.title === 'string' ? item.title : '' });
  }

  const token = objectField(root, 'continue').cmcontinue;
  return {
    members,
    continueToken: typeof token === 'string' && token !== '' ? token : undefined,
  };
}

/**
 * Narrow a prop=extracts response (formatversion=2 page array)
 */
export function parseExtractsResponse(raw: unknown): ExtractsResponse {
  const root = isObject(raw) ? raw : {};
  const pages: PageExtract[] = [];

  for (const item of arrayField(objectField(root, 'query'), 'pages')) {
    if (!isObject(item)) continue;
    const pageid = toPageId(item.pageid);
    if (pageid === null) continue;
    pages.push({ pageid, extract: typeof item.extract === 'string' ? item.extract : '' });
  }

  return { pages };
}
