/**
 * urls.ts — URL shape helpers for the MAAS API.
 *
 * MAAS is a Django application: every resource path ends in a slash, and a
 * path without one is answered with a redirect.
 */

import type { RequestParams } from './types.js';

const VERSIONED_URL = /\/api\/(\d+\.\d+)\/?$/;

// Appends a slash unless the URL already ends with one
export function ensureTrailingSlash(url: string): string {
  return url.endsWith('/') ? url : `${url}/`;
}

/**
 * Joins a base URL and a path with exactly one slash between them,
 * however many slashes either side already carries.
 */
export function joinURLs(baseURL: string, path: string): string {
  return `${baseURL.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}

// addAPIVersionToURL('http://x/maas', '1.0') → 'http://x/maas/api/1.0/'
export function addAPIVersionToURL(baseURL: string, apiVersion: string): string {
  return `${ensureTrailingSlash(baseURL)}api/${apiVersion}/`;
}

export interface SplitURL {
  base: string;
  version: string;
  includesVersion: boolean;
}

/**
 * Recognises URLs of the form `.../api/X.Y[/]`.
 *
 *   'http://x/maas/api/3.0' → { base: 'http://x/maas/', version: '3.0', includesVersion: true }
 *   'http://x/maas'         → { base: 'http://x/maas',  version: '',    includesVersion: false }
 */
export function splitVersionedURL(url: string): SplitURL {
  const match = VERSIONED_URL.exec(url);
  if (!match) {
    return { base: url, version: '', includesVersion: false };
  }
  return {
    base: url.slice(0, match.index + 1),
    version: match[1],
    includesVersion: true,
  };
}

/**
 * URL-encodes parameters, with `op` first when given.
 * Array values repeat the key once per element.
 */
export function encodeParams(op: string | undefined, params: RequestParams | undefined): string {
  const search = new URLSearchParams();
  if (op) search.append('op', op);
  for (const [key, value] of Object.entries(params ?? {})) {
    if (Array.isArray(value)) {
      for (const item of value) search.append(key, String(item));
    } else {
      search.append(key, String(value));
    }
  }
  return search.toString();
}
