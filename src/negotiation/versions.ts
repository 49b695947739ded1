import { InvalidVersionError } from '../client/errors.js';

/**
 * API versions this client speaks, most desirable first: negotiation tries
 * them in this order and settles on the first one the server offers.
 */
export const SUPPORTED_API_VERSIONS: readonly string[] = Object.freeze(['2.0', '2.1', '2.3', '2.4']);

export interface ApiVersion {
  major: number;
  minor: number;
}

const MAJOR_MINOR = /^(\d+)\.(\d+)$/;

export function parseApiVersion(value: string): ApiVersion {
  const match = MAJOR_MINOR.exec(value);
  if (!match) {
    throw new InvalidVersionError(value);
  }
  return { major: Number(match[1]), minor: Number(match[2]) };
}

export function formatApiVersion(version: ApiVersion): string {
  return `${version.major}.${version.minor}`;
}

const LOGIN_REDIRECT_PREFIX = '<html><head';

/**
 * True when a version probe was answered with an
 * HTML page instead of the JSON version document.
 *
 * MAAS 1.9.4 redirects an unauthenticated `GET api/2.0/version/` to its HTML
 * login page where it should answer 404 (https://bugs.launchpad.net/maas/+bug/1583715).
 * Only that exact prefix at offset 0 counts; do not widen this to other
 * bodies, or real outages start to look like version mismatches. Remove once
 * servers with the bug are gone.
 */
export function looksLikeLoginRedirect(body: Buffer): boolean {
  return body.subarray(0, LOGIN_REDIRECT_PREFIX.length).toString('latin1') === LOGIN_REDIRECT_PREFIX;
}
