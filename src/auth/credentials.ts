import { InvalidCredentialsError } from '../client/errors.js';

export interface AnonymousCredentials {
  kind: 'anonymous';
}

// MAAS API keys carry no consumer secret: the PLAINTEXT signature uses an empty one
export interface KeyedCredentials {
  kind: 'keyed';
  consumerKey: string;
  tokenKey: string;
  tokenSecret: string;
}

export type Credentials = AnonymousCredentials | KeyedCredentials;

export const ANONYMOUS: AnonymousCredentials = Object.freeze({ kind: 'anonymous' });

/**
 * Parses a `consumerKey:tokenKey:tokenSecret` API key.
 *
 * An empty key means anonymous access. Anything else must have exactly three
 * colon-separated parts; the parts themselves may be empty.
 */
export function parseCredentials(apiKey: string): Credentials {
  if (apiKey === '') return ANONYMOUS;

  const parts = apiKey.split(':');
  if (parts.length !== 3) {
    throw new InvalidCredentialsError(parts.length);
  }
  const [consumerKey, tokenKey, tokenSecret] = parts;
  return Object.freeze({ kind: 'keyed', consumerKey, tokenKey, tokenSecret });
}
