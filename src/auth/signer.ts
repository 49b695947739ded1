/**
 * signer.ts — OAuth 1.0a request signing for the MAAS API.
 *
 * MAAS accepts the PLAINTEXT signature method only: the signature is the
 * consumer secret and the token secret joined by `&`, sent as-is over TLS.
 * No hashing is involved, so signing needs no access to the URL or body.
 */

import { randomUUID } from 'node:crypto';
import { withHeader } from '../client/request.js';
import type { PreparedRequest } from '../client/types.js';
import type { Credentials, KeyedCredentials } from './credentials.js';

export interface RequestSigner {
  sign(request: PreparedRequest): PreparedRequest;
}

export interface SignerOptions {
  // Milliseconds since the epoch; defaults to Date.now
  now?: () => number;
  nonce?: () => string;
}

export const anonymousSigner: RequestSigner = {
  sign: (request) => request,
};

export class PlainTextOAuthSigner implements RequestSigner {
  private readonly credentials: KeyedCredentials;
  private readonly now: () => number;
  private readonly nonce: () => string;

  constructor(credentials: KeyedCredentials, options: SignerOptions = {}) {
    this.credentials = credentials;
    this.now = options.now ?? Date.now;
    this.nonce = options.nonce ?? randomUUID;
  }

  /**
   * Returns a copy of the request carrying a fresh Authorization header.
   * Signing an already-signed request replaces the previous header, so a
   * retried request never carries two.
   */
  sign(request: PreparedRequest): PreparedRequest {
    return withHeader(request, 'Authorization', this.authorizationHeader());
  }

  authorizationHeader(): string {
    const { consumerKey, tokenKey, tokenSecret } = this.credentials;
    const fields: Array<[string, string]> = [
      ['realm', ''],
      ['oauth_consumer_key', consumerKey],
      ['oauth_token', tokenKey],
      ['oauth_signature_method', 'PLAINTEXT'],
      // consumer secret is always empty
      ['oauth_signature', `&${tokenSecret}`],
      ['oauth_timestamp', String(Math.floor(this.now() / 1000))],
      ['oauth_nonce', this.nonce()],
      ['oauth_version', '1.0'],
    ];
    const encoded = fields.map(([key, value]) => `${key}="${encodeURIComponent(value)}"`);
    return `OAuth ${encoded.join(', ')}`;
  }
}

export function createSigner(credentials: Credentials, options?: SignerOptions): RequestSigner {
  return credentials.kind === 'keyed'
    ? new PlainTextOAuthSigner(credentials, options)
    : anonymousSigner;
}
