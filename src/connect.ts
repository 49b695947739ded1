import { parseCredentials } from './auth/credentials.js';
import type { BoundClient } from './client/BoundClient.js';
import { VersionNegotiator, type NegotiatorOptions } from './negotiation/VersionNegotiator.js';

export interface ConnectOptions extends Omit<NegotiatorOptions, 'credentials'> {
  // consumer-key:token-key:token-secret; empty or omitted for anonymous access
  apiKey?: string;
}

/**
 * Negotiates an API version with a MAAS server and returns a
 * client bound to it.
 *
 * If `baseURL` already ends in `/api/X.Y/` (or `apiVersion` is given) only
 * that version is tried; otherwise the highest-priority supported version
 * the server offers is used.
 *
 * Throws InvalidCredentialsError for a malformed key before any request,
 * UnsupportedVersionError when no version fits, PermissionError for
 * rejected credentials, and TransportError / ServerError /
 * DeserializationError when the server cannot be asked.
 */
export async function connect(options: ConnectOptions): Promise<BoundClient> {
  const { apiKey, ...negotiatorOptions } = options;
  const credentials = parseCredentials(apiKey ?? '');
  return new VersionNegotiator({ ...negotiatorOptions, credentials }).negotiate();
}
