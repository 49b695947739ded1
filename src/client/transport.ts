import got from 'got';
import type { Transport } from './types.js';

export const DEFAULT_TIMEOUT_MS = 30_000;

export const DEFAULT_USER_AGENT = 'maas-api-client (+https://maas.io)';

export interface GotTransportOptions {
  timeoutMs?: number;
  userAgent?: string;
}

/**
 * The default Transport, backed by a got instance.
 *
 * got resolves every HTTP status (throwHttpErrors is off) and rejects only
 * when no response was obtained. Its own retry is disabled: the Dispatcher
 * owns the retry policy. With responseType 'buffer' got reads each body to
 * the end before resolving, which also returns the socket to the agent.
 */
export function createGotTransport(options: GotTransportOptions = {}): Transport {
  const instance = got.extend({
    headers: {
      'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT,
    },
    timeout: { request: options.timeoutMs ?? DEFAULT_TIMEOUT_MS },
    retry: { limit: 0 },
    throwHttpErrors: false,
    // Retried request bodies are sent with every method, GET included
    allowGetBody: true,
  });

  return async (request) => {
    const response = await instance(request.url, {
      method: request.method,
      headers: { ...request.headers },
      body: request.body,
      responseType: 'buffer',
    });
    return {
      statusCode: response.statusCode,
      headers: response.headers,
      body: response.body,
    };
  };
}
