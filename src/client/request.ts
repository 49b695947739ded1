import { Readable } from 'node:stream';
import { buffer } from 'node:stream/consumers';
import type { HttpMethod, PreparedRequest } from './types.js';

export type RequestBody = string | Buffer | Uint8Array | Readable | AsyncIterable<Uint8Array>;

export interface RequestInit {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  body?: RequestBody;
}

/**
 * Builds a frozen PreparedRequest.
 *
 * Streaming bodies are read to the end here, before the first send, so that
 * every retry resends exactly the same bytes. The body Buffer belongs to the
 * PreparedRequest alone and must not be written to after preparation; the
 * Dispatcher hands each attempt its own copy (see `withBodyCopy`).
 */
export async function prepareRequest(init: RequestInit): Promise<PreparedRequest> {
  const body = init.body === undefined ? undefined : await bufferBody(init.body);
  return Object.freeze({
    method: init.method,
    url: init.url,
    headers: Object.freeze({ ...init.headers }),
    ...(body === undefined ? {} : { body }),
  });
}

async function bufferBody(body: RequestBody): Promise<Buffer> {
  if (typeof body === 'string') return Buffer.from(body, 'utf8');
  // Copy so later mutation of the caller's array cannot change what we resend
  if (body instanceof Uint8Array) return Buffer.from(body);
  if (body instanceof Readable) return buffer(body);
  return buffer(Readable.from(body));
}

// A request whose body is a fresh copy, so a transport cannot alter the original
export function withBodyCopy(request: PreparedRequest): PreparedRequest {
  if (request.body === undefined) return request;
  return Object.freeze({ ...request, body: Buffer.from(request.body) });
}

/**
 * Returns a copy of the request with one header set.
 * Any existing header of the same name, in any letter case, is replaced.
 */
export function withHeader(request: PreparedRequest, name: string, value: string): PreparedRequest {
  const lower = name.toLowerCase();
  const headers: Record<string, string> = {};
  for (const [key, existing] of Object.entries(request.headers)) {
    if (key.toLowerCase() !== lower) headers[key] = existing;
  }
  headers[name] = value;
  return Object.freeze({ ...request, headers: Object.freeze(headers) });
}
