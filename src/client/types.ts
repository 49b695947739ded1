import type { ServerError, TransportError } from './errors.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type RequestHeaders = Readonly<Record<string, string>>;

// A request ready to send. The body is fully buffered so it can be resent on retry.
export interface PreparedRequest {
  readonly method: HttpMethod;
  readonly url: string;
  readonly headers: RequestHeaders;
  readonly body?: Buffer;
}

export type ResponseHeaders = Record<string, string | string[] | undefined>;

export interface TransportResponse {
  statusCode: number;
  headers: ResponseHeaders;
  body: Buffer;
}

/**
 * Sends one request and resolves with the fully-read response.
 * Rejects only when no HTTP response was obtained.
 */
export type Transport = (request: PreparedRequest) => Promise<TransportResponse>;

export type DispatchOutcome =
  | { kind: 'success'; statusCode: number; body: Buffer; attempts: number }
  | { kind: 'server'; error: ServerError; attempts: number }
  | { kind: 'transport'; error: TransportError; attempts: number };

// Query or form parameters; arrays repeat the key
export type RequestParams = Record<string, string | number | boolean | ReadonlyArray<string | number>>;
