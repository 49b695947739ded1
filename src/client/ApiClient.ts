import type { z } from 'zod';
import { DeserializationError } from './errors.js';
import { unwrapOutcome, type Dispatcher } from './Dispatcher.js';
import { prepareRequest } from './request.js';
import type { DispatchOutcome, HttpMethod, RequestParams } from './types.js';
import { encodeParams, ensureTrailingSlash, joinURLs } from './urls.js';

const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded';

export interface SendOptions {
  op?: string;
  // Query string for GET and DELETE, form body for POST and PUT
  params?: RequestParams;
}

export type DecodeResult<T> =
  | { success: true; data: T }
  | { success: false; error: DeserializationError };

/**
 * Parses a response body as JSON and validates it.
 * Either failure becomes a DeserializationError naming `what` was expected.
 */
export function safeDecodeJson<T>(
  body: Buffer,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  what: string,
): DecodeResult<T> {
  let raw: unknown;
  try {
    raw = JSON.parse(body.toString('utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { success: false, error: new DeserializationError(`${what}: ${reason}`, { cause: error }) };
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    return {
      success: false,
      error: new DeserializationError(`${what}: ${parsed.error.message}`, { cause: parsed.error }),
    };
  }
  return { success: true, data: parsed.data };
}

export function decodeJson<T>(body: Buffer, schema: z.ZodType<T, z.ZodTypeDef, unknown>, what: string): T {
  const result = safeDecodeJson(body, schema, what);
  if (!result.success) throw result.error;
  return result.data;
}

/**
 * HTTP verbs relative to one versioned MAAS API URL.
 *
 * Paths are relative to `apiURL` (e.g. 'machines', 'users') and always get
 * a trailing slash. `op` is sent as the first query parameter, the way the
 * MAAS API selects an operation on a resource.
 *
 * The verbs throw TransportError or ServerError; `send` returns the raw
 * DispatchOutcome for callers that classify it themselves.
 */
export class ApiClient {
  readonly apiURL: string;
  readonly dispatcher: Dispatcher;

  constructor(apiURL: string, dispatcher: Dispatcher) {
    this.apiURL = ensureTrailingSlash(apiURL);
    this.dispatcher = dispatcher;
  }

  resolveURL(path: string, op?: string, params?: RequestParams): string {
    const url = joinURLs(this.apiURL, ensureTrailingSlash(path));
    const query = encodeParams(op, params);
    return query ? `${url}?${query}` : url;
  }

  async send(method: HttpMethod, path: string, options: SendOptions = {}): Promise<DispatchOutcome> {
    const hasForm = method === 'POST' || method === 'PUT';
    const request = await prepareRequest(
      hasForm
        ? {
            method,
            url: this.resolveURL(path, options.op),
            headers: { 'Content-Type': FORM_CONTENT_TYPE },
            body: encodeParams(undefined, options.params),
          }
        : { method, url: this.resolveURL(path, options.op, options.params) },
    );
    return this.dispatcher.dispatch(request);
  }

  async get(path: string, op?: string, params?: RequestParams): Promise<Buffer> {
    return unwrapOutcome(await this.send('GET', path, { op, params }));
  }

  /**
   * GET a resource and validate its JSON body against `schema`.
   *
   * schema: any zod schema; its output type becomes the return type
   */
  async getJson<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    op?: string,
    params?: RequestParams,
  ): Promise<T> {
    const body = await this.get(path, op, params);
    return decodeJson(body, schema, `${path} response`);
  }

  async post(path: string, op?: string, params?: RequestParams): Promise<Buffer> {
    return unwrapOutcome(await this.send('POST', path, { op, params }));
  }

  async put(path: string, params?: RequestParams): Promise<Buffer> {
    return unwrapOutcome(await this.send('PUT', path, { params }));
  }

  async delete(path: string): Promise<void> {
    unwrapOutcome(await this.send('DELETE', path));
  }
}
