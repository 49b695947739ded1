/**
 * fakeServer.ts — scripted in-process stand-in for a MAAS server.
 *
 * Routes are keyed by method and path-with-query. Scripted responses are
 * served in order and the last one repeats. Unknown routes answer 404, the
 * way MAAS answers an API version it does not serve. An Error in the script
 * makes the transport reject, like a refused connection.
 */

import type { PreparedRequest, Transport, TransportResponse } from '../client/types.js';

export const BASE_URL = 'http://maas.test/MAAS';

export interface ScriptedResponse {
  status: number;
  body?: string;
  headers?: Record<string, string>;
}

export interface RecordedRequest {
  method: string;
  path: string;
  headers: Record<string, string>;
  body: Buffer | undefined;
}

export const VERSION_DOCUMENT = JSON.stringify({
  version: '2.4.2',
  subversion: '',
  capabilities: ['networks-management', 'static-ipaddresses', 'devices-management'],
});

export class FakeServer {
  readonly requests: RecordedRequest[] = [];
  private readonly routes = new Map<string, Array<ScriptedResponse | Error>>();

  on(method: string, path: string, ...script: Array<ScriptedResponse | Error>): this {
    this.routes.set(`${method} ${path}`, script);
    return this;
  }

  // Version document and a successful whoami for one API version
  serveVersion(version: string, document = VERSION_DOCUMENT): this {
    return this.on('GET', `/MAAS/api/${version}/version/`, { status: 200, body: document }).on(
      'GET',
      `/MAAS/api/${version}/users/?op=whoami`,
      { status: 200, body: '"admin"' },
    );
  }

  count(path: string): number {
    return this.requests.filter((request) => request.path === path).length;
  }

  paths(): string[] {
    return this.requests.map((request) => `${request.method} ${request.path}`);
  }

  readonly transport: Transport = async (request: PreparedRequest): Promise<TransportResponse> => {
    const url = new URL(request.url);
    const path = `${url.pathname}${url.search}`;
    this.requests.push({
      method: request.method,
      path,
      headers: { ...request.headers },
      body: request.body,
    });

    const script = this.routes.get(`${request.method} ${path}`);
    if (!script || script.length === 0) {
      return { statusCode: 404, headers: {}, body: Buffer.from('not found') };
    }
    const next = script.length > 1 ? script.shift() : script[0];
    if (next instanceof Error) throw next;
    if (next === undefined) {
      return { statusCode: 404, headers: {}, body: Buffer.from('not found') };
    }
    return {
      statusCode: next.status,
      headers: next.headers ?? {},
      body: Buffer.from(next.body ?? ''),
    };
  };
}
