import { afterEach, describe, expect, it, vi } from 'vitest';
import { FakeServer } from '../../__tests__/fakeServer.js';
import { parseCredentials } from '../../auth/credentials.js';
import { createSigner } from '../../auth/signer.js';
import type { Logger } from '../../logger.js';
import { Dispatcher, RequestCounter, unwrapOutcome } from '../Dispatcher.js';
import { ServerError, TransportError, getServerError } from '../errors.js';
import { prepareRequest } from '../request.js';
import { DEFAULT_MAX_RETRIES } from '../retry.js';
import type { PreparedRequest, TransportResponse } from '../types.js';

const URL_UNDER_TEST = 'http://maas.test/some/url/?param1=test';
const PATH = '/some/url/?param1=test';

const unavailable = { status: 503, body: 'busy' };

describe('Dispatcher', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns the body of a successful response', async () => {
    const server = new FakeServer().on('GET', PATH, { status: 200, body: 'expected:result' });
    const dispatcher = new Dispatcher({ transport: server.transport });

    const outcome = await dispatcher.dispatch(await prepareRequest({ method: 'GET', url: URL_UNDER_TEST }));

    expect(outcome.kind).toBe('success');
    expect(unwrapOutcome(outcome).toString()).toBe('expected:result');
    expect(outcome.attempts).toBe(1);
  });

  it('returns a server failure carrying status and body', async () => {
    const server = new FakeServer().on('GET', PATH, { status: 400, body: 'expected:result' });
    const dispatcher = new Dispatcher({ transport: server.transport });

    const outcome = await dispatcher.dispatch(await prepareRequest({ method: 'GET', url: URL_UNDER_TEST }));

    if (outcome.kind !== 'server') throw new Error(`expected a server failure, got ${outcome.kind}`);
    expect(outcome.error.message).toBe('ServerError: 400 Bad Request (expected:result)');
    expect(outcome.error.statusCode).toBe(400);
    expect(outcome.error.body.toString()).toBe('expected:result');
    expect(getServerError(outcome.error)?.statusCode).toBe(400);
  });

  it('retries 503 and resends the same body every time', async () => {
    const server = new FakeServer().on(
      'POST',
      PATH,
      ...Array.from({ length: DEFAULT_MAX_RETRIES }, () => unavailable),
      { status: 200, body: 'done' },
    );
    const dispatcher = new Dispatcher({ transport: server.transport });

    const outcome = await dispatcher.dispatch(
      await prepareRequest({ method: 'POST', url: URL_UNDER_TEST, body: 'Content' }),
    );

    expect(outcome.kind).toBe('success');
    expect(outcome.attempts).toBe(DEFAULT_MAX_RETRIES + 1);
    expect(server.requests).toHaveLength(DEFAULT_MAX_RETRIES + 1);
    for (const request of server.requests) {
      expect(request.body?.toString()).toBe('Content');
    }
  });

  it('resends the original bytes even when a transport writes into the body', async () => {
    const received: string[] = [];
    const transport = vi.fn(async (request: PreparedRequest): Promise<TransportResponse> => {
      received.push(request.body?.toString() ?? '');
      request.body?.fill(0x58);
      return { statusCode: received.length === 1 ? 503 : 200, headers: {}, body: Buffer.from('') };
    });
    const dispatcher = new Dispatcher({ transport });

    await dispatcher.dispatch(await prepareRequest({ method: 'PUT', url: URL_UNDER_TEST, body: 'Content' }));

    expect(received).toEqual(['Content', 'Content']);
  });

  it('gives up after maxRetries + 1 attempts of 503', async () => {
    const server = new FakeServer().on('GET', PATH, unavailable);
    const dispatcher = new Dispatcher({ transport: server.transport, maxRetries: 3 });

    const outcome = await dispatcher.dispatch(await prepareRequest({ method: 'GET', url: URL_UNDER_TEST }));

    expect(server.count(PATH)).toBe(4);
    expect(outcome.attempts).toBe(4);
    if (outcome.kind !== 'server') throw new Error(`expected a server failure, got ${outcome.kind}`);
    expect(getServerError(outcome.error)?.statusCode).toBe(503);
  });

  it('does not retry when maxRetries is 0', async () => {
    const server = new FakeServer().on('GET', PATH, unavailable);
    const dispatcher = new Dispatcher({ transport: server.transport, maxRetries: 0 });

    await dispatcher.dispatch(await prepareRequest({ method: 'GET', url: URL_UNDER_TEST }));

    expect(server.count(PATH)).toBe(1);
  });

  it.each([200, 500, 502, 504, 404])('sends a single request when the answer is %i', async (status) => {
    const server = new FakeServer().on('GET', PATH, { status }, { status: 200 });
    const dispatcher = new Dispatcher({ transport: server.transport });

    await dispatcher.dispatch(await prepareRequest({ method: 'GET', url: URL_UNDER_TEST }));

    expect(server.count(PATH)).toBe(1);
  });

  it('reports a transport failure without retrying', async () => {
    const transport = vi.fn().mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:1'));
    const dispatcher = new Dispatcher({ transport });

    const outcome = await dispatcher.dispatch(await prepareRequest({ method: 'GET', url: URL_UNDER_TEST }));

    expect(transport).toHaveBeenCalledTimes(1);
    if (outcome.kind !== 'transport') throw new Error(`expected a transport failure, got ${outcome.kind}`);
    expect(outcome.error).toBeInstanceOf(TransportError);
    expect(outcome.error.message).toBe('connect ECONNREFUSED 127.0.0.1:1');
    expect(getServerError(outcome.error)).toBeUndefined();
    expect(() => unwrapOutcome(outcome)).toThrow(TransportError);
  });

  it('does not turn a transport failure after a 503 into a server failure', async () => {
    const server = new FakeServer().on('GET', PATH, unavailable, new Error('socket hang up'));
    const dispatcher = new Dispatcher({ transport: server.transport });

    const outcome = await dispatcher.dispatch(await prepareRequest({ method: 'GET', url: URL_UNDER_TEST }));

    expect(outcome.kind).toBe('transport');
    expect(outcome.attempts).toBe(2);
  });

  it('signs every attempt', async () => {
    const server = new FakeServer().on('GET', PATH, unavailable, { status: 200, body: 'ok' });
    let nonce = 0;
    const signer = createSigner(parseCredentials('the:api:key'), { nonce: () => `n${++nonce}` });
    const dispatcher = new Dispatcher({ transport: server.transport, signer });

    await dispatcher.dispatch(await prepareRequest({ method: 'GET', url: URL_UNDER_TEST }));

    const headers = server.requests.map((request) => request.headers['Authorization']);
    expect(headers).toHaveLength(2);
    expect(headers[0]).toContain('OAuth');
    expect(headers[0]).toContain('oauth_nonce="n1"');
    expect(headers[1]).toContain('oauth_nonce="n2"');
  });

  it('waits for Retry-After before retrying', async () => {
    vi.useFakeTimers();
    const server = new FakeServer().on(
      'GET',
      PATH,
      { status: 503, headers: { 'retry-after': '2' } },
      { status: 200, body: 'ok' },
    );
    const dispatcher = new Dispatcher({ transport: server.transport });

    const pending = dispatcher.dispatch(await prepareRequest({ method: 'GET', url: URL_UNDER_TEST }));
    await vi.advanceTimersByTimeAsync(1999);
    expect(server.count(PATH)).toBe(1);
    await vi.advanceTimersByTimeAsync(1);
    const outcome = await pending;

    expect(server.count(PATH)).toBe(2);
    expect(outcome.kind).toBe('success');
  });

  it('caps the Retry-After wait', async () => {
    vi.useFakeTimers();
    const server = new FakeServer().on(
      'GET',
      PATH,
      { status: 503, headers: { 'retry-after': '3600' } },
      { status: 200 },
    );
    const dispatcher = new Dispatcher({ transport: server.transport, maxRetryAfterMs: 100 });

    const pending = dispatcher.dispatch(await prepareRequest({ method: 'GET', url: URL_UNDER_TEST }));
    await vi.advanceTimersByTimeAsync(100);
    const outcome = await pending;

    expect(outcome.kind).toBe('success');
    expect(server.count(PATH)).toBe(2);
  });

  it('numbers requests per counter and logs them', async () => {
    const server = new FakeServer().on('GET', PATH, { status: 200 });
    const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const counter = new RequestCounter();
    const dispatcher = new Dispatcher({ transport: server.transport, counter, logger });

    for (let i = 0; i < 10; i++) {
      await dispatcher.dispatch(await prepareRequest({ method: 'GET', url: URL_UNDER_TEST }));
    }

    expect(logger.debug).toHaveBeenCalledWith(`request a: GET ${URL_UNDER_TEST}`);
    expect(new RequestCounter().next()).toBe(1);
    expect(counter.next()).toBe(11);
  });

  it('warns on each retry', async () => {
    const server = new FakeServer().on('GET', PATH, unavailable, unavailable, { status: 200 });
    const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const dispatcher = new Dispatcher({ transport: server.transport, logger });

    await dispatcher.dispatch(await prepareRequest({ method: 'GET', url: URL_UNDER_TEST }));

    expect(logger.warn).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenLastCalledWith('response 1: 503 Service Unavailable, retrying', {
      retry: 2,
      of: 4,
      waitMs: 0,
    });
  });

  it('rejects a negative retry count', () => {
    expect(() => new Dispatcher({ maxRetries: -1 })).toThrow(RangeError);
  });

  it('exposes the server error through unwrapOutcome', async () => {
    const server = new FakeServer().on('DELETE', PATH, { status: 409, body: 'in use' });
    const dispatcher = new Dispatcher({ transport: server.transport });

    const outcome = await dispatcher.dispatch(
      await prepareRequest({ method: 'DELETE', url: URL_UNDER_TEST }),
    );

    expect(() => unwrapOutcome(outcome)).toThrow(ServerError);
    expect(() => unwrapOutcome(outcome)).toThrow('ServerError: 409 Conflict (in use)');
  });
});
