import { anonymousSigner, type RequestSigner } from '../auth/signer.js';
import { silentLogger, type Logger } from '../logger.js';
import { ServerError, TransportError } from './errors.js';
import { withBodyCopy } from './request.js';
import {
  DEFAULT_MAX_RETRIES,
  DEFAULT_MAX_RETRY_AFTER_MS,
  withServiceUnavailableRetry,
  type RetryResult,
} from './retry.js';
import { createGotTransport } from './transport.js';
import type { DispatchOutcome, PreparedRequest, Transport } from './types.js';

/**
 * Hands out request ids for log correlation. Each Dispatcher gets its own
 * unless one is shared explicitly, so independently configured clients in
 * one process keep separate numbering.
 */
export class RequestCounter {
  private current = 0;

  next(): number {
    this.current += 1;
    return this.current;
  }
}

export interface DispatcherOptions {
  signer?: RequestSigner;
  transport?: Transport;
  // Retries after the first attempt when the server answers 503
  maxRetries?: number;
  maxRetryAfterMs?: number;
  counter?: RequestCounter;
  logger?: Logger;
}

/**
 * Signs, sends and classifies one request.
 *
 * Design constraints:
 *   - only a 503 answer is retried, at most `maxRetries` times
 *   - each retry is re-signed and resends the original buffered body
 *   - a request that gets no HTTP response is never retried
 *   - the outcome keeps "network failed" (transport) apart from
 *     "server refused" (server)
 */
export class Dispatcher {
  readonly maxRetries: number;
  private readonly maxRetryAfterMs: number;
  private readonly signer: RequestSigner;
  private readonly transport: Transport;
  private readonly counter: RequestCounter;
  private readonly logger: Logger;

  constructor(options: DispatcherOptions = {}) {
    const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    if (!Number.isInteger(maxRetries) || maxRetries < 0) {
      throw new RangeError(`maxRetries must be a non-negative integer, got ${maxRetries}`);
    }
    this.maxRetries = maxRetries;
    this.maxRetryAfterMs = options.maxRetryAfterMs ?? DEFAULT_MAX_RETRY_AFTER_MS;
    this.signer = options.signer ?? anonymousSigner;
    this.transport = options.transport ?? createGotTransport();
    this.counter = options.counter ?? new RequestCounter();
    this.logger = options.logger ?? silentLogger;
  }

  async dispatch(request: PreparedRequest): Promise<DispatchOutcome> {
    const requestId = this.counter.next().toString(16);
    this.logger.debug(`request ${requestId}: ${request.method} ${request.url}`);

    let attempts = 0;
    let result: RetryResult;
    try {
      result = await withServiceUnavailableRetry(
        () => {
          attempts += 1;
          return this.transport(this.signer.sign(withBodyCopy(request)));
        },
        {
          maxRetries: this.maxRetries,
          maxRetryAfterMs: this.maxRetryAfterMs,
          onRetry: (retry, waitMs) => {
            this.logger.warn(`response ${requestId}: 503 Service Unavailable, retrying`, {
              retry,
              of: this.maxRetries,
              waitMs,
            });
          },
        },
      );
    } catch (error) {
      const transportError = new TransportError(error);
      this.logger.debug(`response ${requestId}: transport error: ${transportError.message}`);
      return { kind: 'transport', error: transportError, attempts };
    }

    const { response } = result;
    if (response.statusCode >= 400) {
      const serverError = new ServerError(response.statusCode, response.body);
      this.logger.debug(`response ${requestId}: ${serverError.message}`);
      return { kind: 'server', error: serverError, attempts: result.attempts };
    }
    this.logger.debug(`response ${requestId}: ${response.statusCode}`, {
      bytes: response.body.length,
    });
    return {
      kind: 'success',
      statusCode: response.statusCode,
      body: response.body,
      attempts: result.attempts,
    };
  }
}

/**
 * The body of a successful outcome; otherwise throws the
 * TransportError or ServerError it carries.
 */
export function unwrapOutcome(outcome: DispatchOutcome): Buffer {
  if (outcome.kind === 'success') return outcome.body;
  throw outcome.error;
}
