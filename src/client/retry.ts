import type { ResponseHeaders, TransportResponse } from './types.js';

export const SERVICE_UNAVAILABLE = 503;

// Default number of retries after the first attempt
export const DEFAULT_MAX_RETRIES = 4;

// Upper bound on how long a Retry-After header may make us wait
export const DEFAULT_MAX_RETRY_AFTER_MS = 30_000;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// Retry-After can be:
//   - a decimal integer (seconds to wait)
//   - an HTTP-date string (absolute datetime)
// Returns null if the header is absent or unparseable.
export function parseRetryAfter(value: string | string[] | undefined, now = Date.now()): number | null {
  if (value === undefined) return null;
  const header = Array.isArray(value) ? value[0] : value;
  if (!header) return null;

  const seconds = Number(header);
  if (Number.isFinite(seconds)) {
    return Math.max(0, Math.floor(seconds * 1000));
  }

  const ts = new Date(header).getTime();
  if (!Number.isNaN(ts)) {
    return Math.max(0, ts - now);
  }

  return null;
}

export interface RetryPolicy {
  maxRetries: number;
  maxRetryAfterMs: number;
  // Called before each retry with the 1-based retry number and the wait in ms
  onRetry?: (retry: number, waitMs: number, headers: ResponseHeaders) => void;
}

export interface RetryResult {
  response: TransportResponse;
  attempts: number;
}

/**
 * Re-runs `send` while it answers 503.
 *
 * At most `maxRetries + 1` calls are made. Only a 503 response triggers a
 * retry; any other response, and any rejection from `send`, is returned or
 * thrown straight away. A Retry-After header is honoured up to
 * `maxRetryAfterMs`; without one the retry is immediate.
 */
export async function withServiceUnavailableRetry(
  send: () => Promise<TransportResponse>,
  policy: RetryPolicy,
  attempt = 1,
): Promise<RetryResult> {
  const response = await send();
  if (response.statusCode !== SERVICE_UNAVAILABLE || attempt > policy.maxRetries) {
    return { response, attempts: attempt };
  }
  const retryAfter = parseRetryAfter(response.headers['retry-after']);
  const waitMs = Math.min(retryAfter ?? 0, policy.maxRetryAfterMs);
  policy.onRetry?.(attempt, waitMs, response.headers);
  if (waitMs > 0) await sleep(waitMs);
  return withServiceUnavailableRetry(send, policy, attempt + 1);
}
