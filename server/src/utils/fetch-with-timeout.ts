/**
 * Fetch with Timeout Utility
 *
 * Wraps native fetch with an AbortController so a slow provider cannot hang a request.
 * The deadline covers the body read as well as the headers; the timer is cleared in finally.
 */

import { logger } from '../lib/logger/structured-logger.js';

export type FetchErrorKind = 'TIMEOUT' | 'NETWORK_ERROR';

export interface FetchWithTimeoutConfig {
  timeoutMs: number;
  requestId?: string;
  stage?: string;
  provider?: string;
}

export class FetchError extends Error {
  readonly code = 'UPSTREAM_FETCH_FAILED';

  constructor(
    message: string,
    public readonly errorKind: FetchErrorKind,
    public readonly host: string,
    public readonly timeoutMs: number,
    public readonly stage: string,
    public readonly requestId?: string
  ) {
    super(message);
    this.name = 'FetchError';
  }
}

/**
 * Fetch with automatic timeout
 *
 * `read` consumes the response while the timer is still armed. Errors it throws
 * on its own (bad status, unparseable body) pass through untouched.
 * Only host and path are logged; provider URLs carry the key in the query string.
 *
 * @throws FetchError when the request or the body read times out, or the network fails
 */
export async function fetchWithTimeout<T>(
  url: string,
  options: RequestInit,
  config: FetchWithTimeoutConfig,
  read: (response: Response) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  const startTime = Date.now();
  const { host, pathname } = new URL(url);
  const stage = config.stage || 'unknown';

  logger.debug({
    requestId: config.requestId,
    provider: config.provider,
    method: options.method || 'GET',
    host,
    path: pathname,
    timeoutMs: config.timeoutMs,
    stage,
  }, '[FETCH] Outbound request');

  const timeoutId = setTimeout(() => controller.abort(), config.timeoutMs);
  let responded = false;

  try {
    const response = await fetch(url, {
      ...options,
      signal: controller.signal,
    });

    logger.debug({
      requestId: config.requestId,
      host,
      path: pathname,
      status: response.status,
      durationMs: Date.now() - startTime,
    }, '[FETCH] Response');

    responded = true;
    return await read(response);
  } catch (err) {
    const durationMs = Date.now() - startTime;
    const timedOut = controller.signal.aborted || (err instanceof Error && err.name === 'AbortError');
    if (responded && !timedOut) {
      throw err;
    }
    const errorKind: FetchErrorKind = timedOut ? 'TIMEOUT' : 'NETWORK_ERROR';

    logger.warn({
      requestId: config.requestId,
      provider: config.provider,
      host,
      errorKind,
      durationMs,
      error: err instanceof Error ? err.message : String(err),
    }, '[FETCH] Request failed');

    throw new FetchError(
      `${config.provider || 'Upstream API'} ${errorKind === 'TIMEOUT' ? 'timeout' : 'network error'} after ${durationMs}ms (${host})`,
      errorKind,
      host,
      config.timeoutMs,
      stage,
      config.requestId
    );
  } finally {
    clearTimeout(timeoutId);
  }
}
