// ABOUTME: fetch() bounded by a timeout, for every outbound catalog and token call.
// ABOUTME: A hung remote would otherwise hold its cache signature's single-flight slot forever.

import { TIMEOUTS, type TimeoutPreset } from '@tunescope/config';
import { AppError } from './errors';

export interface FetchWithTimeoutOptions extends RequestInit {
  /** Milliseconds, or a preset from TIMEOUTS; defaults to `fast` */
  timeout?: number | TimeoutPreset;
}

export class TimeoutError extends AppError {
  constructor(
    public url: string,
    public timeoutMs: number
  ) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`, 'TIMEOUT', 504, { timeoutMs });
    this.name = 'TimeoutError';
  }
}

const NULL_BODY_STATUSES = new Set([101, 204, 205, 304]);

function timeoutMs(timeout: FetchWithTimeoutOptions['timeout'] = 'fast'): number {
  return typeof timeout === 'number' ? timeout : TIMEOUTS[timeout];
}

/**
 * Abort `controller` when `signal` aborts. Returns the unlink function.
 */
function follow(controller: AbortController, signal: AbortSignal | null | undefined): () => void {
  if (!signal) return () => {};
  if (signal.aborted) {
    controller.abort(signal.reason);
    return () => {};
  }
  const onAbort = () => controller.abort(signal.reason);
  signal.addEventListener('abort', onAbort, { once: true });
  return () => signal.removeEventListener('abort', onAbort);
}

/**
 * fetch() that gives up after `timeout`, raising TimeoutError. The returned
 * response is fully buffered, so reading its body never waits on the network.
 * A caller's own `signal` still cancels the request, and its abort error is
 * passed through.
 *
 * @example
 * const response = await fetchWithTimeout(tokenUrl, { method: 'POST', body, timeout: 'slow' });
 */
export async function fetchWithTimeout(
  url: string | URL,
  options: FetchWithTimeoutOptions = {}
): Promise<Response> {
  const { timeout, signal, ...init } = options;
  const href = url.toString();
  const limit = timeoutMs(timeout);

  const controller = new AbortController();
  const unlink = follow(controller, signal);
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, limit);

  try {
    const response = await fetch(href, { ...init, signal: controller.signal });
    // The timer also covers the body; a stalled stream aborts like a stalled connect.
    const body = NULL_BODY_STATUSES.has(response.status) ? null : await response.arrayBuffer();
    return new Response(body, {
      status: response.status,
      statusText: response.statusText,
      headers: response.headers,
    });
  } catch (error) {
    if (timedOut) {
      throw new TimeoutError(href, limit);
    }
    throw error;
  } finally {
    clearTimeout(timer);
    unlink();
  }
}
