/**
 * HTTP plumbing shared by the manifest fetcher and the segment downloader.
 *
 * - Fetcher interface for dependency injection (tests route requests to an
 *   in-process app instead of the network)
 * - Retry classification and jittered exponential backoff
 * - Inactivity timeouts that cover response headers and every body read
 */

import { setTimeout as delay } from "node:timers/promises";

// ============================================================================
// Fetcher Interface
// ============================================================================

/**
 * HTTP fetcher interface for dependency injection.
 * Allows mocking in tests.
 */
export interface HttpFetcher {
  fetch(url: string, init?: RequestInit): Promise<Response>;
}

/**
 * Default HTTP fetcher using global fetch.
 */
export const defaultFetcher: HttpFetcher = {
  fetch: (url, init) => fetch(url, init),
};

// ============================================================================
// Retry Policy
// ============================================================================

export interface RetryPolicy {
  /** Retries after the first attempt; 0 disables retrying */
  retries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  retries: 2,
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
};

/**
 * Sleep function; rejects when `signal` aborts.
 */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

/**
 * Whether an HTTP status is worth retrying.
 */
export function isRetryableStatus(status: number): boolean {
  return status >= 500 || status === 408 || status === 429;
}

/**
 * Backoff before retry number `retry` (1-based): min(base * 2^(retry-1), max),
 * half of it fixed and half random.
 */
export function backoffDelay(
  retry: number,
  policy: RetryPolicy,
  random: () => number = Math.random,
): number {
  const ceiling = Math.min(policy.baseDelayMs * 2 ** Math.max(retry - 1, 0), policy.maxDelayMs);
  const half = ceiling / 2;
  return Math.round(half + random() * half);
}

// ============================================================================
// Timeouts
// ============================================================================

export class InactivityTimeoutError extends Error {
  constructor(public readonly timeoutMs: number, what: string) {
    super(`no data for ${timeoutMs / 1000}s while waiting for ${what}`);
    this.name = "InactivityTimeoutError";
  }
}

/**
 * Race `promise` against a timer. `onTimeout` runs after the rejection so the
 * timeout error settles the race before any error the abort causes.
 */
export async function raceTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  what: string,
  onTimeout?: () => void,
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new InactivityTimeoutError(timeoutMs, what));
      onTimeout?.();
    }, timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * A request whose lifetime is tied to an outer signal plus its own abort
 * controller, so a timeout can tear down the connection.
 */
export interface TimedRequest {
  response: Response;
  /** Read the next body chunk; null at end of stream */
  read(): Promise<Uint8Array | null>;
  /** Cancel the body and detach from the outer signal */
  close(): Promise<void>;
}

/**
 * Issue a GET and wrap the response so every wait is bounded by `timeoutMs`.
 */
export async function openTimedRequest(
  fetcher: HttpFetcher,
  url: string,
  options: { headers?: Record<string, string>; signal?: AbortSignal; timeoutMs: number },
): Promise<TimedRequest> {
  const controller = new AbortController();
  const { signal, timeoutMs } = options;
  const onAbort = () => controller.abort(signal?.reason);
  if (signal?.aborted) {
    controller.abort(signal.reason);
  } else {
    signal?.addEventListener("abort", onAbort, { once: true });
  }
  const detach = () => signal?.removeEventListener("abort", onAbort);
  const state = { timedOut: false };
  const abortRequest = () => {
    state.timedOut = true;
    controller.abort();
  };
  // An aborted read rejects with AbortError; after our own timeout that is the timeout.
  const asTimeout = (error: unknown, what: string): unknown =>
    state.timedOut && !(error instanceof InactivityTimeoutError) && !signal?.aborted
      ? new InactivityTimeoutError(timeoutMs, what)
      : error;

  let response: Response;
  try {
    response = await raceTimeout(
      fetcher.fetch(url, { headers: options.headers, signal: controller.signal }),
      timeoutMs,
      "response headers",
      abortRequest,
    );
  } catch (error) {
    detach();
    throw asTimeout(error, "response headers");
  }

  const reader = response.body?.getReader() ?? null;

  return {
    response,

    async read() {
      if (!reader) {
        return null;
      }
      try {
        const chunk = await raceTimeout(reader.read(), timeoutMs, "response body", abortRequest);
        return chunk.done ? null : chunk.value;
      } catch (error) {
        throw asTimeout(error, "response body");
      }
    },

    async close() {
      detach();
      if (reader) {
        // Cancelling a stream that already errored rejects with that same error.
        await reader.cancel().catch(() => undefined);
      }
    },
  };
}

/**
 * Whether the caller cancelled. An AbortError alone does not count: timeouts
 * abort requests too.
 */
export function isCancelled(signal?: AbortSignal): boolean {
  return signal?.aborted === true;
}
