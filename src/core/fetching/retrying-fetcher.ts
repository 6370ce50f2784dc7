/**
 * RetryingFetcher: one fetch/render with bounded retries and backoff
 */

import {
  FetchError,
  FetchExhausted,
  PermanentFetchError,
  TransientFetchError,
  errorMessage,
} from "../errors";
import type {
  FetchCapability,
  FetchMode,
  RenderHandle,
  StaticResponse,
} from "../types/index";
import { Logger } from "../utils/logger";
import { RetryError, withRetry, type BackoffStrategy } from "../utils/retry";

/** Retry-After values beyond this are clamped */
const MAX_RETRY_AFTER_MS = 60_000;

export interface RetryingFetcherOptions {
  /** Total attempts per fetch, including the first */
  maxRetries: number;
  retryDelayMs: number;
  backoff?: BackoffStrategy;
  jitterMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Maps an HTTP status to an error, or null for a usable response
 */
export function statusError(res: StaticResponse, url: string): FetchError | null {
  const { status } = res;
  if (status >= 200 && status < 400) return null;
  if (status === 429 || status >= 500) {
    return new TransientFetchError(`HTTP ${status}`, url, status, res.retryAfterMs);
  }
  return new PermanentFetchError(`HTTP ${status}`, url, status);
}

/**
 * Normalizes anything a transport throws into a FetchError.
 * Unknown failures (socket resets, driver crashes, timeouts) count as transient.
 */
export function toFetchError(err: unknown, url: string): FetchError {
  if (err instanceof FetchError) return err;
  if (err instanceof TypeError && /invalid url/i.test(err.message)) {
    return new PermanentFetchError(`Malformed URL: ${url}`, url, null, { cause: err });
  }
  return new TransientFetchError(errorMessage(err), url, null, null, { cause: err });
}

function assertFetchable(url: string): void {
  let u: URL;
  try {
    u = new URL(url);
  } catch (e) {
    throw new PermanentFetchError(`Malformed URL: ${url}`, url, null, { cause: e });
  }
  if (u.protocol !== "http:" && u.protocol !== "https:") {
    throw new PermanentFetchError(`Unsupported scheme ${u.protocol} in ${url}`, url);
  }
}

export class RetryingFetcher {
  constructor(
    private readonly capability: FetchCapability,
    private readonly options: RetryingFetcherOptions,
  ) {}

  /**
   * Fetches a page statically or opens it in the render driver.
   * @throws PermanentFetchError without retrying (4xx except 429, malformed URL)
   * @throws FetchExhausted once `maxRetries` attempts have failed transiently
   */
  fetch(url: string, mode: "static"): Promise<StaticResponse>;
  fetch(url: string, mode: "dynamic"): Promise<RenderHandle>;
  async fetch(url: string, mode: FetchMode): Promise<StaticResponse | RenderHandle> {
    assertFetchable(url);
    const maxAttempts = Math.max(1, this.options.maxRetries);

    try {
      return await withRetry(() => this.attempt(url, mode), {
        maxAttempts,
        baseDelayMs: this.options.retryDelayMs,
        backoff: this.options.backoff ?? "fixed",
        jitterMs: this.options.jitterMs ?? 0,
        sleep: this.options.sleep,
        retryCondition: (e) => e instanceof TransientFetchError,
        minDelayFor: (e) =>
          e instanceof TransientFetchError && e.retryAfterMs !== null
            ? Math.min(e.retryAfterMs, MAX_RETRY_AFTER_MS)
            : 0,
        onRetry: ({ attempt, lastError }, delayMs) =>
          Logger.fetchRetry(url, attempt, maxAttempts, delayMs, errorMessage(lastError)),
      });
    } catch (e) {
      if (e instanceof RetryError) {
        const last =
          e.originalError instanceof TransientFetchError
            ? e.originalError
            : new TransientFetchError(errorMessage(e.originalError), url);
        throw new FetchExhausted(url, e.attempt, last);
      }
      throw e;
    }
  }

  private async attempt(url: string, mode: FetchMode): Promise<StaticResponse | RenderHandle> {
    try {
      if (mode === "dynamic") {
        return await this.capability.fetchRendered(url);
      }
      const res = await this.capability.fetchStatic(url);
      const err = statusError(res, url);
      if (err) throw err;
      return res;
    } catch (e) {
      throw toFetchError(e, url);
    }
  }
}
