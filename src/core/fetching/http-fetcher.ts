/**
 * Static-mode transport over the runtime's fetch
 */

import { BROWSER_CONSTANTS } from "../constants/index";
import { PermanentFetchError, TransientFetchError, errorMessage } from "../errors";
import type { StaticResponse, StaticTransport } from "../types/index";

export interface HttpFetcherOptions {
  timeoutMs: number;
  userAgent?: string;
}

/**
 * Parses a Retry-After header (delta-seconds or HTTP date)
 * @returns Milliseconds to wait, or null when absent/unparseable
 */
export function parseRetryAfter(value: string | null, now = Date.now()): number | null {
  if (!value) return null;
  const secs = Number(value.trim());
  if (Number.isFinite(secs)) return Math.max(0, secs * 1000);
  const at = Date.parse(value);
  return Number.isNaN(at) ? null : Math.max(0, at - now);
}

export class HttpFetcher implements StaticTransport {
  constructor(private readonly options: HttpFetcherOptions) {}

  /**
   * Fetches a page's HTML with browser-like headers.
   * Resolves for every HTTP status; status policy belongs to the caller.
   * @throws TransientFetchError on network failures and timeouts
   */
  async fetchStatic(url: string): Promise<StaticResponse> {
    let r: Response;
    try {
      r = await fetch(url, {
        redirect: "follow",
        signal: AbortSignal.timeout(this.options.timeoutMs),
        headers: {
          "user-agent": this.options.userAgent ?? BROWSER_CONSTANTS.USER_AGENT,
          accept: BROWSER_CONSTANTS.ACCEPT_HEADER,
          "accept-language": BROWSER_CONSTANTS.ACCEPT_LANGUAGE,
        },
      });
    } catch (e) {
      if (e instanceof TypeError && /invalid url/i.test(e.message)) {
        throw new PermanentFetchError(`Malformed URL: ${url}`, url, null, { cause: e });
      }
      throw new TransientFetchError(`Request failed: ${errorMessage(e)}`, url, null, null, {
        cause: e,
      });
    }

    let body: string;
    try {
      body = await r.text();
    } catch (e) {
      throw new TransientFetchError(`Body read failed: ${errorMessage(e)}`, url, r.status, null, {
        cause: e,
      });
    }

    return {
      url: r.url || url,
      status: r.status,
      body,
      contentType: r.headers.get("content-type"),
      retryAfterMs: parseRetryAfter(r.headers.get("retry-after")),
    };
  }
}
