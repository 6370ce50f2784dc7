/**
 * Error kinds raised by fetching, rendering and configuration
 */

export type FetchErrorKind = "transient" | "permanent" | "exhausted";

/** Base class for every failure tied to a single URL */
export abstract class FetchError extends Error {
  abstract readonly kind: FetchErrorKind;

  constructor(
    message: string,
    public readonly url: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** Network errors, timeouts, 5xx and 429 responses, render-driver hiccups */
export class TransientFetchError extends FetchError {
  readonly kind = "transient";

  constructor(
    message: string,
    url: string,
    public readonly status: number | null = null,
    public readonly retryAfterMs: number | null = null,
    options?: { cause?: unknown },
  ) {
    super(message, url, options);
    this.name = "TransientFetchError";
  }
}

/** 4xx responses (other than 429) and malformed URLs; never retried */
export class PermanentFetchError extends FetchError {
  readonly kind = "permanent";

  constructor(
    message: string,
    url: string,
    public readonly status: number | null = null,
    options?: { cause?: unknown },
  ) {
    super(message, url, options);
    this.name = "PermanentFetchError";
  }
}

export class FetchExhausted extends FetchError {
  readonly kind = "exhausted";

  constructor(
    url: string,
    public readonly attempts: number,
    public readonly lastError: TransientFetchError,
  ) {
    super(
      `Fetch failed after ${attempts} attempts: ${lastError.message}`,
      url,
      { cause: lastError },
    );
    this.name = "FetchExhausted";
  }
}

/** A render-handle operation did not finish in time; resolution keeps what it has */
export class RenderTimeout extends Error {
  constructor(
    public readonly url: string,
    public readonly operation: string,
    options?: { cause?: unknown },
  ) {
    super(`Render operation "${operation}" timed out for ${url}`, options);
    this.name = "RenderTimeout";
  }
}

/** Fatal: detected before any crawling starts */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(issues.length ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigError";
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
