import pino from "pino";

// Set log level via env LOG_LEVEL (default: info)
const pretty = process.env.NODE_ENV !== "production" && !process.env.VITEST;
const logger = pino({
  level: process.env.LOG_LEVEL || "info",
  transport: pretty
    ? {
        target: "pino-pretty",
        options: { colorize: true },
      }
    : undefined,
});

export interface LogMeta {
  domain?: string;
  url?: string;
  duration?: number;
  count?: number;
  error?: string;
  [key: string]: unknown;
}

export class Logger {
  static info(message: string, meta?: LogMeta): void {
    logger.info(meta || {}, message);
  }
  static warn(message: string, meta?: LogMeta): void {
    logger.warn(meta || {}, message);
  }
  static error(message: string, error?: unknown, meta?: LogMeta): void {
    const errorMeta = {
      ...meta,
      error: error instanceof Error ? error.message : error == null ? undefined : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    };
    logger.error(errorMeta, message);
  }
  static debug(message: string, meta?: LogMeta): void {
    logger.debug(meta || {}, message);
  }
  // Convenience methods for crawl events
  static productFound(
    domain: string,
    url: string,
    confidence: number,
    signals: readonly string[],
  ): void {
    this.info(`Product found: ${url}`, {
      domain,
      url,
      confidence: Number(confidence.toFixed(3)),
      signals,
    });
  }
  static fetchRetry(url: string, attempt: number, maxAttempts: number, delayMs: number, error: string): void {
    this.warn(`Retry ${attempt}/${maxAttempts} for ${url} in ${delayMs}ms`, {
      url,
      attempt,
      maxAttempts,
      delayMs,
      error,
    });
  }
  static fetchFailed(domain: string, url: string, attempts: number, error: string): void {
    this.warn(`Fetch failed: ${url}`, { domain, url, attempts, error });
  }
  static renderResolved(url: string, reason: string, iterations: number, links: number): void {
    this.debug(`Dynamic content resolved (${reason})`, {
      url,
      reason,
      iterations,
      links,
    });
  }
  static domainComplete(domain: string, state: string, count: number, duration: number): void {
    this.info(`Domain complete: ${domain} (${state})`, {
      domain,
      state,
      count,
      duration,
    });
  }
}
