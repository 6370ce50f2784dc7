/**
 * CrawlOrchestrator: runs one DomainCrawler per domain, concurrently
 */

import { performance } from "node:perf_hooks";
import { ProductClassifier } from "../classification/index";
import type { CrawlConfig } from "../config/index";
import { DomainCrawler } from "../crawling/index";
import { RetryingFetcher } from "../fetching/index";
import { DynamicContentResolver } from "../resolution/index";
import type { CrawlReport, CrawlResult, FetchCapability } from "../types/index";
import { uniq } from "../utils/array";
import { formatDuration } from "../utils/date";
import { Logger } from "../utils/logger";
const { default: pLimit } = await import("p-limit");

export interface CrawlDependencies {
  capability: FetchCapability;
  classifier?: ProductClassifier;
  /** Monotonic milliseconds */
  now?: () => number;
  clock?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

export interface OrchestratorHooks {
  /** Called once per domain as soon as its crawl ends, in completion order */
  onDomainComplete?: (domain: string, result: CrawlResult) => void | Promise<void>;
}

export class CrawlOrchestrator {
  private readonly classifier: ProductClassifier;
  private readonly now: () => number;

  constructor(private readonly deps: CrawlDependencies) {
    this.classifier = deps.classifier ?? new ProductClassifier();
    this.now = deps.now ?? (() => performance.now());
  }

  /**
   * Crawls every domain and collects their results. A domain that fails or
   * times out contributes what it found so far.
   * @throws ConfigError before any crawling when a seed cannot be parsed
   */
  async runAll(
    domains: readonly string[],
    config: CrawlConfig,
    hooks: OrchestratorHooks = {},
  ): Promise<CrawlReport> {
    const t0 = this.now();
    const deadline =
      config.globalTimeoutSeconds !== undefined
        ? t0 + config.globalTimeoutSeconds * 1000
        : undefined;

    const fetcher = new RetryingFetcher(this.deps.capability, {
      maxRetries: config.maxRetries,
      retryDelayMs: config.retryDelaySeconds * 1000,
      backoff: config.retryBackoff,
      sleep: this.deps.sleep,
    });
    const resolver = new DynamicContentResolver({
      maxScrollAttempts: config.maxScrollAttempts,
      scrollTimeoutMs: config.scrollTimeoutSeconds * 1000,
      dynamicWaitMs: config.dynamicWaitSeconds * 1000,
      now: this.deps.now,
    });

    const crawlers = uniq(domains).map(
      (domain) =>
        new DomainCrawler({
          domain,
          limits: config,
          fetcher,
          classifier: this.classifier,
          resolver,
          now: this.now,
          deadline,
          clock: this.deps.clock,
        }),
    );

    const concurrency = Math.max(1, config.maxConcurrentDomains ?? crawlers.length);
    const limit = pLimit(concurrency);
    Logger.info(`Crawling ${crawlers.length} domain(s)`, { count: crawlers.length, concurrency });

    const results = await Promise.all(
      crawlers.map((crawler) =>
        limit(async (): Promise<CrawlResult> => {
          let result: CrawlResult;
          try {
            result = (await crawler.run()).result;
          } catch (e) {
            Logger.error(`Domain crawl aborted: ${crawler.domain}`, e, { domain: crawler.domain });
            result = crawler.snapshot();
          }
          try {
            await hooks.onDomainComplete?.(crawler.domain, result);
          } catch (e) {
            Logger.error(`Completion hook failed for ${crawler.domain}`, e, {
              domain: crawler.domain,
            });
          }
          return result;
        }),
      ),
    );

    const report: CrawlReport = {};
    crawlers.forEach((crawler, i) => {
      report[crawler.domain] = results[i];
    });

    const total = results.reduce((n, r) => n + r.count, 0);
    Logger.info(
      `Crawl finished: ${total} product URLs in ${formatDuration((this.now() - t0) / 1000)}`,
      { count: total },
    );
    return report;
  }
}
