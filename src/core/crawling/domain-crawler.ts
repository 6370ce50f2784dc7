/**
 * DomainCrawler: breadth-first product discovery on one site
 */

import { performance } from "node:perf_hooks";
import type { ProductClassifier } from "../classification/index";
import type { CrawlConfig } from "../config/index";
import { ConfigError, FetchExhausted, PermanentFetchError, errorMessage } from "../errors";
import { extractSignals, mergeSignals } from "../extraction/index";
import type { RetryingFetcher } from "../fetching/index";
import type { DynamicContentResolver } from "../resolution/index";
import type {
  ClassificationResult,
  CrawlerState,
  CrawlResult,
  DomainCrawlOutcome,
  DomainCrawlStats,
  FrontierEntry,
  PageSignals,
  RenderHandle,
  StaticResponse,
  TerminalState,
} from "../types/index";
import { Logger } from "../utils/logger";
import { hostOf, normalizeUrl, registrableDomain, toSeedUrl } from "../utils/url";
import { Frontier } from "./frontier";
import { LinkFilter } from "./link-filter";
import { looksUnderRendered, type RenderThresholds } from "./render-heuristic";

export type CrawlLimits = Pick<
  CrawlConfig,
  "maxDepth" | "maxUrlsPerDomain" | "timeoutSeconds" | "dynamicRendering"
>;

export interface DomainCrawlerOptions {
  /** Configured domain or seed URL */
  domain: string;
  limits: CrawlLimits;
  fetcher: RetryingFetcher;
  classifier: ProductClassifier;
  resolver: DynamicContentResolver;
  linkFilter?: LinkFilter;
  renderThresholds?: RenderThresholds;
  /** Monotonic milliseconds */
  now?: () => number;
  /** Absolute stop time on the `now` clock, shared by every domain of a run */
  deadline?: number;
  clock?: () => Date;
}

const isHtml = (res: StaticResponse): boolean =>
  res.contentType === null || /text\/html|application\/xhtml\+xml/i.test(res.contentType);

export class DomainCrawler {
  readonly domain: string;
  private readonly seed: string;
  private readonly siteDomain: string;
  private readonly frontier: Frontier;
  private readonly linkFilter: LinkFilter;
  private readonly now: () => number;
  private readonly clock: () => Date;

  private readonly urls: string[] = [];
  private readonly recorded = new Set<string>();
  private readonly stats: DomainCrawlStats = {
    pagesFetched: 0,
    fetchFailures: 0,
    dynamicResolutions: 0,
    elapsedMs: 0,
  };
  private currentState: CrawlerState = "idle";
  private startedAt = 0;
  private finishedAt: Date | null = null;

  constructor(private readonly options: DomainCrawlerOptions) {
    const seed = toSeedUrl(options.domain);
    const host = seed ? hostOf(seed) : null;
    if (!seed || !host) {
      throw new ConfigError(`Unparseable seed domain: ${options.domain}`);
    }
    this.domain = options.domain;
    this.seed = seed;
    this.siteDomain = registrableDomain(host);
    this.frontier = new Frontier({
      maxDepth: options.limits.maxDepth,
      maxDiscoveries: options.limits.maxUrlsPerDomain,
    });
    this.linkFilter = options.linkFilter ?? new LinkFilter(this.siteDomain);
    this.now = options.now ?? (() => performance.now());
    this.clock = options.clock ?? (() => new Date());
  }

  get state(): CrawlerState {
    return this.currentState;
  }

  /**
   * Crawls until the frontier empties, the discovery limit is hit or time runs out.
   * Failures of single URLs are logged and skipped.
   */
  async run(): Promise<DomainCrawlOutcome> {
    if (this.currentState !== "idle") {
      throw new Error(`Crawler for ${this.domain} already ${this.currentState}`);
    }
    this.currentState = "running";
    this.startedAt = this.now();
    Logger.info(`Crawl started: ${this.seed}`, { domain: this.domain });

    this.frontier.enqueue(this.seed, 0);
    const state = await this.loop();

    this.currentState = state;
    this.finishedAt = this.clock();
    this.stats.elapsedMs = this.now() - this.startedAt;
    Logger.domainComplete(
      this.domain,
      state,
      this.urls.length,
      Number((this.stats.elapsedMs / 1000).toFixed(2)),
    );

    return {
      domain: this.domain,
      state,
      result: this.snapshot(),
      stats: { ...this.stats },
    };
  }

  /** Product URLs found so far; valid at any point of the crawl */
  snapshot(): CrawlResult {
    return {
      urls: [...this.urls],
      count: this.urls.length,
      timestamp: (this.finishedAt ?? this.clock()).toISOString(),
    };
  }

  private async loop(): Promise<TerminalState> {
    for (;;) {
      if (this.frontier.atLimit) return "limit-reached";
      if (this.timedOut()) return "timed-out";
      const entry = this.frontier.dequeue();
      if (!entry) return "completed";
      try {
        await this.visit(entry);
      } catch (e) {
        Logger.error(`Skipping ${entry.url}`, e, { domain: this.domain, url: entry.url });
      }
    }
  }

  private timedOut(): boolean {
    const t = this.now();
    if (t - this.startedAt > this.options.limits.timeoutSeconds * 1000) return true;
    return this.options.deadline !== undefined && t >= this.options.deadline;
  }

  private async visit(entry: FrontierEntry): Promise<void> {
    let res: StaticResponse;
    try {
      res = await this.options.fetcher.fetch(entry.url, "static");
    } catch (e) {
      this.fetchFailed(entry.url, e);
      return;
    }
    this.stats.pagesFetched++;

    if (!isHtml(res)) {
      Logger.debug(`Skipping non-HTML response (${res.contentType})`, { url: entry.url });
      return;
    }

    // redirects may land elsewhere; classify what was actually served
    const pageUrl = normalizeUrl(res.url) ?? entry.url;
    if (pageUrl !== entry.url && !this.linkFilter.accepts(pageUrl)) {
      Logger.debug(`Redirected off-site to ${pageUrl}`, { url: entry.url });
      return;
    }

    let signals = extractSignals({ url: res.url || entry.url, html: res.body });
    let verdict = this.options.classifier.classify(pageUrl, signals);

    if (
      !verdict.isProduct &&
      this.options.limits.dynamicRendering &&
      looksUnderRendered(signals.links.length, signals.htmlBytes, this.options.renderThresholds) &&
      !this.timedOut()
    ) {
      const rendered = await this.render(entry.url);
      if (rendered) {
        signals = mergeSignals(signals, rendered);
        verdict = this.options.classifier.classify(pageUrl, signals);
      }
    }

    if (verdict.isProduct) this.record(pageUrl, verdict);

    for (const link of signals.links) {
      if (this.linkFilter.accepts(link)) {
        this.frontier.enqueue(link, entry.depth + 1);
      }
    }
  }

  /** Re-fetches a page in the browser and drives it until its content settles */
  private async render(url: string): Promise<PageSignals | null> {
    let handle: RenderHandle;
    try {
      handle = await this.options.fetcher.fetch(url, "dynamic");
    } catch (e) {
      this.fetchFailed(url, e);
      return null;
    }
    try {
      const { signals } = await this.options.resolver.resolve(handle);
      this.stats.dynamicResolutions++;
      return signals;
    } finally {
      await handle.close().catch((e: unknown) =>
        Logger.warn(`Render handle close failed: ${errorMessage(e)}`, { url }),
      );
    }
  }

  private record(url: string, verdict: ClassificationResult): void {
    if (this.recorded.has(url)) return;
    this.recorded.add(url);
    this.urls.push(url);
    this.frontier.recordDiscovery();
    Logger.productFound(this.domain, url, verdict.confidence, verdict.matchedSignals);
  }

  private fetchFailed(url: string, e: unknown): void {
    this.stats.fetchFailures++;
    if (e instanceof FetchExhausted) {
      Logger.fetchFailed(this.domain, url, e.attempts, e.lastError.message);
    } else if (e instanceof PermanentFetchError) {
      Logger.fetchFailed(this.domain, url, 1, e.message);
    } else {
      Logger.error(`Fetch failed unexpectedly: ${url}`, e, { domain: this.domain, url });
    }
  }
}
