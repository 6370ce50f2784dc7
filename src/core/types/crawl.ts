/**
 * Crawl traversal and result types
 */

export interface FrontierEntry {
  url: string;
  depth: number;
}

export type CrawlerState =
  | "idle"
  | "running"
  | "completed"
  | "timed-out"
  | "limit-reached";

export type TerminalState = Extract<
  CrawlerState,
  "completed" | "timed-out" | "limit-reached"
>;

export interface CrawlResult {
  urls: string[];
  count: number;
  /** ISO-8601 completion instant */
  timestamp: string;
}

export interface DomainCrawlStats {
  pagesFetched: number;
  fetchFailures: number;
  dynamicResolutions: number;
  elapsedMs: number;
}

export interface DomainCrawlOutcome {
  domain: string;
  state: TerminalState;
  result: CrawlResult;
  stats: DomainCrawlStats;
}

export type CrawlReport = Record<string, CrawlResult>;
