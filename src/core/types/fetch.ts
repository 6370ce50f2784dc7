/**
 * Fetch/render capability contracts
 */

export type FetchMode = "static" | "dynamic";

export interface StaticResponse {
  /** Final URL after redirects */
  url: string;
  status: number;
  body: string;
  contentType: string | null;
  retryAfterMs: number | null;
}

export interface RawContent {
  url: string;
  html: string;
}

/**
 * A rendered page held open by the render driver.
 * `A` is the driver's handle for a clickable load-more element.
 */
export interface RenderHandle<A = unknown> {
  readonly url: string;
  scrollToBottom(): Promise<void>;
  waitMillis(ms: number): Promise<void>;
  extractContent(): Promise<RawContent>;
  findLoadMoreAffordance(): Promise<A | null>;
  click(affordance: A): Promise<void>;
  /** Releases the page back to the render pool; safe to call twice */
  close(): Promise<void>;
}

export interface StaticTransport {
  fetchStatic(url: string): Promise<StaticResponse>;
}

export interface RenderTransport {
  fetchRendered(url: string): Promise<RenderHandle>;
}

export type FetchCapability = StaticTransport & RenderTransport;
