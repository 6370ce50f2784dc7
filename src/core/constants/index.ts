/**
 * Application constants
 */

// Classification constants
export const CLASSIFIER_CONSTANTS = {
  DECISION_THRESHOLD: 0.5,
  URL_STRONG_WEIGHT: 0.45,
  URL_MEDIUM_WEIGHT: 0.35,
  URL_WEAK_WEIGHT: 0.25,
  CONTENT_CAP: 0.45,
  STRUCTURED_DATA_WEIGHT: 1.0,
} as const;

// "Looks JS-rendered" heuristic for statically fetched pages
export const RENDER_CONSTANTS = {
  MIN_PAGE_BYTES: 2048, // below this only a page without links is suspicious
  MIN_LINKS_PER_KB: 0.1,
  NAVIGATION_TIMEOUT_MS: 30000,
  NETWORK_IDLE_TIMEOUT_MS: 10000,
  AFFORDANCE_PROBE_TIMEOUT_MS: 800,
  CLICK_TIMEOUT_MS: 1500,
} as const;

// Text on buttons/links that reveal more listing items
export const LOAD_MORE_PATTERNS = [
  "load more",
  "show more",
  "view more",
  "see more",
  "load products",
  "more products",
  "more items",
  "next page",
] as const;

// Browser constants
export const BROWSER_CONSTANTS = {
  USER_AGENT:
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36",
  ACCEPT_HEADER:
    "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
  ACCEPT_LANGUAGE: "en-US,en;q=0.9",
  VIEWPORT: { width: 1920, height: 1080 },
} as const;
