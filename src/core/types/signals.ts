/**
 * Page signal and classification types
 */

/** Normalized evidence extracted from one page state */
export interface PageSignals {
  url: string;
  title: string;
  /** Visible text, whitespace-collapsed */
  text: string;
  textLength: number;
  /** Names, ids and labels of form controls and buttons */
  controls: string[];
  /** Top-level schema.org types declared by JSON-LD or microdata */
  structuredDataTypes: string[];
  /** Absolute http(s) links, deduplicated, in document order */
  links: string[];
  htmlBytes: number;
  scriptCount: number;
}

/** What the classifier reads; any field may be absent */
export type ClassifierInput = Partial<
  Pick<PageSignals, "text" | "controls" | "structuredDataTypes">
>;

export interface ClassificationResult {
  readonly isProduct: boolean;
  /** In [0, 1] */
  readonly confidence: number;
  readonly matchedSignals: readonly string[];
}
