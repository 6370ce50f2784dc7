/**
 * ProductClassifier: decides whether a page is a product detail page
 */

import { CLASSIFIER_CONSTANTS } from "../constants/index";
import type { ClassificationResult, ClassifierInput } from "../types/index";
import {
  CONTENT_PATTERNS,
  PRODUCT_SCHEMA_TYPES,
  QUANTITY_CONTROL,
  URL_PATTERNS,
  type WeightedPattern,
} from "./patterns";

export interface ClassifierSettings {
  decisionThreshold: number;
  contentCap: number;
  structuredDataWeight: number;
  urlPatterns: readonly WeightedPattern[];
  contentPatterns: readonly WeightedPattern[];
  quantityControl: WeightedPattern;
  productSchemaTypes: ReadonlySet<string>;
}

export const DEFAULT_CLASSIFIER_SETTINGS: ClassifierSettings = {
  decisionThreshold: CLASSIFIER_CONSTANTS.DECISION_THRESHOLD,
  contentCap: CLASSIFIER_CONSTANTS.CONTENT_CAP,
  structuredDataWeight: CLASSIFIER_CONSTANTS.STRUCTURED_DATA_WEIGHT,
  urlPatterns: URL_PATTERNS,
  contentPatterns: CONTENT_PATTERNS,
  quantityControl: QUANTITY_CONTROL,
  productSchemaTypes: PRODUCT_SCHEMA_TYPES,
};

const round = (n: number): number => Math.round(n * 10000) / 10000;

function pathOf(url: string): string {
  try {
    return new URL(url).pathname;
  } catch {
    return url;
  }
}

export class ProductClassifier {
  private readonly settings: ClassifierSettings;

  constructor(overrides: Partial<ClassifierSettings> = {}) {
    this.settings = { ...DEFAULT_CLASSIFIER_SETTINGS, ...overrides };
  }

  /**
   * Scores a page from its URL shape, purchase-intent content and structured data.
   * Pure: the same input always yields an equal result.
   */
  classify(url: string, signals: ClassifierInput = {}): ClassificationResult {
    const s = this.settings;
    const matched: string[] = [];

    // 1) URL shape: strongest single pattern
    let urlScore = 0;
    let urlMatch: string | null = null;
    const path = pathOf(url);
    for (const p of s.urlPatterns) {
      if (p.weight > urlScore && p.pattern.test(path)) {
        urlScore = p.weight;
        urlMatch = p.name;
      }
    }
    if (urlMatch) matched.push(urlMatch);

    // 2) Content: summed, capped
    let contentScore = 0;
    const text = signals.text ?? "";
    if (text) {
      for (const p of s.contentPatterns) {
        if (p.pattern.test(text)) {
          contentScore += p.weight;
          matched.push(p.name);
        }
      }
    }
    if ((signals.controls ?? []).some((c) => s.quantityControl.pattern.test(c))) {
      contentScore += s.quantityControl.weight;
      matched.push(s.quantityControl.name);
    }
    contentScore = Math.min(contentScore, s.contentCap);

    // 3) Structured data: authoritative
    const productType = (signals.structuredDataTypes ?? []).find((t) =>
      s.productSchemaTypes.has(t),
    );
    const structuredScore = productType ? s.structuredDataWeight : 0;
    if (productType) matched.push(`structured-data:${productType}`);

    const confidence = round(Math.min(1, urlScore + contentScore + structuredScore));

    return Object.freeze({
      isProduct: productType !== undefined || confidence >= s.decisionThreshold,
      confidence,
      matchedSignals: Object.freeze(matched),
    });
  }
}
