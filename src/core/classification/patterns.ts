/**
 * Product-page evidence patterns
 */

import { CLASSIFIER_CONSTANTS } from "../constants/index";

export interface WeightedPattern {
  name: string;
  pattern: RegExp;
  weight: number;
}

const { URL_STRONG_WEIGHT, URL_MEDIUM_WEIGHT, URL_WEAK_WEIGHT } = CLASSIFIER_CONSTANTS;

/** Matched against the URL path only; the best match wins */
export const URL_PATTERNS: readonly WeightedPattern[] = [
  { name: "url:product-segment", pattern: /\/products?\/[\w-]+/i, weight: URL_STRONG_WEIGHT },
  { name: "url:p-segment", pattern: /\/p\/[\w-]+/i, weight: URL_STRONG_WEIGHT },
  { name: "url:dp-segment", pattern: /\/dp\/[a-z0-9]{6,}/i, weight: URL_STRONG_WEIGHT },
  { name: "url:gp-product", pattern: /\/gp\/product\/[a-z0-9]{6,}/i, weight: URL_STRONG_WEIGHT },
  { name: "url:item-segment", pattern: /\/item\/[\w-]+/i, weight: URL_STRONG_WEIGHT },
  { name: "url:i-token", pattern: /-i-[\w-]+/i, weight: URL_STRONG_WEIGHT },
  { name: "url:pd-segment", pattern: /\/pd\/[\w-]+/i, weight: URL_MEDIUM_WEIGHT },
  { name: "url:p-id-suffix", pattern: /\/[\w-]+-p-\d+/i, weight: URL_MEDIUM_WEIGHT },
  { name: "url:shop-segment", pattern: /\/shop\/[\w-]+/i, weight: URL_WEAK_WEIGHT },
  { name: "url:numbered-html", pattern: /\/[\w-]+-\d+\.html?$/i, weight: URL_WEAK_WEIGHT },
];

const CURRENCY_SYMBOL = "[$€£¥₹]";
const CURRENCY_CODE = "(?:usd|eur|gbp|sek|nok|dkk|inr|rs\\.?|kr)";
const AMOUNT = "\\d[\\d.,\\s]*\\d|\\d";

/** Matched against visible page text; each match adds its weight */
export const CONTENT_PATTERNS: readonly WeightedPattern[] = [
  { name: "content:add-to-cart", pattern: /\badd to (?:cart|basket|bag)\b/i, weight: 0.2 },
  { name: "content:buy-now", pattern: /\bbuy (?:it )?now\b/i, weight: 0.15 },
  {
    name: "content:price",
    pattern: new RegExp(
      `(?:${CURRENCY_SYMBOL}|\\b${CURRENCY_CODE})\\s?(?:${AMOUNT})|(?:${AMOUNT})\\s?(?:${CURRENCY_SYMBOL}|:-|${CURRENCY_CODE}\\b)`,
      "i",
    ),
    weight: 0.15,
  },
  { name: "content:add-to-wishlist", pattern: /\badd to (?:wish ?list|favou?rites)\b/i, weight: 0.05 },
  {
    name: "content:product-details",
    pattern: /\b(?:product description|product details|specifications|technical details)\b/i,
    weight: 0.05,
  },
  { name: "content:sku", pattern: /\b(?:sku|item code|model number)\b/i, weight: 0.05 },
];

/** Matched against form-control names, ids and labels */
export const QUANTITY_CONTROL: WeightedPattern = {
  name: "content:quantity-selector",
  pattern: /qty|quantity/i,
  weight: 0.1,
};

/** Declared schema.org types that are authoritative for a product page */
export const PRODUCT_SCHEMA_TYPES: ReadonlySet<string> = new Set([
  "Product",
  "ProductGroup",
  "IndividualProduct",
  "ProductModel",
]);
