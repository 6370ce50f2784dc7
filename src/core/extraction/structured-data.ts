/**
 * Structured-data (JSON-LD, microdata) type discovery
 */

import type { CheerioAPI } from "cheerio";

type JsonObject = Record<string, unknown>;

const isObject = (v: unknown): v is JsonObject =>
  typeof v === "object" && v !== null && !Array.isArray(v);

/**
 * Parses JSON-LD script bodies into top-level nodes.
 * Arrays are flattened and `@graph` members are lifted; nested nodes
 * (offers, itemListElement, ...) are left alone so a listing that embeds
 * products does not look like a product itself.
 */
export function parseJsonLdBlocks(blocks: readonly string[]): JsonObject[] {
  const out: JsonObject[] = [];
  for (const raw of blocks) {
    const txt = raw.trim();
    if (!txt) continue;
    let parsed: unknown;
    try {
      parsed = JSON.parse(txt);
    } catch {
      // some shops ship trailing commas or comments; such blocks carry no usable type
      continue;
    }
    const nodes = Array.isArray(parsed) ? parsed : [parsed];
    for (const node of nodes) {
      if (!isObject(node)) continue;
      const graph = node["@graph"];
      if (Array.isArray(graph)) out.push(...graph.filter(isObject));
      else out.push(node);
    }
  }
  return out;
}

/** "https://schema.org/Product", "schema:Product" -> "Product" */
export function normalizeSchemaType(raw: string): string {
  const t = raw.trim();
  const cut = Math.max(t.lastIndexOf("/"), t.lastIndexOf(":"), t.lastIndexOf("#"));
  return cut >= 0 ? t.slice(cut + 1) : t;
}

/** Declared `@type` values of a JSON-LD node */
export function schemaTypesOf(node: JsonObject): string[] {
  const declared = node["@type"];
  const list = Array.isArray(declared) ? declared : [declared];
  return list
    .filter((t): t is string => typeof t === "string" && t.trim() !== "")
    .map(normalizeSchemaType);
}

/**
 * Collects schema.org types of the page's top-level items
 * @param $ - Loaded document, scripts still in place
 */
export function collectStructuredDataTypes($: CheerioAPI): string[] {
  const blocks: string[] = [];
  $('script[type="application/ld+json"]').each((_, el) => {
    blocks.push($(el).text());
  });

  const types: string[] = [];
  for (const node of parseJsonLdBlocks(blocks)) {
    types.push(...schemaTypesOf(node));
  }

  // Microdata: an itemscope that is itself a property belongs to another item
  $("[itemscope][itemtype]:not([itemprop])").each((_, el) => {
    const itemtype = $(el).attr("itemtype") ?? "";
    for (const t of itemtype.split(/\s+/)) {
      if (t) types.push(normalizeSchemaType(t));
    }
  });

  return Array.from(new Set(types));
}
