/**
 * ContentSignalExtractor: raw page content -> normalized PageSignals
 */

import * as cheerio from "cheerio";
import type { PageSignals, RawContent } from "../types/index";
import { normalizeUrl } from "../utils/url";
import { collectStructuredDataTypes } from "./structured-data";

const NOISE_SELECTORS = "script, style, noscript, template, svg, iframe, nav, header, footer";

const collapse = (s: string): string => s.replace(/\s+/g, " ").trim();

/**
 * Extracts classification signals and outbound links from an HTML document
 * @param raw - Page URL (for resolving relative links) and its HTML
 */
export function extractSignals(raw: RawContent): PageSignals {
  const $ = cheerio.load(raw.html);

  const scriptCount = $("script").length;
  const structuredDataTypes = collectStructuredDataTypes($);
  const title = collapse($("title").first().text());

  // relative links resolve against the URL as served, trailing slash included
  let base = raw.url;
  const baseHref = $("base[href]").first().attr("href");
  if (baseHref) {
    try {
      base = new URL(baseHref, raw.url).href;
    } catch {
      // unusable <base href>; links resolve against the page URL
    }
  }

  const links: string[] = [];
  const seen = new Set<string>();
  $("a[href]").each((_, el) => {
    const href = $(el).attr("href");
    if (!href || href.startsWith("#")) return;
    const abs = normalizeUrl(href, base);
    if (abs && !seen.has(abs)) {
      seen.add(abs);
      links.push(abs);
    }
  });

  const controls = new Set<string>();
  $("input, select, textarea, button, [role=button]").each((_, el) => {
    const node = $(el);
    for (const v of [
      node.attr("name"),
      node.attr("id"),
      node.attr("aria-label"),
      node.is("button, [role=button]") ? node.text() : undefined,
    ]) {
      const c = v ? collapse(v) : "";
      if (c) controls.add(c);
    }
  });

  $(NOISE_SELECTORS).remove();
  const body = $("body");
  const text = collapse(body.length ? body.text() : $.root().text());

  return {
    url: raw.url,
    title,
    text,
    textLength: text.length,
    controls: Array.from(controls),
    structuredDataTypes,
    links,
    htmlBytes: Buffer.byteLength(raw.html, "utf8"),
    scriptCount,
  };
}

/** Signals of a page with nothing on it */
export function emptySignals(url: string): PageSignals {
  return {
    url,
    title: "",
    text: "",
    textLength: 0,
    controls: [],
    structuredDataTypes: [],
    links: [],
    htmlBytes: 0,
    scriptCount: 0,
  };
}

/**
 * Union of two observations of the same page: links and types are merged
 * in first-seen order, the longer text wins.
 */
export function mergeSignals(a: PageSignals, b: PageSignals): PageSignals {
  const richer = b.textLength > a.textLength ? b : a;
  return {
    url: a.url,
    title: a.title || b.title,
    text: richer.text,
    textLength: richer.textLength,
    controls: Array.from(new Set([...a.controls, ...b.controls])),
    structuredDataTypes: Array.from(
      new Set([...a.structuredDataTypes, ...b.structuredDataTypes]),
    ),
    links: Array.from(new Set([...a.links, ...b.links])),
    htmlBytes: Math.max(a.htmlBytes, b.htmlBytes),
    scriptCount: Math.max(a.scriptCount, b.scriptCount),
  };
}
