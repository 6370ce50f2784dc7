/**
 * URL manipulation utilities
 */

import { get as getPublicSuffixDomain } from "psl";

/**
 * Query parameters that only carry marketing/analytics state.
 * Anything starting with `utm_` is dropped as well.
 */
const TRACKING_PARAMS = new Set([
  "fbclid",
  "gclid",
  "dclid",
  "msclkid",
  "mc_cid",
  "mc_eid",
  "_ga",
  "ref",
  "ref_",
  "spm",
]);

const isTrackingParam = (key: string): boolean =>
  key.toLowerCase().startsWith("utm_") || TRACKING_PARAMS.has(key.toLowerCase());

/**
 * Normalizes a URL into the key used for deduplication
 * @param raw - Absolute URL, or a relative one when `base` is given
 * @param base - Page URL to resolve relative links against
 * @returns Normalized absolute URL, or null for unparseable and non-http(s) input
 */
export function normalizeUrl(raw: string, base?: string): string | null {
  let u: URL;
  try {
    u = base ? new URL(raw.trim(), base) : new URL(raw.trim());
  } catch {
    return null;
  }
  if (u.protocol !== "http:" && u.protocol !== "https:") return null;

  u.hash = "";

  const kept = [...u.searchParams.entries()].filter(([k]) => !isTrackingParam(k));
  kept.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  u.search = "";
  for (const [k, v] of kept) u.searchParams.append(k, v);

  if (u.pathname.length > 1 && u.pathname.endsWith("/")) {
    u.pathname = u.pathname.replace(/\/+$/, "") || "/";
  }

  return u.toString();
}

/**
 * Turns a configured domain ("shop.example" or "https://shop.example/start")
 * into the crawl's seed URL
 * @returns Normalized seed URL, or null when it cannot be parsed
 */
export function toSeedUrl(domain: string): string | null {
  const trimmed = domain.trim();
  if (!trimmed) return null;
  const withScheme = /^[a-z][a-z\d+.-]*:\/\//i.test(trimmed)
    ? trimmed
    : `https://${trimmed}`;
  const normalized = normalizeUrl(withScheme);
  if (!normalized) return null;
  const host = new URL(normalized).hostname;
  return host.includes(".") || host === "localhost" ? normalized : null;
}

/**
 * Registrable domain (eTLD+1) of a host, e.g. "www.shop.co.uk" -> "shop.co.uk".
 * Falls back to the lower-cased host for IPs and single-label hosts.
 */
export function registrableDomain(host: string): string {
  const h = host.toLowerCase().replace(/\.$/, "");
  return getPublicSuffixDomain(h) ?? h;
}

/** Host of a URL string, or null when it cannot be parsed */
export function hostOf(url: string): string | null {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return null;
  }
}

/**
 * Checks that a URL stays inside the registrable domain of the crawl
 * @param url - Absolute URL to test
 * @param siteDomain - Registrable domain of the seed
 */
export function isSameSite(url: string, siteDomain: string): boolean {
  const host = hostOf(url);
  if (!host) return false;
  return registrableDomain(host) === siteDomain;
}
