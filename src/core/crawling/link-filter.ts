/**
 * Decides which outbound links stay in a domain's traversal
 */

import exclusions from "../data/link-exclusions.json";
import { isSameSite } from "../utils/url";

export interface SiteRules {
  /** Excluded when the path equals the prefix or continues below it */
  pathPrefixes: string[];
}

export interface LinkExclusionRules {
  /** Excluded when any path segment equals one of these */
  pathSegments: string[];
  /** Excluded when the path contains one of these */
  pathFragments: string[];
  /** Win over `pathFragments` */
  allowFragments: string[];
  fileExtensions: string[];
  sites: Record<string, SiteRules>;
}

export const DEFAULT_LINK_RULES: LinkExclusionRules = exclusions;

export class LinkFilter {
  private readonly segments: Set<string>;
  private readonly site: SiteRules | undefined;

  constructor(
    private readonly siteDomain: string,
    private readonly rules: LinkExclusionRules = DEFAULT_LINK_RULES,
  ) {
    this.segments = new Set(rules.pathSegments.map((s) => s.toLowerCase()));
    this.site = rules.sites[siteDomain];
  }

  /**
   * @param url - Normalized absolute URL
   * @returns true when the link belongs to the site and may lead to products
   */
  accepts(url: string): boolean {
    if (!isSameSite(url, this.siteDomain)) return false;

    const path = new URL(url).pathname.toLowerCase();
    return !this.excludedPath(path);
  }

  private excludedPath(path: string): boolean {
    if (this.rules.fileExtensions.some((ext) => path.endsWith(ext))) return true;
    if (path.split("/").some((seg) => this.segments.has(seg))) return true;

    const allowed = this.rules.allowFragments.some((f) => path.includes(f));
    if (!allowed && this.rules.pathFragments.some((f) => path.includes(f))) return true;

    return (this.site?.pathPrefixes ?? []).some(
      (p) => path === p || path.startsWith(`${p}/`),
    );
  }
}
