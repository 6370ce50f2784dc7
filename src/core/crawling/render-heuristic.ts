import { RENDER_CONSTANTS } from "../constants/index";

export interface RenderThresholds {
  minPageBytes: number;
  minLinksPerKb: number;
}

export const DEFAULT_RENDER_THRESHOLDS: RenderThresholds = {
  minPageBytes: RENDER_CONSTANTS.MIN_PAGE_BYTES,
  minLinksPerKb: RENDER_CONSTANTS.MIN_LINKS_PER_KB,
};

/**
 * Whether a statically fetched page likely builds its content in the browser:
 * no links at all, or a sizeable document carrying too few links for its weight
 */
export function looksUnderRendered(
  linkCount: number,
  pageBytes: number,
  thresholds: RenderThresholds = DEFAULT_RENDER_THRESHOLDS,
): boolean {
  if (linkCount === 0) return true;
  if (pageBytes < thresholds.minPageBytes) return false;
  return linkCount / (pageBytes / 1024) < thresholds.minLinksPerKb;
}
