/**
 * Browser optimization utilities
 */

import type { Page } from "playwright";
import { errorMessage } from "../errors";
import { Logger } from "../utils/logger";

// Stylesheets stay: layout decides whether lazy lists and load-more buttons show up
const BLOCKED_RESOURCES = new Set(["image", "font", "media"]);

/**
 * Blocks heavy resources that never carry links or product evidence
 * @param page - Playwright page instance to optimize
 */
export async function optimizePage(page: Page): Promise<void> {
  await page.route("**/*", async (route) => {
    const t = route.request().resourceType();
    try {
      if (BLOCKED_RESOURCES.has(t)) {
        await route.abort();
      } else {
        await route.continue();
      }
    } catch (e) {
      // page closed while the request was in flight
      Logger.debug(`Route handling skipped: ${errorMessage(e)}`, { url: route.request().url() });
    }
  });
}
