/**
 * Browser launching and configuration
 */

import { type Browser, chromium } from "playwright";

export interface LaunchOptions {
  headless: boolean;
}

/**
 * Launches a Chromium instance shared by every render slot
 * @returns Promise resolving to the browser instance
 */
export async function launchBrowser(options: LaunchOptions): Promise<Browser> {
  return await chromium.launch({
    headless: options.headless,
    args: ["--disable-dev-shm-usage", "--no-sandbox"],
  });
}
