/**
 * Dynamic-mode transport: pooled Playwright pages
 */

import type { Browser, BrowserContext } from "playwright";
import { BROWSER_CONSTANTS, RENDER_CONSTANTS } from "../constants/index";
import { PermanentFetchError, TransientFetchError, errorMessage } from "../errors";
import type { RenderHandle, RenderTransport } from "../types/index";
import { Logger } from "../utils/logger";
import { optimizePage } from "./optimization";
import { PlaywrightRenderHandle } from "./render-handle";
const { default: pLimit } = await import("p-limit");

export interface PlaywrightRendererOptions {
  /** Pages open at once across all domains */
  poolSize: number;
  navigationTimeoutMs?: number;
  userAgent?: string;
}

export class PlaywrightRenderer implements RenderTransport {
  private readonly limit: ReturnType<typeof pLimit>;

  constructor(
    private readonly browser: Browser,
    private readonly options: PlaywrightRendererOptions,
  ) {
    this.limit = pLimit(Math.max(1, options.poolSize));
  }

  /** Pages currently checked out */
  get activeCount(): number {
    return this.limit.activeCount;
  }

  /**
   * Opens `url` in a fresh context holding one pool slot.
   * The slot is released when the returned handle is closed, or here on failure.
   */
  async fetchRendered(url: string): Promise<RenderHandle> {
    const release = await this.acquire();
    let context: BrowserContext | undefined;
    try {
      context = await this.browser.newContext({
        userAgent: this.options.userAgent ?? BROWSER_CONSTANTS.USER_AGENT,
        viewport: BROWSER_CONSTANTS.VIEWPORT,
        locale: "en-US",
      });
      const page = await context.newPage();
      await optimizePage(page);

      const res = await page.goto(url, {
        waitUntil: "domcontentloaded",
        timeout: this.options.navigationTimeoutMs ?? RENDER_CONSTANTS.NAVIGATION_TIMEOUT_MS,
      });
      const status = res?.status() ?? 200;
      if (status === 429 || status >= 500) {
        throw new TransientFetchError(`HTTP ${status}`, url, status);
      }
      if (status >= 400) {
        throw new PermanentFetchError(`HTTP ${status}`, url, status);
      }

      await page
        .waitForLoadState("networkidle", { timeout: RENDER_CONSTANTS.NETWORK_IDLE_TIMEOUT_MS })
        .catch((e: unknown) =>
          Logger.debug(`Network never went idle: ${errorMessage(e)}`, { url }),
        );

      return new PlaywrightRenderHandle(context, page, release);
    } catch (e) {
      await context?.close().catch((closeErr: unknown) =>
        Logger.debug(`Context close failed: ${errorMessage(closeErr)}`, { url }),
      );
      release();
      throw e;
    }
  }

  /** Resolves once a page slot is free; the returned function frees it */
  private acquire(): Promise<() => void> {
    return new Promise((granted) => {
      this.limit(() => new Promise<void>((release) => granted(() => release()))).catch((e: unknown) =>
        Logger.error("Render pool slot failed", e),
      );
    });
  }
}
