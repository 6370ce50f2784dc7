/**
 * RenderHandle over a Playwright page
 */

import { type BrowserContext, errors, type Locator, type Page } from "playwright";
import { LOAD_MORE_PATTERNS, RENDER_CONSTANTS } from "../constants/index";
import { RenderTimeout } from "../errors";
import type { RawContent, RenderHandle } from "../types/index";

const escapeRegExp = (s: string): string => s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const LOAD_MORE_TEXT = new RegExp(
  `^\\s*(?:${LOAD_MORE_PATTERNS.map(escapeRegExp).join("|")})\\b`,
  "i",
);

export class PlaywrightRenderHandle implements RenderHandle<Locator> {
  private closed = false;

  constructor(
    private readonly context: BrowserContext,
    private readonly page: Page,
    private readonly release: () => void,
  ) {}

  get url(): string {
    return this.page.url();
  }

  async scrollToBottom(): Promise<void> {
    await this.guard("scroll", () =>
      this.page.evaluate("window.scrollTo(0, document.documentElement.scrollHeight)"),
    );
  }

  async waitMillis(ms: number): Promise<void> {
    await this.page.waitForTimeout(ms);
  }

  async extractContent(): Promise<RawContent> {
    const html = await this.guard("extract", () => this.page.content());
    return { url: this.page.url(), html };
  }

  async findLoadMoreAffordance(): Promise<Locator | null> {
    const candidate = this.page
      .locator("button, a, [role=button]")
      .filter({ hasText: LOAD_MORE_TEXT })
      .first();
    const visible = await candidate
      .isVisible({ timeout: RENDER_CONSTANTS.AFFORDANCE_PROBE_TIMEOUT_MS })
      .catch(() => false);
    return visible ? candidate : null;
  }

  async click(affordance: Locator): Promise<void> {
    // a button that detaches mid-click has usually done its job
    await affordance
      .click({ timeout: RENDER_CONSTANTS.CLICK_TIMEOUT_MS })
      .catch((e: unknown) => {
        if (!(e instanceof errors.TimeoutError)) throw e;
      });
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    try {
      await this.context.close();
    } finally {
      this.release();
    }
  }

  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (e) {
      if (e instanceof errors.TimeoutError) {
        throw new RenderTimeout(this.page.url(), operation, { cause: e });
      }
      throw e;
    }
  }
}
