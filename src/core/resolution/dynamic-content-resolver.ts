/**
 * DynamicContentResolver: scrolls and expands a rendered page until it settles
 */

import { performance } from "node:perf_hooks";
import { RenderTimeout, errorMessage } from "../errors";
import { emptySignals, extractSignals, mergeSignals } from "../extraction/index";
import type { PageSignals, RawContent, RenderHandle } from "../types/index";
import { Logger } from "../utils/logger";

export type ResolutionReason = "stabilized" | "max-attempts" | "timeout" | "render-error";

export interface ResolutionResult {
  signals: PageSignals;
  reason: ResolutionReason;
  /** Scroll iterations performed */
  iterations: number;
}

export interface DynamicContentResolverOptions {
  maxScrollAttempts: number;
  scrollTimeoutMs: number;
  dynamicWaitMs: number;
  now?: () => number;
  extract?: (raw: RawContent) => PageSignals;
}

export class DynamicContentResolver {
  private readonly now: () => number;
  private readonly extract: (raw: RawContent) => PageSignals;

  constructor(private readonly options: DynamicContentResolverOptions) {
    this.now = options.now ?? (() => performance.now());
    this.extract = options.extract ?? extractSignals;
  }

  /**
   * Drives the page until no new links and no content growth show up between
   * two consecutive iterations, or a limit is hit. Never rejects: a handle
   * failure ends resolution with whatever was observed so far.
   */
  async resolve<A>(handle: RenderHandle<A>): Promise<ResolutionResult> {
    const { maxScrollAttempts, scrollTimeoutMs, dynamicWaitMs } = this.options;
    const started = this.now();
    let best = emptySignals(handle.url);
    let iterations = 0;

    const finish = (reason: ResolutionReason): ResolutionResult => {
      Logger.renderResolved(handle.url, reason, iterations, best.links.length);
      return { signals: best, reason, iterations };
    };

    try {
      let previous = this.extract(await handle.extractContent());
      best = previous;

      while (iterations < maxScrollAttempts) {
        if (this.now() - started >= scrollTimeoutMs) {
          return finish("timeout");
        }
        iterations++;

        const affordance = await handle.findLoadMoreAffordance();
        if (affordance !== null) {
          await handle.click(affordance);
        }
        await handle.scrollToBottom();
        await handle.waitMillis(dynamicWaitMs);

        const current = this.extract(await handle.extractContent());
        best = mergeSignals(best, current);

        const known = new Set(previous.links);
        const newLinks = current.links.filter((l) => !known.has(l)).length;
        const grew = current.textLength > previous.textLength;
        if (newLinks === 0 && !grew) {
          return finish("stabilized");
        }
        previous = current;
      }
      return finish("max-attempts");
    } catch (e) {
      if (e instanceof RenderTimeout) {
        return finish("timeout");
      }
      Logger.warn(`Dynamic resolution interrupted: ${errorMessage(e)}`, {
        url: handle.url,
        iterations,
      });
      return finish("render-error");
    }
  }
}
