/**
 * JSON output of crawl results, keyed by domain
 */

import fs from "node:fs";
import path from "node:path";
import type { CrawlReport, CrawlResult } from "../types/index";
import { Logger } from "../utils/logger";

export class ResultsWriter {
  private readonly report: CrawlReport = {};
  private pending: Promise<void> = Promise.resolve();

  constructor(readonly filePath: string) {}

  /**
   * Adds one domain's result and rewrites the file.
   * Writes are serialized, so concurrent callers never interleave.
   */
  record(domain: string, result: CrawlResult): Promise<void> {
    this.report[domain] = result;
    const write = this.pending.then(() => this.flush());
    // keep the chain alive for later writes; the caller still sees this failure
    this.pending = write.catch((e: unknown) =>
      Logger.error(`Could not write ${this.filePath}`, e),
    );
    return write;
  }

  /** Everything recorded so far */
  snapshot(): CrawlReport {
    return { ...this.report };
  }

  private async flush(): Promise<void> {
    const dir = path.dirname(this.filePath);
    await fs.promises.mkdir(dir, { recursive: true });
    const tmp = path.join(dir, `.${path.basename(this.filePath)}.${process.pid}.tmp`);
    await fs.promises.writeFile(tmp, JSON.stringify(this.report, null, 2) + "\n", "utf8");
    await fs.promises.rename(tmp, this.filePath);
    Logger.debug(`Results written to ${this.filePath}`, { count: Object.keys(this.report).length });
  }
}
