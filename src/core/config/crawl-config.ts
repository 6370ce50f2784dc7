/**
 * Crawl configuration: schema, defaults and environment loading
 */

import { z } from "zod";
import { ConfigError } from "../errors";
import { toSeedUrl } from "../utils/url";
import { envBool, envInt, envList, envNum, envStr } from "./env";

export const crawlConfigSchema = z
  .object({
    domains: z.array(z.string().trim().min(1)).min(1, "at least one domain is required"),
    maxRetries: z.number().int().positive().default(3),
    retryDelaySeconds: z.number().nonnegative().default(5),
    retryBackoff: z.enum(["fixed", "linear", "exponential"]).default("fixed"),
    scrollTimeoutSeconds: z.number().positive().default(30),
    maxScrollAttempts: z.number().int().positive().default(10),
    dynamicWaitSeconds: z.number().nonnegative().default(5),
    maxDepth: z.number().int().nonnegative().default(10),
    maxUrlsPerDomain: z.number().int().positive().default(10000),
    timeoutSeconds: z.number().positive().default(3600),
    globalTimeoutSeconds: z.number().positive().optional(),
    maxConcurrentDomains: z.number().int().positive().optional(),
    renderPoolSize: z.number().int().positive().default(2),
    requestTimeoutSeconds: z.number().positive().default(30),
    dynamicRendering: z.boolean().default(true),
    headless: z.boolean().default(true),
    outputFile: z.string().min(1).default("product_urls.json"),
  })
  .superRefine((cfg, ctx) => {
    cfg.domains.forEach((d, i) => {
      if (!toSeedUrl(d)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["domains", i],
          message: `unparseable seed domain "${d}"`,
        });
      }
    });
  });

export type CrawlConfig = z.output<typeof crawlConfigSchema>;
export type CrawlConfigInput = z.input<typeof crawlConfigSchema>;

/**
 * Validates raw input and fills defaults
 * @throws ConfigError listing every problem found
 */
export function parseCrawlConfig(input: unknown): CrawlConfig {
  const parsed = crawlConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (i) => `${i.path.join(".") || "config"}: ${i.message}`,
    );
    throw new ConfigError("Invalid crawl configuration", issues);
  }
  return parsed.data;
}

/** Drops undefined entries so schema defaults apply */
function defined(obj: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(obj).filter(([, v]) => v !== undefined),
  );
}

/**
 * Reads crawl settings from the environment
 * @param overrides - Values that win over the environment (e.g. CLI flags)
 */
export function loadCrawlConfig(
  overrides: Partial<CrawlConfigInput> = {},
): CrawlConfig {
  const fromEnv = defined({
    domains: envList("DOMAINS"),
    maxRetries: envInt("MAX_RETRIES"),
    retryDelaySeconds: envNum("RETRY_DELAY_SECONDS"),
    retryBackoff: process.env.RETRY_BACKOFF,
    scrollTimeoutSeconds: envNum("SCROLL_TIMEOUT_SECONDS"),
    maxScrollAttempts: envInt("MAX_SCROLL_ATTEMPTS"),
    dynamicWaitSeconds: envNum("DYNAMIC_WAIT_SECONDS"),
    maxDepth: envInt("MAX_DEPTH"),
    maxUrlsPerDomain: envInt("MAX_URLS_PER_DOMAIN"),
    timeoutSeconds: envNum("TIMEOUT_SECONDS"),
    globalTimeoutSeconds: envNum("GLOBAL_TIMEOUT_SECONDS"),
    maxConcurrentDomains: envInt("MAX_CONCURRENT_DOMAINS"),
    renderPoolSize: envInt("RENDER_POOL_SIZE"),
    requestTimeoutSeconds: envNum("REQUEST_TIMEOUT_SECONDS"),
    dynamicRendering: envBool("DYNAMIC_RENDERING"),
    headless: envBool("HEADLESS"),
    outputFile: envStr("OUTPUT_FILE", "") || undefined,
  });

  return parseCrawlConfig({ ...fromEnv, ...defined(overrides) });
}
