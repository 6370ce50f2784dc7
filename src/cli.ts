import "dotenv/config";
import {
  ConfigError,
  CrawlOrchestrator,
  fetchCapability,
  HttpFetcher,
  launchBrowser,
  loadCrawlConfig,
  Logger,
  PlaywrightRenderer,
  ResultsWriter,
  type CrawlConfig,
  type CrawlConfigInput,
} from "./core/index";

const USAGE = `Usage:
tsx src/cli.ts --domains <d1,d2,...> [options]

Options:
  --domains      Seed domains or URLs (comma-separated; or DOMAINS env)
  --out          Output JSON file (default: product_urls.json)
  --max-depth    Link depth below the seed (default: 10)
  --max-urls     Product URLs per domain before stopping (default: 10000)
  --timeout      Seconds per domain (default: 3600)
  --max-retries  Attempts per URL (default: 3)
  --no-dynamic   Never fall back to browser rendering
  --help         Show this help

Examples:
  npm run crawl -- --domains shop.example --max-depth 3
  npm run crawl -- --domains shop.example,store.example --out out/products.json`;

async function main() {
  const argv = process.argv.slice(2);

  const hasFlag = (flag: string) => argv.includes(flag);
  const getArg = (flag: string) => {
    const i = argv.lastIndexOf(flag);
    return i >= 0 ? argv[i + 1] : undefined;
  };
  const getNum = (flag: string) => {
    const v = getArg(flag);
    return v === undefined ? undefined : Number(v);
  };

  if (hasFlag("--help")) {
    Logger.info(USAGE);
    return;
  }

  const overrides: Partial<CrawlConfigInput> = {
    domains: getArg("--domains")
      ?.split(",")
      .map((s) => s.trim())
      .filter(Boolean),
    outputFile: getArg("--out"),
    maxDepth: getNum("--max-depth"),
    maxUrlsPerDomain: getNum("--max-urls"),
    timeoutSeconds: getNum("--timeout"),
    maxRetries: getNum("--max-retries"),
    dynamicRendering: hasFlag("--no-dynamic") ? false : undefined,
  };

  let config: CrawlConfig;
  try {
    config = loadCrawlConfig(overrides);
  } catch (e) {
    if (e instanceof ConfigError) {
      Logger.error(`❌ ${e.message}`);
      Logger.info(USAGE);
      process.exitCode = 1;
      return;
    }
    throw e;
  }

  // static-only crawls never start Chromium
  const browser = config.dynamicRendering
    ? await launchBrowser({ headless: config.headless })
    : null;
  try {
    const http = new HttpFetcher({ timeoutMs: config.requestTimeoutSeconds * 1000 });
    const renderer = browser
      ? new PlaywrightRenderer(browser, {
          poolSize: config.renderPoolSize,
          navigationTimeoutMs: config.requestTimeoutSeconds * 1000,
        })
      : undefined;
    const writer = new ResultsWriter(config.outputFile);
    const orchestrator = new CrawlOrchestrator({
      capability: fetchCapability(http, renderer),
    });

    const report = await orchestrator.runAll(config.domains, config, {
      onDomainComplete: (domain, result) => writer.record(domain, result),
    });

    const total = Object.values(report).reduce((n, r) => n + r.count, 0);
    Logger.info(`✅ Wrote ${total} product URLs to ${config.outputFile}`, {
      count: total,
    });
  } finally {
    await browser?.close();
  }
}

main().catch((e: unknown) => {
  Logger.error("❌ Crawl failed", e);
  process.exit(1);
});
