import { describe, expect, it, vi } from "vitest";
import { parseCrawlConfig } from "../../config/index";
import { ConfigError } from "../../errors";
import type { CrawlResult } from "../../types/index";
import { FakeWeb, html } from "../../__tests__/fake-web";
import { CrawlOrchestrator } from "../orchestrator";

const TIMESTAMP = "2026-03-01T12:00:00.000Z";

const product = (name: string) => ({
  body: html({ title: name, text: `${name} Add to cart`, schemaType: "Product", links: ["/"] }),
});

const web = () =>
  new FakeWeb({
    "https://shop.example/": { body: html({ links: ["/product/a", "/product/b"] }) },
    "https://shop.example/product/a": product("A"),
    "https://shop.example/product/b": product("B"),
    "https://store.example/": { status: 503 },
  });

const config = (overrides: Record<string, unknown> = {}) =>
  parseCrawlConfig({
    domains: ["shop.example", "store.example"],
    maxRetries: 2,
    retryDelaySeconds: 0,
    dynamicRendering: false,
    ...overrides,
  });

const orchestrator = (capability: FakeWeb) =>
  new CrawlOrchestrator({
    capability,
    clock: () => new Date(TIMESTAMP),
    sleep: async () => {},
  });

describe("CrawlOrchestrator", () => {
  it("crawls every domain and isolates failures", async () => {
    const cfg = config();

    const report = await orchestrator(web()).runAll(cfg.domains, cfg);

    expect(report).toEqual({
      "shop.example": {
        urls: ["https://shop.example/product/a", "https://shop.example/product/b"],
        count: 2,
        timestamp: TIMESTAMP,
      },
      "store.example": { urls: [], count: 0, timestamp: TIMESTAMP },
    });
  });

  it("reports each domain once as it completes", async () => {
    const cfg = config();
    const seen: Array<[string, CrawlResult]> = [];
    const onDomainComplete = vi.fn((domain: string, result: CrawlResult) => {
      seen.push([domain, result]);
    });

    await orchestrator(web()).runAll(cfg.domains, cfg, { onDomainComplete });

    expect(onDomainComplete).toHaveBeenCalledTimes(2);
    expect(Object.fromEntries(seen)).toEqual({
      "shop.example": expect.objectContaining({ count: 2 }),
      "store.example": expect.objectContaining({ count: 0 }),
    });
  });

  it("keeps going when the completion hook fails", async () => {
    const cfg = config({ maxConcurrentDomains: 1 });

    const report = await orchestrator(web()).runAll(cfg.domains, cfg, {
      onDomainComplete: async () => {
        throw new Error("disk full");
      },
    });

    expect(Object.keys(report)).toEqual(["shop.example", "store.example"]);
  });

  it("crawls a domain listed twice only once", async () => {
    const capability = web();
    const cfg = config();

    const report = await orchestrator(capability).runAll(["shop.example", "shop.example"], cfg);

    expect(Object.keys(report)).toEqual(["shop.example"]);
    expect(capability.callsTo("https://shop.example/")).toBe(1);
  });

  it("rejects unparseable seeds before crawling", async () => {
    const capability = web();

    await expect(
      orchestrator(capability).runAll(["shop.example", "not a domain"], config()),
    ).rejects.toBeInstanceOf(ConfigError);
    expect(capability.staticCalls).toEqual([]);
  });
});
