import { describe, expect, it, vi } from "vitest";
import { PermanentFetchError } from "../../errors";
import type { StaticResponse } from "../../types/index";
import { FakeRenderHandle } from "../../__tests__/fake-web";
import { fetchCapability } from "../capability";
import { RetryingFetcher } from "../retrying-fetcher";

const URL_ = "https://shop.example/category/widgets";

const http = () => ({
  fetchStatic: vi.fn(
    async (url: string): Promise<StaticResponse> => ({
      url,
      status: 200,
      body: "<html></html>",
      contentType: "text/html",
      retryAfterMs: null,
    }),
  ),
});

describe("fetchCapability", () => {
  it("delegates both modes when a renderer is present", async () => {
    const handle = new FakeRenderHandle(URL_, ["<html></html>"]);
    const renderer = { fetchRendered: vi.fn(async () => handle) };
    const transport = http();
    const cap = fetchCapability(transport, renderer);

    await cap.fetchStatic(URL_);
    expect(transport.fetchStatic).toHaveBeenCalledWith(URL_);
    await expect(cap.fetchRendered(URL_)).resolves.toBe(handle);
    expect(renderer.fetchRendered).toHaveBeenCalledWith(URL_);
  });

  it("rejects dynamic fetches permanently without a renderer", async () => {
    const transport = http();
    const cap = fetchCapability(transport);

    await expect(cap.fetchStatic(URL_)).resolves.toMatchObject({ url: URL_, status: 200 });
    await expect(cap.fetchRendered(URL_)).rejects.toBeInstanceOf(PermanentFetchError);
    await expect(cap.fetchRendered(URL_)).rejects.toThrow("Dynamic rendering disabled");
  });

  it("spends no retries on a disabled renderer", async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const fetcher = new RetryingFetcher(fetchCapability(http()), {
      maxRetries: 3,
      retryDelayMs: 1000,
      sleep,
    });

    await expect(fetcher.fetch(URL_, "dynamic")).rejects.toBeInstanceOf(PermanentFetchError);
    expect(sleep).not.toHaveBeenCalled();
  });
});
