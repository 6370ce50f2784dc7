import { describe, expect, it, vi } from "vitest";
import { FetchExhausted, PermanentFetchError, TransientFetchError } from "../../errors";
import type { FetchCapability, RenderHandle, StaticResponse } from "../../types/index";
import { FakeRenderHandle } from "../../__tests__/fake-web";
import { parseRetryAfter } from "../http-fetcher";
import { RetryingFetcher } from "../retrying-fetcher";

const URL_ = "https://shop.example/product/p1";

const response = (status: number, extra: Partial<StaticResponse> = {}): StaticResponse => ({
  url: URL_,
  status,
  body: "<html></html>",
  contentType: "text/html",
  retryAfterMs: null,
  ...extra,
});

function capability(statics: Array<StaticResponse | Error>, renders: Array<RenderHandle | Error> = []) {
  const fetchStatic = vi.fn(async (_url: string) => {
    const next = statics.length > 1 ? statics.shift() : statics[0];
    if (!next) throw new Error("no response scripted");
    if (next instanceof Error) throw next;
    return next;
  });
  const fetchRendered = vi.fn(async (_url: string) => {
    const next = renders.length > 1 ? renders.shift() : renders[0];
    if (!next) throw new Error("no handle scripted");
    if (next instanceof Error) throw next;
    return next;
  });
  const cap: FetchCapability = { fetchStatic, fetchRendered };
  return { cap, fetchStatic, fetchRendered };
}

const sleeper = () => vi.fn(async (_ms: number) => {});

describe("RetryingFetcher", () => {
  it("gives up after exactly maxRetries attempts on transient failures", async () => {
    const { cap, fetchStatic } = capability([response(503)]);
    const sleep = sleeper();
    const fetcher = new RetryingFetcher(cap, { maxRetries: 3, retryDelayMs: 10, sleep });

    const err = await fetcher.fetch(URL_, "static").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(FetchExhausted);
    expect(err).toMatchObject({ attempts: 3, url: URL_ });
    if (err instanceof FetchExhausted) {
      expect(err.lastError).toBeInstanceOf(TransientFetchError);
      expect(err.lastError.status).toBe(503);
    }
    expect(fetchStatic).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[10], [10]]);
  });

  it("fails fast on client errors", async () => {
    const { cap, fetchStatic } = capability([response(404)]);
    const sleep = sleeper();
    const fetcher = new RetryingFetcher(cap, { maxRetries: 3, retryDelayMs: 10, sleep });

    await expect(fetcher.fetch(URL_, "static")).rejects.toMatchObject({
      name: "PermanentFetchError",
      status: 404,
    });
    expect(fetchStatic).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("retries 429 and waits as long as Retry-After asks", async () => {
    const { cap, fetchStatic } = capability([response(429, { retryAfterMs: 2000 }), response(200)]);
    const sleep = sleeper();
    const fetcher = new RetryingFetcher(cap, { maxRetries: 3, retryDelayMs: 10, sleep });

    const res = await fetcher.fetch(URL_, "static");

    expect(res.status).toBe(200);
    expect(fetchStatic).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(2000);
  });

  it("caps Retry-After at one minute", async () => {
    const { cap } = capability([response(503, { retryAfterMs: 3_600_000 }), response(200)]);
    const sleep = sleeper();
    const fetcher = new RetryingFetcher(cap, { maxRetries: 2, retryDelayMs: 10, sleep });

    await fetcher.fetch(URL_, "static");
    expect(sleep).toHaveBeenCalledWith(60_000);
  });

  it("treats network errors as transient", async () => {
    const { cap, fetchStatic } = capability([new TypeError("fetch failed"), response(200)]);
    const fetcher = new RetryingFetcher(cap, { maxRetries: 3, retryDelayMs: 0, sleep: sleeper() });

    await expect(fetcher.fetch(URL_, "static")).resolves.toMatchObject({ status: 200 });
    expect(fetchStatic).toHaveBeenCalledTimes(2);
  });

  it("rejects malformed URLs without calling the transport", async () => {
    const { cap, fetchStatic } = capability([response(200)]);
    const fetcher = new RetryingFetcher(cap, { maxRetries: 3, retryDelayMs: 0, sleep: sleeper() });

    await expect(fetcher.fetch("not a url", "static")).rejects.toBeInstanceOf(PermanentFetchError);
    await expect(fetcher.fetch("ftp://shop.example/file", "static")).rejects.toBeInstanceOf(
      PermanentFetchError,
    );
    expect(fetchStatic).not.toHaveBeenCalled();
  });

  it("grows the delay exponentially when asked to", async () => {
    const { cap } = capability([response(500)]);
    const sleep = sleeper();
    const fetcher = new RetryingFetcher(cap, {
      maxRetries: 4,
      retryDelayMs: 100,
      backoff: "exponential",
      sleep,
    });

    await expect(fetcher.fetch(URL_, "static")).rejects.toBeInstanceOf(FetchExhausted);
    expect(sleep.mock.calls).toEqual([[100], [200], [400]]);
  });

  it("retries render-driver failures in dynamic mode", async () => {
    const handle = new FakeRenderHandle(URL_, ["<html></html>"]);
    const { cap, fetchRendered } = capability([], [new Error("browser crashed"), handle]);
    const fetcher = new RetryingFetcher(cap, { maxRetries: 2, retryDelayMs: 0, sleep: sleeper() });

    await expect(fetcher.fetch(URL_, "dynamic")).resolves.toBe(handle);
    expect(fetchRendered).toHaveBeenCalledTimes(2);
  });
});

describe("parseRetryAfter", () => {
  it("reads delta seconds and HTTP dates", () => {
    const now = Date.parse("2026-01-01T00:00:00Z");
    expect(parseRetryAfter("3", now)).toBe(3000);
    expect(parseRetryAfter("Thu, 01 Jan 2026 00:00:10 GMT", now)).toBe(10_000);
    expect(parseRetryAfter(null, now)).toBeNull();
    expect(parseRetryAfter("soon", now)).toBeNull();
  });
});
