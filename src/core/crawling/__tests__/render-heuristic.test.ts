import { describe, expect, it } from "vitest";
import { looksUnderRendered } from "../render-heuristic";

describe("looksUnderRendered", () => {
  it("flags pages without links", () => {
    expect(looksUnderRendered(0, 300)).toBe(true);
  });

  it("trusts small pages that have links", () => {
    expect(looksUnderRendered(1, 2047)).toBe(false);
  });

  it("compares link density with page weight", () => {
    // 20 KiB: 2 links is the boundary
    expect(looksUnderRendered(1, 20_480)).toBe(true);
    expect(looksUnderRendered(2, 20_480)).toBe(false);
  });

  it("takes custom thresholds", () => {
    expect(looksUnderRendered(5, 4096, { minPageBytes: 1024, minLinksPerKb: 2 })).toBe(true);
  });
});
