import * as cheerio from "cheerio";
import { describe, expect, it } from "vitest";
import {
  collectStructuredDataTypes,
  normalizeSchemaType,
  parseJsonLdBlocks,
} from "../structured-data";

describe("parseJsonLdBlocks", () => {
  it("lifts @graph members and flattens arrays", () => {
    const nodes = parseJsonLdBlocks([
      JSON.stringify({ "@graph": [{ "@type": "WebPage" }, { "@type": "Product" }] }),
      JSON.stringify([{ "@type": "Organization" }, 42]),
    ]);
    expect(nodes.map((n) => n["@type"])).toEqual(["WebPage", "Product", "Organization"]);
  });

  it("skips blocks that are not valid JSON", () => {
    expect(parseJsonLdBlocks(['{"@type": "Product",}', "   "])).toEqual([]);
  });
});

describe("normalizeSchemaType", () => {
  it.each([
    ["https://schema.org/Product", "Product"],
    ["http://schema.org/ProductGroup", "ProductGroup"],
    ["schema:Product", "Product"],
    [" Product ", "Product"],
  ])("%s -> %s", (raw, expected) => {
    expect(normalizeSchemaType(raw)).toBe(expected);
  });
});

describe("collectStructuredDataTypes", () => {
  it("ignores products nested inside a listing", () => {
    const $ = cheerio.load(`<script type="application/ld+json">
      {"@type": "ItemList", "itemListElement": [{"@type": "Product", "name": "A"}]}
    </script>`);
    expect(collectStructuredDataTypes($)).toEqual(["ItemList"]);
  });

  it("reads microdata item types that are not properties of another item", () => {
    const $ = cheerio.load(`
      <div itemscope itemtype="https://schema.org/Product">
        <div itemprop="offers" itemscope itemtype="https://schema.org/Offer"></div>
      </div>`);
    expect(collectStructuredDataTypes($)).toEqual(["Product"]);
  });

  it("accepts multiple declared types", () => {
    const $ = cheerio.load(
      `<script type="application/ld+json">{"@type": ["Product", "Thing"]}</script>`,
    );
    expect(collectStructuredDataTypes($)).toEqual(["Product", "Thing"]);
  });
});
