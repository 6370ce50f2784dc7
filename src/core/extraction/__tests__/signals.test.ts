import { describe, expect, it } from "vitest";
import { emptySignals, extractSignals, mergeSignals } from "../signals";

const PRODUCT_PAGE = `<!doctype html>
<html>
  <head>
    <title> Blue   Widget </title>
    <script type="application/ld+json">
      {"@context": "https://schema.org", "@type": "Product", "name": "Blue Widget",
       "offers": {"@type": "Offer", "price": "19.99"}}
    </script>
  </head>
  <body>
    <nav><a href="/c/shoes">Shoes</a></nav>
    <h1>Blue Widget</h1>
    <p>Price: $19.99</p>
    <label>Qty <input name="quantity" type="number"></label>
    <button id="add">Add to cart</button>
    <a href="/product/red-widget?utm_source=mail">Red</a>
    <a href="/product/red-widget">Red again</a>
    <a href="#reviews">Reviews</a>
    <a href="mailto:sales@shop.example">Mail us</a>
    <script>window.dataLayer = [];</script>
  </body>
</html>`;

describe("extractSignals", () => {
  const signals = extractSignals({
    url: "https://shop.example/product/blue-widget",
    html: PRODUCT_PAGE,
  });

  it("collects normalized, deduplicated links including navigation", () => {
    expect(signals.links).toEqual([
      "https://shop.example/c/shoes",
      "https://shop.example/product/red-widget",
    ]);
  });

  it("reads top-level structured-data types only", () => {
    expect(signals.structuredDataTypes).toEqual(["Product"]);
  });

  it("collects control names and button labels", () => {
    expect(signals.controls).toEqual(["quantity", "add", "Add to cart"]);
  });

  it("keeps visible text without navigation or scripts", () => {
    expect(signals.title).toBe("Blue Widget");
    expect(signals.text).toContain("Price: $19.99");
    expect(signals.text).not.toContain("Shoes");
    expect(signals.text).not.toContain("dataLayer");
    expect(signals.textLength).toBe(signals.text.length);
  });

  it("measures page weight", () => {
    expect(signals.scriptCount).toBe(2);
    expect(signals.htmlBytes).toBe(Buffer.byteLength(PRODUCT_PAGE, "utf8"));
  });

  it("resolves links against <base href>", () => {
    const s = extractSignals({
      url: "https://shop.example/a/b",
      html: '<html><head><base href="https://shop.example/catalog/"></head><body><a href="p/1">x</a></body></html>',
    });
    expect(s.links).toEqual(["https://shop.example/catalog/p/1"]);
  });

  it("keeps the directory of a page served with a trailing slash", () => {
    const s = extractSignals({
      url: "https://shop.example/widgets/",
      html: '<a href="w-1">x</a><a href="../about">y</a>',
    });
    expect(s.links).toEqual([
      "https://shop.example/widgets/w-1",
      "https://shop.example/about",
    ]);
  });

  it("falls back to the page URL when <base href> cannot be parsed", () => {
    const s = extractSignals({
      url: "https://shop.example/catalog/",
      html: '<head><base href="http://[bad"></head><a href="p/2">x</a>',
    });
    expect(s.links).toEqual(["https://shop.example/catalog/p/2"]);
  });
});

describe("mergeSignals", () => {
  it("unions links and types and keeps the longer text", () => {
    const a = {
      ...emptySignals("https://shop.example/c"),
      text: "short",
      textLength: 5,
      links: ["https://shop.example/1"],
      structuredDataTypes: ["ItemList"],
      htmlBytes: 100,
    };
    const b = {
      ...emptySignals("https://shop.example/c"),
      text: "much longer",
      textLength: 11,
      links: ["https://shop.example/1", "https://shop.example/2"],
      structuredDataTypes: ["Product"],
      htmlBytes: 50,
    };
    const merged = mergeSignals(a, b);
    expect(merged.links).toEqual(["https://shop.example/1", "https://shop.example/2"]);
    expect(merged.structuredDataTypes).toEqual(["ItemList", "Product"]);
    expect(merged.text).toBe("much longer");
    expect(merged.htmlBytes).toBe(100);
  });
});
