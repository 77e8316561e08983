/**
 * Tests for the snippet analysis cache.
 */

import { AnalysisCache, cacheKey, normalizeSnippet } from "../src/cache";
import { makeResult } from "./helpers";

describe("cacheKey", () => {
  it("should be the MD5 hex digest of the snippet", () => {
    expect(cacheKey("print(1)")).toBe("186bdbe41e79ea696410ba0a9e8d2762");
  });

  it("should ignore line-ending style and surrounding whitespace", () => {
    expect(cacheKey("print(1)\r\n")).toBe(cacheKey("print(1)"));
    expect(cacheKey("  print(1)\n\n")).toBe(cacheKey("print(1)"));
    expect(cacheKey("a = 1\r\nb = 2")).toBe(cacheKey("a = 1\nb = 2"));
  });

  it("should distinguish different snippets", () => {
    expect(cacheKey("print(1)")).not.toBe(cacheKey("print(2)"));
  });
});

describe("normalizeSnippet", () => {
  it("should convert CRLF and lone CR to LF and trim", () => {
    expect(normalizeSnippet("  x = 1\r\ny = 2\rz = 3  ")).toBe("x = 1\ny = 2\nz = 3");
  });
});

describe("AnalysisCache", () => {
  it("should return undefined for an unknown key", () => {
    const cache = new AnalysisCache();
    expect(cache.get("missing")).toBeUndefined();
    expect(cache.has("missing")).toBe(false);
  });

  it("should return the same stored result on repeated reads after one put", () => {
    const cache = new AnalysisCache();
    const result = makeResult();
    const key = cache.keyFor("print(1)");

    cache.put(key, result);

    expect(cache.get(key)).toBe(result);
    expect(cache.get(key)).toBe(result);
    expect(cache.get(key)).toBe(result);
    expect(cache.size).toBe(1);
  });

  it("should let the last write win for a key", () => {
    const cache = new AnalysisCache();
    const key = cache.keyFor("print(1)");
    const second = makeResult({ response: "Second explanation" });

    cache.put(key, makeResult());
    cache.put(key, second);

    expect(cache.get(key)).toBe(second);
    expect(cache.size).toBe(1);
  });

  it("should drop everything on clear", () => {
    const cache = new AnalysisCache();
    cache.put("a", makeResult());
    cache.put("b", makeResult());

    cache.clear();

    expect(cache.size).toBe(0);
    expect(cache.get("a")).toBeUndefined();
  });
});
