import { describe, expect, it } from "vitest";
import { NO_CACHE, cacheFor, isCacheFresh } from "../cache.js";

describe("cache option", () => {
  it("cacheFor 建立啟用中的設定", () => {
    expect(cacheFor(500)).toEqual({ enabled: true, ttl: 500 });
  });

  it("cacheFor 拒絕負數與非有限值", () => {
    expect(() => cacheFor(-1)).toThrow(RangeError);
    expect(() => cacheFor(Number.POSITIVE_INFINITY)).toThrow("cache ttl must be a non-negative number, got Infinity");
  });

  it("cachedAt + ttl 之內（含邊界）算新鮮", () => {
    const option = cacheFor(500);
    expect(isCacheFresh(option, 1000, 1500)).toBe(true);
    expect(isCacheFresh(option, 1000, 1501)).toBe(false);
  });

  it("未啟用或沒有 cachedAt 時一律不新鮮", () => {
    expect(isCacheFresh(NO_CACHE, 1000, 1000)).toBe(false);
    expect(isCacheFresh(cacheFor(500), undefined, 1000)).toBe(false);
  });
});
