/**
 * Controller 自己生命週期內的快取，不是 storage / memory cache。
 * ttl 單位為毫秒。
 */
export interface CacheOption {
  enabled: boolean;
  ttl: number;
}

export const NO_CACHE: CacheOption = Object.freeze({ enabled: false, ttl: 0 });

export function cacheFor(ttl: number): CacheOption {
  if (!Number.isFinite(ttl) || ttl < 0) {
    throw new RangeError(`cache ttl must be a non-negative number, got ${ttl}`);
  }
  return { enabled: true, ttl };
}

/** cachedAt + ttl 之後（不含）才算過期 */
export function isCacheFresh(option: CacheOption, cachedAt: number | undefined, now = Date.now()) {
  if (!option.enabled || cachedAt === undefined) return false;
  return now <= cachedAt + option.ttl;
}
