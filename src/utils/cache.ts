import { LRUCache } from "lru-cache";

const clearers = new Set<() => void>();

/**
 * Memoizes an async query for `ttlSeconds`, keyed by `key(...args)`.
 */
export const cacheQuery = <A extends unknown[], T extends {}>(
  ttlSeconds: number,
  key: (...args: A) => string,
  fn: (...args: A) => Promise<T>
) => {
  const cache = new LRUCache<string, T>({ max: 100, ttl: ttlSeconds * 1000 });
  clearers.add(() => cache.clear());

  return async (...args: A): Promise<T> => {
    const cacheKey = key(...args);
    const hit = cache.get(cacheKey);
    if (hit !== undefined) return hit;

    const value = await fn(...args);
    cache.set(cacheKey, value);
    return value;
  };
};

export const clearQueryCaches = () => {
  clearers.forEach((clear) => clear());
};
