type Entry<T> = {
  value: T;
  storedAt: number;
};

export type CacheOptions = {
  ttlSeconds: number;
  now?: () => number;
};

export type ReadThroughCache<T> = {
  get: (key: string, load: () => Promise<T>) => Promise<{ value: T; hit: boolean }>;
  invalidate: (key?: string) => void;
  size: () => number;
};

/**
 * Keyed read-through cache with a TTL. A ttl of 0 disables storing.
 * Rejected loads are never stored.
 */
export const createReadThroughCache = <T>({ ttlSeconds, now = Date.now }: CacheOptions): ReadThroughCache<T> => {
  const cache = new Map<string, Entry<T>>();
  const ttlMs = ttlSeconds * 1000;

  const get = async (key: string, load: () => Promise<T>): Promise<{ value: T; hit: boolean }> => {
    const entry = cache.get(key);
    if (entry && now() - entry.storedAt < ttlMs) {
      return { value: entry.value, hit: true };
    }
    cache.delete(key);
    const value = await load();
    if (ttlMs > 0) {
      cache.set(key, { value, storedAt: now() });
    }
    return { value, hit: false };
  };

  const invalidate = (key?: string): void => {
    if (key === undefined) {
      cache.clear();
    } else {
      cache.delete(key);
    }
  };

  return { get, invalidate, size: () => cache.size };
};
