export interface InMemoryCacheOptions {
  maxSize: number;
  ttlMs: number;
  now?: () => number;
}

export interface InMemoryCache<K, V> {
  get(key: K): V | undefined;
  set(key: K, value: V): void;
  delete(key: K): boolean;
  /**
   * Return the cached value or run `loader` once for the key. Concurrent
   * callers for the same missing key share one in-flight load; a rejected
   * load is not cached.
   */
  getOrLoad(key: K, loader: () => Promise<V>): Promise<V>;
  size(): number;
  clear(): void;
}

interface CacheEntry<V> {
  value: V;
  expiresAt: number;
}

export function createInMemoryCache<K, V>(options: InMemoryCacheOptions): InMemoryCache<K, V> {
  const { maxSize, ttlMs } = options;
  const clock = options.now ?? Date.now;
  const store = new Map<K, CacheEntry<V>>();
  const inFlight = new Map<K, Promise<V>>();

  function isExpired(entry: CacheEntry<V>): boolean {
    return clock() >= entry.expiresAt;
  }

  function evictExpired(): void {
    for (const [key, entry] of store) {
      if (isExpired(entry)) {
        store.delete(key);
      }
    }
  }

  function get(key: K): V | undefined {
    const entry = store.get(key);
    if (!entry) return undefined;
    if (isExpired(entry)) {
      store.delete(key);
      return undefined;
    }
    return entry.value;
  }

  function set(key: K, value: V): void {
    // Re-insertion moves the key to the end of Map iteration order
    store.delete(key);
    evictExpired();

    // Map iteration order is insertion order, so the first keys are the oldest
    while (store.size >= maxSize) {
      const oldest = store.keys().next();
      if (oldest.done) break;
      store.delete(oldest.value);
    }

    store.set(key, { value, expiresAt: clock() + ttlMs });
  }

  return {
    get,
    set,

    delete(key: K): boolean {
      return store.delete(key);
    },

    async getOrLoad(key: K, loader: () => Promise<V>): Promise<V> {
      const entry = store.get(key);
      if (entry && !isExpired(entry)) {
        return entry.value;
      }

      const pending = inFlight.get(key);
      if (pending) return pending;

      const load = loader()
        .then((value) => {
          set(key, value);
          return value;
        })
        .finally(() => {
          inFlight.delete(key);
        });
      inFlight.set(key, load);
      return load;
    },

    size(): number {
      evictExpired();
      return store.size;
    },

    clear(): void {
      store.clear();
    },
  };
}
