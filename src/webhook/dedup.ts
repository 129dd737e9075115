const DEFAULT_MAX_AGE_MS = 24 * 60 * 60 * 1000; // 24 hours
const CLEANUP_EVERY = 1000;

export interface Deduplicator {
  isDuplicate(deliveryId: string): boolean;
}

/**
 * Creates a delivery ID deduplicator backed by a Map.
 * Tracks delivery IDs with timestamps; every 1000 inserts, entries older
 * than maxAgeMs are evicted to bound memory.
 *
 * A redelivered webhook is only suppressed within the window, so GitHub's
 * manual "Redeliver" after a day still goes through.
 */
export function createDeduplicator(
  options: { maxAgeMs?: number; now?: () => number } = {},
): Deduplicator {
  const maxAgeMs = options.maxAgeMs ?? DEFAULT_MAX_AGE_MS;
  const clock = options.now ?? Date.now;
  const seen = new Map<string, number>();
  let insertCount = 0;

  function evictExpired(): void {
    const cutoff = clock() - maxAgeMs;
    for (const [id, ts] of seen) {
      if (ts < cutoff) {
        seen.delete(id);
      }
    }
  }

  return {
    isDuplicate(deliveryId: string): boolean {
      const seenAt = seen.get(deliveryId);
      if (seenAt !== undefined && clock() - seenAt <= maxAgeMs) {
        return true;
      }

      seen.set(deliveryId, clock());
      insertCount++;

      if (insertCount % CLEANUP_EVERY === 0) {
        evictExpired();
      }

      return false;
    },
  };
}
