import { distance } from './geometry';
import type { CacheStats, Vec2 } from './types';

export const DEFAULT_CACHE_ENTRIES = 10_000;
export const MIN_CACHE_CAPACITY = 1_000;
export const MAX_CACHE_CAPACITY = 20_000;

export type DistanceCacheOptions = {
  maxEntries: number;
};

export interface DistanceCache {
  readonly capacity: number;
  readonly size: number;
  distanceBetween(idA: number, posA: Vec2, idB: number, posB: Vec2): number;
  betweenPoints(a: Vec2, b: Vec2): number;
  has(idA: number, idB: number): boolean;
  reset(): void;
  updateCapacity(particleCount: number): number;
  getStats(): CacheStats;
}

/**
 * Order-independent key for a pair of non-negative integer ids: the position of
 * (lo, hi) in the triangular enumeration of pairs, so no two pairs collide.
 */
export function pairKey(idA: number, idB: number): number {
  const lo = Math.min(idA, idB);
  const hi = Math.max(idA, idB);
  return (hi * (hi + 1)) / 2 + lo;
}

export function targetCapacity(particleCount: number): number {
  const pairs = Math.floor((particleCount * (particleCount - 1)) / 2);
  return Math.min(MAX_CACHE_CAPACITY, Math.max(MIN_CACHE_CAPACITY, pairs));
}

/**
 * Pairwise distance memo with a hard entry cap. Eviction is FIFO by insertion:
 * a hit does not refresh an entry. Capacity 0 turns caching off.
 */
export function createDistanceCache(opts: Partial<DistanceCacheOptions> = {}): DistanceCache {
  let maxEntries = Math.max(0, Math.floor(opts.maxEntries ?? DEFAULT_CACHE_ENTRIES));
  let entries = new Map<number, number>();
  let hits = 0;
  let misses = 0;

  const evictOldest = (count: number): void => {
    const keys = entries.keys();
    for (let i = 0; i < count; i += 1) {
      const next = keys.next();
      if (next.done) {
        return;
      }
      entries.delete(next.value);
    }
  };

  return {
    get capacity() {
      return maxEntries;
    },

    get size() {
      return entries.size;
    },

    distanceBetween(idA, posA, idB, posB) {
      const key = pairKey(idA, idB);
      const cached = entries.get(key);
      if (cached !== undefined) {
        hits += 1;
        return cached;
      }

      misses += 1;
      const dist = distance(posA, posB);
      if (maxEntries === 0) {
        return dist;
      }
      if (entries.size >= maxEntries) {
        evictOldest(entries.size - maxEntries + 1);
      }
      entries.set(key, dist);
      return dist;
    },

    betweenPoints(a, b) {
      return distance(a, b);
    },

    has(idA, idB) {
      return entries.has(pairKey(idA, idB));
    },

    reset() {
      entries = new Map<number, number>();
      hits = 0;
      misses = 0;
    },

    updateCapacity(particleCount) {
      const next = targetCapacity(particleCount);
      if (next !== maxEntries) {
        maxEntries = next;
        if (entries.size > maxEntries) {
          evictOldest(entries.size - maxEntries);
        }
      }
      return maxEntries;
    },

    getStats() {
      return {
        size: entries.size,
        capacity: maxEntries,
        hits,
        misses
      };
    }
  };
}
