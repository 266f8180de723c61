import type { Logger } from '@aws-lambda-powertools/logger';

export interface SnapshotCacheConfig {
  /** Time-to-live in seconds */
  ttlSeconds: number;
  /** Clock in epoch milliseconds; injectable for tests */
  now?: () => number;
  logger?: Logger;
}

export interface SnapshotCacheEntry<T> {
  data: T;
  fetchedAt: number;
}

export interface SnapshotCacheStats {
  entries: number;
  hits: number;
  misses: number;
  ttlSeconds: number;
}

/**
 * Keeps one loaded value per source identity and serves it until its TTL
 * runs out. A reload replaces the entry in a single assignment; if the reload
 * fails, the error propagates and the previous entry stays as it was.
 * A load still running when its key is invalidated never writes its result.
 */
export class SnapshotCache<T> {
  private entries: Map<string, SnapshotCacheEntry<T>> = new Map();
  private inFlight: Map<string, Promise<T>> = new Map();
  private generations: Map<string, number> = new Map();
  private hits = 0;
  private misses = 0;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly logger?: Logger;

  constructor(config: SnapshotCacheConfig) {
    this.ttlMs = config.ttlSeconds * 1000;
    this.now = config.now ?? Date.now;
    this.logger = config.logger;
  }

  /**
   * Entry for `key` if it is still fresh
   */
  peek(key: string): SnapshotCacheEntry<T> | null {
    const entry = this.entries.get(key);
    if (entry && this.now() - entry.fetchedAt < this.ttlMs) {
      return entry;
    }
    return null;
  }

  /**
   * Return the cached value, or run `loader` and cache its result.
   * Concurrent callers for the same key share one load.
   */
  async getOrLoad(key: string, loader: () => Promise<T>): Promise<T> {
    const fresh = this.peek(key);
    if (fresh) {
      this.hits++;
      this.logger?.debug('Snapshot cache hit', { key, ageMs: this.now() - fresh.fetchedAt });
      return fresh.data;
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      return pending;
    }

    this.misses++;
    const generation = this.generationOf(key);
    const load: Promise<T> = loader()
      .then((data) => {
        if (this.generationOf(key) === generation) {
          this.entries.set(key, { data, fetchedAt: this.now() });
          this.logger?.info('Snapshot cache refreshed', { key, ttlSeconds: this.ttlMs / 1000 });
        } else {
          this.logger?.debug('Discarding snapshot loaded before invalidate', { key });
        }
        return data;
      })
      .finally(() => {
        if (this.inFlight.get(key) === load) {
          this.inFlight.delete(key);
        }
      });

    this.inFlight.set(key, load);
    return load;
  }

  /**
   * Drop the entry for `key` (or every entry) and detach any load in flight,
   * so the next call starts a fresh one.
   */
  invalidate(key?: string): void {
    const keys = key === undefined ? [...new Set([...this.entries.keys(), ...this.inFlight.keys()])] : [key];
    for (const k of keys) {
      this.entries.delete(k);
      this.inFlight.delete(k);
      this.generations.set(k, this.generationOf(k) + 1);
    }
  }

  private generationOf(key: string): number {
    return this.generations.get(key) ?? 0;
  }

  getStats(): SnapshotCacheStats {
    return {
      entries: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      ttlSeconds: this.ttlMs / 1000,
    };
  }
}
