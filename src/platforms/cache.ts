/**
 * Expiring caches for platform responses.
 */

import type { ArtistSummary, PlatformClient, PlatformName } from './types';

interface CacheEntry<V> {
  value: V;
  expiresAt: number;
}

/**
 * Map whose entries expire a fixed time after they are stored.
 * Expired entries are dropped when read, and all of them whenever a new
 * entry is stored.
 */
export class TtlCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now
  ) {}

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: V): void {
    const now = this.now();
    this.prune(now);
    this.entries.set(key, { value, expiresAt: now + this.ttlMs });
  }

  private prune(now: number): void {
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
      }
    }
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}

/**
 * Wraps a client so repeated lookups of the same artist are served from
 * memory until they expire. Failed lookups are not cached.
 */
export class CachedPlatformClient implements PlatformClient {
  readonly platform: PlatformName;
  private readonly cache: TtlCache<ArtistSummary>;

  constructor(
    private readonly inner: PlatformClient,
    ttlSeconds: number,
    now?: () => number
  ) {
    this.platform = inner.platform;
    this.cache = new TtlCache(ttlSeconds * 1000, now);
  }

  async fetchArtistProfile(id: string): Promise<ArtistSummary> {
    const cached = this.cache.get(id);
    if (cached) {
      return cached;
    }
    const summary = await this.inner.fetchArtistProfile(id);
    this.cache.set(id, summary);
    return summary;
  }
}
