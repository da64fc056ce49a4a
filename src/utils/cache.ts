/**
 * In-process TTL cache
 *
 * One instance is created at startup and handed to the services that need it.
 * Entries expire purely by TTL and are dropped lazily on the next lookup;
 * there is no size bound or explicit invalidation.
 */

import { CATEGORY_TTL, type CacheCategory } from './constants';
import log from './logger';

interface CacheEntry {
  value: unknown;
  category: CacheCategory;
  storedAt: number;
}

export class CacheStore {
  private readonly entries = new Map<string, CacheEntry>();

  constructor(private readonly ttlSeconds: Record<CacheCategory, number> = CATEGORY_TTL) {}

  get<T>(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      log.cache('miss', key);
      return undefined;
    }

    const now = Date.now();
    if (this.isExpired(entry, now)) {
      this.entries.delete(key);
      log.cache('expire', key, { category: entry.category, age_ms: now - entry.storedAt });
      return undefined;
    }

    log.cache('hit', key, { category: entry.category });
    return entry.value as T;
  }

  set<T>(key: string, value: T, category: CacheCategory): void {
    this.entries.set(key, { value, category, storedAt: Date.now() });
    log.cache('set', key, { category });
  }

  /**
   * Number of entries still within their TTL
   */
  size(): number {
    const now = Date.now();
    let live = 0;
    for (const entry of this.entries.values()) {
      if (!this.isExpired(entry, now)) live++;
    }
    return live;
  }

  clear(): void {
    this.entries.clear();
  }

  private isExpired(entry: CacheEntry, now: number): boolean {
    return now - entry.storedAt > this.ttlSeconds[entry.category] * 1000;
  }
}
