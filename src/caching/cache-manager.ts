/**
 * Cache Manager
 *
 * TTL-aware lookup and upsert of upstream responses keyed by (kind, key),
 * on top of a whole-document RecordStore.
 *
 * - Freshness is computed lazily at lookup time: fresh iff
 *   `now - fetchedAt < ttlMs`. Nothing is evicted in the background.
 * - Stale entries stay on disk until overwritten (or purgeStale() is called)
 *   and are reported back on a miss for degraded use.
 * - Every load-modify-replace cycle runs under one async-lock key, so two
 *   concurrent upserts for different keys can no longer lose one another.
 * - Store failures never throw: a corrupt store reads as empty, a failed
 *   write comes back as a PersistenceResult.
 */

import AsyncLock from 'async-lock';
import type { JsonValue, PersistenceResult } from '../types.js';
import { describeKey, keysMatch, normalizeKey } from './cache-key.js';
import type {
  CacheEntry,
  CacheKey,
  CacheManagerOptions,
  CacheStats,
  LookupResult,
  RecordStore,
  RequestKind,
} from './types.js';

const STORE_LOCK_KEY = 'record-store';

export class CacheManager {
  private readonly ttlMs: number;
  private readonly lock: AsyncLock;

  constructor(
    private readonly store: RecordStore,
    options: CacheManagerOptions
  ) {
    if (!Number.isFinite(options.ttlMs) || options.ttlMs <= 0) {
      throw new Error('ttlMs must be a positive number');
    }
    this.ttlMs = options.ttlMs;
    this.lock = new AsyncLock();
  }

  get ttl(): number {
    return this.ttlMs;
  }

  /**
   * Find the cached payload for (kind, key).
   *
   * The scan stops at the first structural match whether or not it is fresh.
   * Reads take the same lock as writes so a lookup issued after an upsert
   * observes it.
   */
  async lookup(kind: RequestKind, key: CacheKey): Promise<LookupResult> {
    const entries = await this.lock.acquire(STORE_LOCK_KEY, () => this.store.load());
    const match = entries.find(entry => entry.kind === kind && keysMatch(entry.key, key));

    if (!match) {
      return { status: 'miss', stale: null };
    }

    if (this.isFresh(match, Date.now())) {
      return { status: 'hit', entry: match };
    }

    return { status: 'miss', stale: match };
  }

  /**
   * Insert or replace the entry for (kind, key) with a freshly fetched payload.
   *
   * An existing entry keeps its position. Later duplicates of the same
   * (kind, key), which can only come from hand-edited files, are dropped.
   * `fetchedAt` defaults to now; callers that report the fetch time pass the
   * same instant so a later hit reports it unchanged.
   */
  async upsert(
    kind: RequestKind,
    key: CacheKey,
    payload: JsonValue,
    fetchedAt: Date = new Date()
  ): Promise<PersistenceResult> {
    const fresh: CacheEntry = {
      kind,
      key: normalizeKey(key),
      fetchedAt: fetchedAt.toISOString(),
      payload,
    };

    const result = await this.lock.acquire(STORE_LOCK_KEY, async () => {
      const entries = await this.store.load();
      const next: CacheEntry[] = [];
      let replaced = false;

      for (const entry of entries) {
        if (entry.kind === kind && keysMatch(entry.key, key)) {
          if (!replaced) {
            next.push(fresh);
            replaced = true;
          }
          continue;
        }
        next.push(entry);
      }

      if (!replaced) {
        next.push(fresh);
      }

      return this.store.replace(next);
    });

    if (!result.ok) {
      console.error(`⚠️  Failed to cache ${kind} for ${describeKey(key)}:`, result.error.message);
    }

    return result;
  }

  /**
   * Remove every entry older than the TTL. Returns the number removed.
   */
  async purgeStale(): Promise<number> {
    return this.lock.acquire(STORE_LOCK_KEY, async () => {
      const entries = await this.store.load();
      const now = Date.now();
      const kept = entries.filter(entry => this.isFresh(entry, now));
      const removed = entries.length - kept.length;

      if (removed === 0) {
        return 0;
      }

      const result = await this.store.replace(kept);
      if (!result.ok) {
        console.error('⚠️  Failed to purge stale cache entries:', result.error.message);
        return 0;
      }

      console.error(`🔄 Purged ${removed} stale cache entries`);
      return removed;
    });
  }

  async getStats(): Promise<CacheStats> {
    const entries = await this.lock.acquire(STORE_LOCK_KEY, () => this.store.load());
    const now = Date.now();
    const byKind: Record<RequestKind, number> = {};
    let fresh = 0;

    for (const entry of entries) {
      byKind[entry.kind] = (byKind[entry.kind] ?? 0) + 1;
      if (this.isFresh(entry, now)) {
        fresh++;
      }
    }

    return {
      total: entries.length,
      fresh,
      stale: entries.length - fresh,
      byKind,
    };
  }

  /**
   * Unparseable timestamps compare as NaN and therefore count as stale.
   */
  private isFresh(entry: CacheEntry, now: number): boolean {
    return now - Date.parse(entry.fetchedAt) < this.ttlMs;
  }
}
