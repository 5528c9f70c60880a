/**
 * Response Cache Types
 *
 * One cached upstream response per (kind, key). Keys are either a city name
 * (compared case-insensitively) or an exact latitude/longitude pair.
 */

import type { JsonValue, PersistenceResult } from '../types.js';

/**
 * Request categories the weather service caches.
 *
 * `RequestKind` stays an open string so callers can partition the cache for
 * their own request types.
 */
export const RequestKinds = {
  CURRENT_WEATHER: 'current-weather',
  /** Current weather requested by coordinates rather than by city */
  CURRENT_WEATHER_AT_COORDINATES: 'current-weather-by-coordinates',
  FORECAST: 'forecast',
  AIR_QUALITY: 'air-quality',
  GEOCODE: 'geocode',
  REVERSE_GEOCODE: 'reverse-geocode',
} as const;

export type RequestKind = string;

export type CityKey = { type: 'city'; city: string };

export type CoordinateKey = { type: 'coordinates'; lat: number; lon: number };

export type CacheKey = CityKey | CoordinateKey;

export interface CacheEntry {
  kind: RequestKind;
  key: CacheKey;
  /** ISO-8601 timestamp of the upstream fetch */
  fetchedAt: string;
  /** Upstream response body, stored and returned verbatim */
  payload: JsonValue;
}

/**
 * `miss` covers both "never cached" and "cached but older than the TTL".
 * The stale entry is handed back so a caller can fall back to it when the
 * live fetch fails.
 */
export type LookupResult =
  | { status: 'hit'; entry: CacheEntry }
  | { status: 'miss'; stale: CacheEntry | null };

/**
 * Durable whole-document storage of cache entries
 */
export interface RecordStore {
  /**
   * All entries in stored order. Absent or corrupt storage yields [].
   */
  load(): Promise<CacheEntry[]>;

  /**
   * Overwrite the whole collection. Never throws.
   */
  replace(entries: readonly CacheEntry[]): Promise<PersistenceResult>;
}

export interface CacheManagerOptions {
  /** Maximum age in milliseconds for an entry to be served */
  ttlMs: number;
}

export interface CacheStats {
  total: number;
  fresh: number;
  stale: number;
  byKind: Record<RequestKind, number>;
}

/**
 * TTL used when nothing else is configured (3 hours)
 */
export const DEFAULT_CACHE_TTL_MS = 3 * 60 * 60 * 1000;
