/**
 * Cache key construction and comparison
 */

import type { CacheKey, CityKey, CoordinateKey } from './types.js';

export function cityKey(city: string): CityKey {
  return { type: 'city', city: normalizeCityName(city) };
}

export function coordinateKey(lat: number, lon: number): CoordinateKey {
  return { type: 'coordinates', lat, lon };
}

/**
 * Lower-case and trim a city name. No transliteration or fuzzy matching:
 * "Moscow" and "moscow " match, "Moskva" does not.
 */
export function normalizeCityName(city: string): string {
  return city.trim().toLowerCase();
}

/**
 * Storage form of a key (city names normalized, coordinates untouched)
 */
export function normalizeKey(key: CacheKey): CacheKey {
  return key.type === 'city' ? cityKey(key.city) : key;
}

/**
 * Structural key equality.
 *
 * Cities compare after normalization; coordinates compare by exact numeric
 * equality, so 55.75 never matches 55.7558.
 */
export function keysMatch(a: CacheKey, b: CacheKey): boolean {
  if (a.type === 'city' && b.type === 'city') {
    return normalizeCityName(a.city) === normalizeCityName(b.city);
  }
  if (a.type === 'coordinates' && b.type === 'coordinates') {
    return a.lat === b.lat && a.lon === b.lon;
  }
  return false;
}

/**
 * Human-readable key for log lines
 */
export function describeKey(key: CacheKey): string {
  return key.type === 'city' ? `city "${key.city}"` : `coordinates (${key.lat}, ${key.lon})`;
}
