/**
 * Weather Service
 *
 * Orchestrates every upstream request through the response cache:
 *
 *   lookup(kind, key) ─ hit ──────────────────────────────► cached data
 *        │ miss
 *        ▼
 *   fetch upstream ─ ok ─► upsert(kind, canonical key) ───► fresh data
 *        │ failure
 *        ▼
 *   stale entry (if allowed) ─────────────────────────────► stale data
 *        │ none
 *        ▼
 *   { ok: false, error }
 *
 * A failed cache write never hides fresh data from the caller.
 */

import type { z } from 'zod';
import { CacheManager } from '../caching/cache-manager.js';
import { cityKey, coordinateKey, describeKey } from '../caching/cache-key.js';
import { RequestKinds, type CacheKey, type RequestKind } from '../caching/types.js';
import { WeatherApiError } from '../errors.js';
import { ErrorType, type JsonValue } from '../types.js';
import { normalizeError } from '../utils.js';
import type { WeatherApi } from './openweather-client.js';
import {
  AirQualitySchema,
  CurrentWeatherSchema,
  ForecastSchema,
  GeocodingSchema,
  type AirQuality,
  type CurrentWeather,
  type Forecast,
  type GeocodedPlace,
  type Geocoding,
} from './schemas.js';

/** Where a successful result came from */
export type WeatherSource = 'cache' | 'upstream' | 'stale';

export type WeatherResult<T> =
  | { ok: true; data: T; source: WeatherSource; fetchedAt: string }
  | { ok: false; error: WeatherApiError };

export interface ExtendedWeather {
  current: CurrentWeather;
  /** null when air quality could not be fetched */
  airQuality: AirQuality | null;
}

export interface CityComparison {
  first: CurrentWeather;
  second: CurrentWeather;
}

export interface WeatherServiceOptions {
  /** Serve an expired cache entry when the upstream call fails (default: true) */
  serveStale?: boolean;
}

interface CachedRequest<T> {
  kind: RequestKind;
  key: CacheKey;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  fetch: () => Promise<JsonValue>;
  /** Upstream-confirmed key to store the response under */
  canonicalKey?: (data: T) => CacheKey | null;
}

const SOURCE_RANK: Record<WeatherSource, number> = { cache: 0, upstream: 1, stale: 2 };

function canonicalCity(name: string): CacheKey | null {
  return name.trim().length > 0 ? cityKey(name) : null;
}

function toWeatherApiError(error: unknown): WeatherApiError {
  if (error instanceof WeatherApiError) {
    return error;
  }
  return new WeatherApiError(normalizeError(error).message, ErrorType.UPSTREAM);
}

export class WeatherService {
  private readonly serveStale: boolean;

  constructor(
    private readonly api: WeatherApi,
    private readonly cache: CacheManager,
    options: WeatherServiceOptions = {}
  ) {
    this.serveStale = options.serveStale ?? true;
  }

  getCurrentWeatherByCity(city: string): Promise<WeatherResult<CurrentWeather>> {
    return this.resolve({
      kind: RequestKinds.CURRENT_WEATHER,
      key: cityKey(city),
      schema: CurrentWeatherSchema,
      fetch: () => this.api.getCurrentWeatherByCity(city),
      canonicalKey: data => canonicalCity(data.name),
    });
  }

  getCurrentWeatherByCoordinates(lat: number, lon: number): Promise<WeatherResult<CurrentWeather>> {
    return this.resolve({
      kind: RequestKinds.CURRENT_WEATHER_AT_COORDINATES,
      key: coordinateKey(lat, lon),
      schema: CurrentWeatherSchema,
      fetch: () => this.api.getCurrentWeatherByCoordinates(lat, lon),
    });
  }

  getForecastByCity(city: string): Promise<WeatherResult<Forecast>> {
    return this.resolve({
      kind: RequestKinds.FORECAST,
      key: cityKey(city),
      schema: ForecastSchema,
      fetch: () => this.api.getForecastByCity(city),
      canonicalKey: data => canonicalCity(data.city.name),
    });
  }

  getAirQuality(lat: number, lon: number): Promise<WeatherResult<AirQuality>> {
    return this.resolve({
      kind: RequestKinds.AIR_QUALITY,
      key: coordinateKey(lat, lon),
      schema: AirQualitySchema,
      fetch: () => this.api.getAirQuality(lat, lon),
    });
  }

  geocodeCity(city: string): Promise<WeatherResult<Geocoding>> {
    return this.resolve({
      kind: RequestKinds.GEOCODE,
      key: cityKey(city),
      schema: GeocodingSchema,
      fetch: () => this.api.geocodeCity(city),
      canonicalKey: data => canonicalCity(data[0]?.name ?? ''),
    });
  }

  /**
   * Name of the place at a coordinate pair (reverse geocoding)
   */
  async resolveCityName(lat: number, lon: number): Promise<WeatherResult<GeocodedPlace>> {
    const result = await this.resolve({
      kind: RequestKinds.REVERSE_GEOCODE,
      key: coordinateKey(lat, lon),
      schema: GeocodingSchema,
      fetch: () => this.api.reverseGeocode(lat, lon),
    });
    if (!result.ok) {
      return result;
    }
    const [place] = result.data;
    if (!place) {
      return { ok: false, error: new WeatherApiError(`No place found at (${lat}, ${lon})`, ErrorType.NOT_FOUND) };
    }
    return { ...result, data: place };
  }

  /**
   * Current weather plus air quality at the city's coordinates.
   * Air quality failures degrade to `airQuality: null`.
   */
  async getExtendedWeather(city: string): Promise<WeatherResult<ExtendedWeather>> {
    const current = await this.getCurrentWeatherByCity(city);
    if (!current.ok) {
      return current;
    }

    const air = await this.getAirQuality(current.data.coord.lat, current.data.coord.lon);
    if (!air.ok) {
      console.warn(`⚠️  Air quality unavailable for ${current.data.name}:`, air.error.message);
    }

    return {
      ok: true,
      data: { current: current.data, airQuality: air.ok ? air.data : null },
      source: current.source,
      fetchedAt: current.fetchedAt,
    };
  }

  async compareCities(first: string, second: string): Promise<WeatherResult<CityComparison>> {
    const a = await this.getCurrentWeatherByCity(first);
    if (!a.ok) {
      return a;
    }
    const b = await this.getCurrentWeatherByCity(second);
    if (!b.ok) {
      return b;
    }

    return {
      ok: true,
      data: { first: a.data, second: b.data },
      source: SOURCE_RANK[a.source] >= SOURCE_RANK[b.source] ? a.source : b.source,
      fetchedAt: a.fetchedAt < b.fetchedAt ? a.fetchedAt : b.fetchedAt,
    };
  }

  private async resolve<T>(request: CachedRequest<T>): Promise<WeatherResult<T>> {
    const { kind, key, schema } = request;
    const cached = await this.cache.lookup(kind, key);

    if (cached.status === 'hit') {
      const parsed = schema.safeParse(cached.entry.payload);
      if (parsed.success) {
        return { ok: true, data: parsed.data, source: 'cache', fetchedAt: cached.entry.fetchedAt };
      }
      console.warn(`⚠️  Cached ${kind} for ${describeKey(key)} has an unexpected shape, refetching`);
    }

    const stale = cached.status === 'miss' ? cached.stale : null;

    let body: JsonValue;
    let data: T;
    try {
      body = await request.fetch();
      const parsed = schema.safeParse(body);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new WeatherApiError(
          `Unexpected ${kind} response: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'invalid shape'}`,
          ErrorType.INVALID_RESPONSE
        );
      }
      data = parsed.data;
    } catch (error) {
      const apiError = toWeatherApiError(error);

      if (this.serveStale && stale) {
        const parsedStale = schema.safeParse(stale.payload);
        if (parsedStale.success) {
          console.warn(`⚠️  ${apiError.message}; serving stale ${kind} for ${describeKey(key)} from ${stale.fetchedAt}`);
          return { ok: true, data: parsedStale.data, source: 'stale', fetchedAt: stale.fetchedAt };
        }
      }

      return { ok: false, error: apiError };
    }

    const fetchedAt = new Date();
    // Failures are logged by the cache; the fresh data is returned either way
    await this.cache.upsert(kind, request.canonicalKey?.(data) ?? key, body, fetchedAt);

    return { ok: true, data, source: 'upstream', fetchedAt: fetchedAt.toISOString() };
  }
}
