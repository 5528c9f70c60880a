/**
 * OpenWeatherMap HTTP client
 *
 * Returns raw JSON bodies. Shape validation and caching belong to
 * WeatherService; this layer only knows endpoints, parameters and retries.
 */

import { WeatherApiError } from '../errors.js';
import { ErrorType, type JsonValue } from '../types.js';
import { requestJson } from './request-retry.js';

export type Units = 'standard' | 'metric' | 'imperial';

/**
 * Upstream operations the weather service depends on
 */
export interface WeatherApi {
  geocodeCity(city: string): Promise<JsonValue>;
  reverseGeocode(lat: number, lon: number): Promise<JsonValue>;
  getCurrentWeatherByCity(city: string): Promise<JsonValue>;
  getCurrentWeatherByCoordinates(lat: number, lon: number): Promise<JsonValue>;
  getForecastByCity(city: string): Promise<JsonValue>;
  getAirQuality(lat: number, lon: number): Promise<JsonValue>;
}

export interface OpenWeatherClientOptions {
  apiKey: string;
  units?: Units;
  /** Language for condition descriptions (default: en) */
  lang?: string;
  /** Total attempts per request (default: 3) */
  maxAttempts?: number;
  /** First retry delay; doubles on each further retry (default: 1000ms) */
  retryDelayMs?: number;
  baseUrl?: string;
  /** Injected for tests */
  fetchImpl?: typeof fetch;
}

const DEFAULT_BASE_URL = 'https://api.openweathermap.org';

export class OpenWeatherClient implements WeatherApi {
  private readonly apiKey: string;
  private readonly units: Units;
  private readonly lang: string;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: OpenWeatherClientOptions) {
    if (!options.apiKey) {
      throw new Error('apiKey is required');
    }
    this.apiKey = options.apiKey;
    this.units = options.units ?? 'metric';
    this.lang = options.lang ?? 'en';
    this.maxAttempts = options.maxAttempts ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async geocodeCity(city: string): Promise<JsonValue> {
    const body = await this.get('/geo/1.0/direct', { q: city, limit: 1 });
    if (Array.isArray(body) && body.length === 0) {
      throw new WeatherApiError(`City "${city}" not found`, ErrorType.NOT_FOUND);
    }
    return body;
  }

  async reverseGeocode(lat: number, lon: number): Promise<JsonValue> {
    const body = await this.get('/geo/1.0/reverse', { lat, lon, limit: 1 });
    if (Array.isArray(body) && body.length === 0) {
      throw new WeatherApiError(`No place found at (${lat}, ${lon})`, ErrorType.NOT_FOUND);
    }
    return body;
  }

  getCurrentWeatherByCity(city: string): Promise<JsonValue> {
    return this.get('/data/2.5/weather', this.localized({ q: city }), `City "${city}" not found`);
  }

  getCurrentWeatherByCoordinates(lat: number, lon: number): Promise<JsonValue> {
    return this.get('/data/2.5/weather', this.localized({ lat, lon }), `No weather data at (${lat}, ${lon})`);
  }

  getForecastByCity(city: string): Promise<JsonValue> {
    return this.get('/data/2.5/forecast', this.localized({ q: city }), `City "${city}" not found`);
  }

  getAirQuality(lat: number, lon: number): Promise<JsonValue> {
    return this.get('/data/2.5/air_pollution', { lat, lon }, `No air quality data at (${lat}, ${lon})`);
  }

  private localized(params: Record<string, string | number>): Record<string, string | number> {
    return { ...params, units: this.units, lang: this.lang };
  }

  private get(pathname: string, params: Record<string, string | number>, notFoundMessage?: string): Promise<JsonValue> {
    const url = new URL(pathname, this.baseUrl);
    for (const [name, value] of Object.entries(params)) {
      url.searchParams.set(name, String(value));
    }
    url.searchParams.set('appid', this.apiKey);

    return requestJson(url, {
      maxAttempts: this.maxAttempts,
      baseDelayMs: this.retryDelayMs,
      fetchImpl: this.fetchImpl,
      notFoundMessage,
    });
  }
}
