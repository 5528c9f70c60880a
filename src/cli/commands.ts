/**
 * CLI commands
 *
 * Each command runs weather-service or settings calls for one user and
 * prints the formatted reply as plain text. Prompting lives in index.ts, so everything here runs
 * without a TTY.
 */

import kleur from 'kleur';
import type { CacheManager } from '../caching/cache-manager.js';
import type { WeatherApiError } from '../errors.js';
import {
  formatComparison,
  formatCurrentWeather,
  formatDailyForecastList,
  formatExtendedWeather,
  formatHourlyForecastDetail,
  formatNotificationSettings,
  formatStaleNotice,
} from '../formatting/messages.js';
import {
  cycleNotificationInterval,
  notificationSettings,
  savedLocation,
  toggleNotifications,
} from '../notifications/policy.js';
import type { UserSettingsStore } from '../settings/user-settings-store.js';
import { ErrorType } from '../types.js';
import { formatDuration, formatErrorResponse } from '../utils.js';
import type { Units } from '../weather/openweather-client.js';
import type { WeatherResult, WeatherService } from '../weather/weather-service.js';

export type Mode =
  | 'city'
  | 'coordinates'
  | 'location'
  | 'saved'
  | 'forecast'
  | 'extended'
  | 'compare'
  | 'notifications'
  | 'stats'
  | 'purge'
  | 'exit';

export const MODES: ReadonlyArray<{ title: string; value: Mode }> = [
  { title: 'Weather by city', value: 'city' },
  { title: 'Weather by coordinates', value: 'coordinates' },
  { title: 'Share my location', value: 'location' },
  { title: 'Weather at my saved location', value: 'saved' },
  { title: '5-day forecast', value: 'forecast' },
  { title: 'Extended data', value: 'extended' },
  { title: 'Compare two cities', value: 'compare' },
  { title: 'Notification settings', value: 'notifications' },
  { title: 'Cache statistics', value: 'stats' },
  { title: 'Purge stale cache entries', value: 'purge' },
  { title: 'Exit', value: 'exit' },
];

export type StatusType = 'success' | 'error' | 'warning' | 'info';

/** Settings key for the person at the terminal */
export const LOCAL_USER_ID = 'local';

const ERROR_SUGGESTIONS: Record<ErrorType, string> = {
  [ErrorType.PERSISTENCE]: 'Check that the cache and settings files are writable',
  [ErrorType.UPSTREAM]: 'The weather service is unreachable, try again later',
  [ErrorType.AUTH]: 'Export a valid key as OPENWEATHER_API_KEY',
  [ErrorType.NOT_FOUND]: 'Check the city name or coordinates',
  [ErrorType.RATE_LIMIT]: 'Wait a minute before the next request',
  [ErrorType.INVALID_RESPONSE]: 'The weather service sent unexpected data, try again later',
};

/**
 * Prefix and colour a one-line status message
 */
export function formatStatus(type: StatusType, message: string): string {
  switch (type) {
    case 'success':
      return kleur.green(`✓ ${message}`);
    case 'error':
      return kleur.red(`✗ ${message}`);
    case 'warning':
      return kleur.yellow(`⚠ ${message}`);
    case 'info':
      return kleur.cyan(`ℹ ${message}`);
  }
}

/**
 * Drop chat markup and decode the entities escapeHtml produces
 */
export function stripMarkup(text: string): string {
  return text
    .replace(/<\/?(b|i)>/g, '')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&amp;/g, '&');
}

/**
 * "Paris, London" → ['Paris', 'London']; anything but two non-empty names → null
 */
export function parseCityPair(input: string): [string, string] | null {
  const parts = input.split(',').map(part => part.trim());
  const [first, second] = parts;
  if (parts.length !== 2 || !first || !second) {
    return null;
  }
  return [first, second];
}

export function parseCoordinate(input: string, axis: 'lat' | 'lon'): number | null {
  const trimmed = input.trim();
  if (trimmed.length === 0) {
    return null;
  }
  const value = Number(trimmed);
  const limit = axis === 'lat' ? 90 : 180;
  if (!Number.isFinite(value) || Math.abs(value) > limit) {
    return null;
  }
  return value;
}

export interface WeatherCommandsOptions {
  units?: Units;
  /** Whose saved location and notification settings to use (default: LOCAL_USER_ID) */
  userId?: string;
}

export class WeatherCommands {
  private readonly units: Units;
  private readonly userId: string;

  constructor(
    private readonly service: WeatherService,
    private readonly cache: CacheManager,
    private readonly settings: UserSettingsStore,
    private readonly print: (text: string) => void,
    options: WeatherCommandsOptions = {}
  ) {
    this.units = options.units ?? 'metric';
    this.userId = options.userId ?? LOCAL_USER_ID;
  }

  async weatherByCity(city: string): Promise<boolean> {
    const result = await this.service.getCurrentWeatherByCity(city);
    return this.show(result, data => formatCurrentWeather(data, this.units));
  }

  async weatherByCoordinates(lat: number, lon: number): Promise<boolean> {
    const result = await this.service.getCurrentWeatherByCoordinates(lat, lon);
    return this.show(result, data => formatCurrentWeather(data, this.units));
  }

  /**
   * Resolve the place at a coordinate pair, show its weather and remember it
   * as the saved location
   */
  async shareLocation(lat: number, lon: number): Promise<boolean> {
    const place = await this.service.resolveCityName(lat, lon);
    if (!place.ok) {
      this.printError(place.error);
      return false;
    }

    const city = place.data.name;
    const weather = await this.service.getCurrentWeatherByCity(city);
    if (!weather.ok) {
      this.printError(weather.error);
      return false;
    }

    const { result } = await this.settings.rememberLocation(this.userId, { city, lat, lon });
    this.print(
      result.ok
        ? `📍 Your location was detected as ${city}. Saved.`
        : formatStatus('warning', `Your location was detected as ${city}, but it could not be saved`)
    );
    return this.show(weather, data => formatCurrentWeather(data, this.units));
  }

  async savedLocationWeather(): Promise<boolean> {
    const location = savedLocation(await this.settings.load(this.userId));
    if (!location) {
      this.print(formatStatus('warning', 'No saved location yet. Share your location first.'));
      return false;
    }
    return this.weatherByCity(location.city);
  }

  async forecast(city: string): Promise<boolean> {
    const result = await this.service.getForecastByCity(city);
    return this.show(result, data => formatDailyForecastList(data, this.units));
  }

  async forecastDay(city: string, dayOffset: number, now: Date = new Date()): Promise<boolean> {
    const result = await this.service.getForecastByCity(city);
    return this.show(result, data => formatHourlyForecastDetail(data, dayOffset, now, this.units));
  }

  async extended(city: string): Promise<boolean> {
    const result = await this.service.getExtendedWeather(city);
    return this.show(result, data => formatExtendedWeather(data.current, data.airQuality, this.units));
  }

  async compare(input: string): Promise<boolean> {
    const cities = parseCityPair(input);
    if (!cities) {
      this.print(formatStatus('error', 'Enter two cities separated by a comma, e.g. "Paris, London"'));
      return false;
    }
    const result = await this.service.compareCities(...cities);
    return this.show(result, data => formatComparison(data.first, data.second, this.units));
  }

  async showNotifications(): Promise<void> {
    const settings = notificationSettings(await this.settings.load(this.userId));
    this.print(stripMarkup(formatNotificationSettings(settings)));
  }

  async switchNotifications(): Promise<boolean> {
    const { settings, result } = await this.settings.update(this.userId, toggleNotifications);
    if (!result.ok) {
      this.print(formatStatus('error', 'Could not save notification settings'));
      return false;
    }

    const { enabled } = notificationSettings(settings);
    this.print(formatStatus('success', `Notifications turned ${enabled ? 'on' : 'off'}`));
    if (enabled && !savedLocation(settings)) {
      this.print(formatStatus('warning', 'Share your location so notifications know which city to report'));
    }
    return true;
  }

  async changeNotificationInterval(): Promise<boolean> {
    const { settings, result } = await this.settings.update(this.userId, cycleNotificationInterval);
    if (!result.ok) {
      this.print(formatStatus('error', 'Could not save notification settings'));
      return false;
    }

    this.print(formatStatus('success', `Notification interval set to ${notificationSettings(settings).intervalHours} h`));
    return true;
  }

  async stats(): Promise<void> {
    const stats = await this.cache.getStats();
    const lines = [
      `📦 Cache: ${stats.total} entr${stats.total === 1 ? 'y' : 'ies'} (${stats.fresh} fresh, ${stats.stale} stale)`,
      `⏱️  TTL: ${formatDuration(this.cache.ttl)}`,
      ...Object.entries(stats.byKind).map(([kind, count]) => `  • ${kind}: ${count}`),
    ];
    this.print(lines.join('\n'));
  }

  async purge(): Promise<number> {
    const removed = await this.cache.purgeStale();
    this.print(formatStatus('success', `Removed ${removed} stale cache entr${removed === 1 ? 'y' : 'ies'}`));
    return removed;
  }

  private show<T>(result: WeatherResult<T>, render: (data: T) => string): boolean {
    if (!result.ok) {
      this.printError(result.error);
      return false;
    }

    let text = render(result.data);
    if (result.source === 'stale') {
      text += `\n\n${formatStaleNotice(result.fetchedAt)}`;
    }
    this.print(stripMarkup(text));
    return true;
  }

  private printError(error: WeatherApiError): void {
    const response = formatErrorResponse(error, error.errorType, ERROR_SUGGESTIONS[error.errorType]);
    const lines = [formatStatus('error', response.error)];
    if (response.suggestion) {
      lines.push(formatStatus('info', response.suggestion));
    }
    this.print(lines.join('\n'));
  }
}
