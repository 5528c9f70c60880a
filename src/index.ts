/**
 * weather-lookup
 *
 * Weather lookups through a TTL-aware JSON response cache, with chat-ready
 * message formatting and per-user notification settings.
 */

export { CacheManager } from './caching/cache-manager.js';
export { JsonFileRecordStore } from './caching/json-record-store.js';
export { MemoryRecordStore } from './caching/memory-record-store.js';
export { cityKey, coordinateKey, describeKey, keysMatch, normalizeCityName, normalizeKey } from './caching/cache-key.js';
export { DEFAULT_CACHE_TTL_MS, RequestKinds } from './caching/types.js';
export type {
  CacheEntry,
  CacheKey,
  CacheManagerOptions,
  CacheStats,
  CityKey,
  CoordinateKey,
  LookupResult,
  RecordStore,
  RequestKind,
} from './caching/types.js';

export { loadConfig, parseEnvBool, parseEnvInt, requireApiKey } from './config/loader.js';
export { AppConfigSchema, MAX_CACHE_TTL_MS } from './config/schemas.js';
export type { ApiConfig, AppConfig, CacheConfig, NotificationsConfig, SettingsConfig } from './config/schemas.js';

export { PersistenceError, WeatherApiError } from './errors.js';
export { ErrorType } from './types.js';
export type { ErrorResponse, JsonValue, PersistenceResult } from './types.js';
export { JsonValueSchema } from './schemas.js';
export { formatDuration, formatErrorResponse, isErrnoException, isError, normalizeError } from './utils.js';

export {
  escapeHtml,
  formatAirQualityIndex,
  formatComparison,
  formatCurrentWeather,
  formatDailyForecastList,
  formatExtendedWeather,
  formatHourlyForecastDetail,
  formatNotificationSettings,
  formatStaleNotice,
} from './formatting/messages.js';

export { NotificationChecker, NOTIFICATION_HEADER } from './notifications/notification-checker.js';
export type { NotificationOutcome, NotificationSender } from './notifications/notification-checker.js';
export { NotificationScheduler } from './notifications/notification-scheduler.js';
export {
  DEFAULT_NOTIFICATION_SETTINGS,
  NOTIFICATION_INTERVALS_HOURS,
  cycleNotificationInterval,
  isNotificationDue,
  nextNotificationInterval,
  savedLocation,
  toggleNotifications,
} from './notifications/policy.js';
export type { NotificationStatus } from './notifications/policy.js';

export { UserSettingsStore, UserSettingsSchema } from './settings/user-settings-store.js';
export type { NotificationSettings, SavedLocation, UserSettings } from './settings/user-settings-store.js';

export { JsonDocumentFile } from './storage/json-document.js';
export type { ReadDocumentResult } from './storage/json-document.js';

export { OpenWeatherClient } from './weather/openweather-client.js';
export type { OpenWeatherClientOptions, Units, WeatherApi } from './weather/openweather-client.js';
export { backoffDelay, requestJson } from './weather/request-retry.js';
export { WeatherService } from './weather/weather-service.js';
export type { CityComparison, ExtendedWeather, WeatherResult, WeatherSource } from './weather/weather-service.js';
export * from './weather/schemas.js';
