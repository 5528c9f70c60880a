/**
 * Configuration loader for weather-lookup
 *
 * Every setting comes from an environment variable and falls back to the
 * schema default:
 * - OPENWEATHER_API_KEY: upstream API key (required for live calls)
 * - WEATHER_CACHE_PATH: cache document (default: ./weather_cache.json)
 * - WEATHER_CACHE_TTL_MS: cache TTL (default: 10800000, range: 1000-604800000)
 * - WEATHER_SERVE_STALE: serve expired entries on upstream failure (default: true)
 * - USER_SETTINGS_PATH: settings document (default: ./user_settings.json)
 * - WEATHER_NOTIFY_CHECK_MS: notification check interval (default: 60000, range: 1000-86400000)
 * - WEATHER_UNITS: standard | metric | imperial (default: metric)
 * - WEATHER_LANG: description language (default: en)
 * - WEATHER_API_MAX_ATTEMPTS: attempts per request (default: 3, range: 1-10)
 * - WEATHER_API_RETRY_DELAY_MS: first retry delay (default: 1000, range: 0-60000)
 */

import { z } from 'zod';
import { AppConfigSchema, type AppConfig } from './schemas.js';

const ENV_HELP =
  'Check environment variables: WEATHER_CACHE_PATH, WEATHER_CACHE_TTL_MS (1000-604800000), ' +
  'WEATHER_SERVE_STALE (true/false), USER_SETTINGS_PATH, WEATHER_NOTIFY_CHECK_MS (1000-86400000), WEATHER_UNITS (standard/metric/imperial), ' +
  'WEATHER_LANG (2-5 characters), WEATHER_API_MAX_ATTEMPTS (1-10), WEATHER_API_RETRY_DELAY_MS (0-60000).';

/**
 * Parse an environment variable as an integer
 *
 * @returns undefined when the variable is unset or empty
 * @throws {Error} If the value is not numeric
 */
export function parseEnvInt(value: string | undefined, name: string): number | undefined {
  if (!value) return undefined;

  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new Error(`Invalid numeric value for ${name}: "${value}". Expected a valid integer.`);
  }
  return parsed;
}

/**
 * Parse an environment variable as a boolean ('true', 'false', '1', '0')
 *
 * @returns undefined when the variable is unset or empty
 */
export function parseEnvBool(value: string | undefined, name: string): boolean | undefined {
  if (!value) return undefined;

  const lower = value.toLowerCase();
  if (lower === 'true' || lower === '1') return true;
  if (lower === 'false' || lower === '0') return false;

  throw new Error(`Invalid boolean value for ${name}: "${value}". Expected "true", "false", "1", or "0".`);
}

function parseEnvString(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Build the validated configuration from environment variables
 *
 * @throws {Error} If a variable is malformed or out of range
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  try {
    return AppConfigSchema.parse({
      apiKey: parseEnvString(env.OPENWEATHER_API_KEY),
      cache: {
        path: parseEnvString(env.WEATHER_CACHE_PATH),
        ttlMs: parseEnvInt(env.WEATHER_CACHE_TTL_MS, 'WEATHER_CACHE_TTL_MS'),
        serveStale: parseEnvBool(env.WEATHER_SERVE_STALE, 'WEATHER_SERVE_STALE'),
      },
      settings: {
        path: parseEnvString(env.USER_SETTINGS_PATH),
      },
      notifications: {
        checkIntervalMs: parseEnvInt(env.WEATHER_NOTIFY_CHECK_MS, 'WEATHER_NOTIFY_CHECK_MS'),
      },
      api: {
        units: parseEnvString(env.WEATHER_UNITS),
        lang: parseEnvString(env.WEATHER_LANG),
        maxAttempts: parseEnvInt(env.WEATHER_API_MAX_ATTEMPTS, 'WEATHER_API_MAX_ATTEMPTS'),
        retryDelayMs: parseEnvInt(env.WEATHER_API_RETRY_DELAY_MS, 'WEATHER_API_RETRY_DELAY_MS'),
      },
    });
  } catch (error) {
    if (error instanceof z.ZodError) {
      const firstError = error.errors[0];
      const field = firstError?.path.join('.') || 'unknown';
      throw new Error(`Invalid configuration: ${field} - ${firstError?.message}. ${ENV_HELP}`);
    }
    throw error;
  }
}

/**
 * The API key, or an error explaining how to provide one
 */
export function requireApiKey(config: AppConfig): string {
  if (!config.apiKey) {
    throw new Error('OPENWEATHER_API_KEY is not set. Create a free key at openweathermap.org and export it.');
  }
  return config.apiKey;
}
