/**
 * Zod validation schemas for weather-lookup configuration
 */

import { z } from 'zod';
import { DEFAULT_CACHE_TTL_MS } from '../caching/types.js';

/** Longest accepted cache TTL (7 days) */
export const MAX_CACHE_TTL_MS = 7 * 24 * 60 * 60 * 1000;

export const CacheConfigSchema = z.object({
  /** JSON document holding the response cache */
  path: z.string().min(1).default('./weather_cache.json'),
  ttlMs: z.number().int().min(1000).max(MAX_CACHE_TTL_MS).default(DEFAULT_CACHE_TTL_MS),
  /** Serve an expired entry when the upstream call fails */
  serveStale: z.boolean().default(true),
});

export type CacheConfig = z.infer<typeof CacheConfigSchema>;

export const SettingsConfigSchema = z.object({
  path: z.string().min(1).default('./user_settings.json'),
});

export type SettingsConfig = z.infer<typeof SettingsConfigSchema>;

export const NotificationsConfigSchema = z.object({
  /** How often stored users are checked for a due notification */
  checkIntervalMs: z.number().int().min(1000).max(24 * 60 * 60 * 1000).default(60_000),
});

export type NotificationsConfig = z.infer<typeof NotificationsConfigSchema>;

export const ApiConfigSchema = z.object({
  units: z.enum(['standard', 'metric', 'imperial']).default('metric'),
  lang: z.string().min(2).max(5).default('en'),
  maxAttempts: z.number().int().min(1).max(10).default(3),
  retryDelayMs: z.number().int().min(0).max(60000).default(1000),
});

export type ApiConfig = z.infer<typeof ApiConfigSchema>;

export const AppConfigSchema = z.object({
  /** Optional at load time; required before any live call */
  apiKey: z.string().min(1).optional(),
  cache: CacheConfigSchema.default({}),
  settings: SettingsConfigSchema.default({}),
  notifications: NotificationsConfigSchema.default({}),
  api: ApiConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
