/**
 * Upstream payload shapes (OpenWeatherMap)
 *
 * Only the fields the service and the formatters read are required. Every
 * object passes unknown fields through, so a validated payload is still the
 * verbatim upstream body.
 */

import { z } from 'zod';

const ConditionSchema = z.object({ description: z.string() }).passthrough();

export const CurrentWeatherSchema = z
  .object({
    name: z.string(),
    coord: z.object({ lat: z.number(), lon: z.number() }).passthrough(),
    main: z
      .object({
        temp: z.number(),
        feels_like: z.number(),
        humidity: z.number(),
        pressure: z.number(),
      })
      .passthrough(),
    weather: z.array(ConditionSchema).min(1),
    wind: z.object({ speed: z.number() }).passthrough(),
    visibility: z.number().optional(),
    clouds: z.object({ all: z.number() }).passthrough().optional(),
    sys: z.object({ sunrise: z.number(), sunset: z.number() }).passthrough().optional(),
    /** Offset from UTC in seconds */
    timezone: z.number().optional(),
  })
  .passthrough();

export type CurrentWeather = z.infer<typeof CurrentWeatherSchema>;

export const ForecastSchema = z
  .object({
    city: z
      .object({
        name: z.string(),
        /** Offset from UTC in seconds */
        timezone: z.number().optional(),
      })
      .passthrough(),
    list: z.array(
      z
        .object({
          /** Unix time, seconds */
          dt: z.number(),
          main: z.object({ temp: z.number() }).passthrough(),
          weather: z.array(ConditionSchema).min(1),
        })
        .passthrough()
    ),
  })
  .passthrough();

export type Forecast = z.infer<typeof ForecastSchema>;

export const AirQualitySchema = z
  .object({
    list: z
      .array(
        z
          .object({
            main: z.object({ aqi: z.number().int() }).passthrough(),
            components: z.record(z.number()),
          })
          .passthrough()
      )
      .min(1),
  })
  .passthrough();

export type AirQuality = z.infer<typeof AirQualitySchema>;

export const GeocodingSchema = z
  .array(
    z
      .object({
        name: z.string(),
        lat: z.number(),
        lon: z.number(),
        country: z.string().optional(),
        state: z.string().optional(),
      })
      .passthrough()
  )
  .min(1);

export type Geocoding = z.infer<typeof GeocodingSchema>;
export type GeocodedPlace = Geocoding[number];
