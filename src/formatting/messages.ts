/**
 * Chat message formatting
 *
 * Pure functions from validated payloads to message text with `<b>` markup.
 * Local times come from the payload's UTC offset, never the host time zone.
 */

import type { NotificationSettings } from '../settings/user-settings-store.js';
import { formatDuration } from '../utils.js';
import type { Units } from '../weather/openweather-client.js';
import type { AirQuality, CurrentWeather, Forecast } from '../weather/schemas.js';

const WEEKDAYS = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'] as const;

const UNIT_LABELS: Record<Units, { temperature: string; speed: string }> = {
  standard: { temperature: 'K', speed: 'm/s' },
  metric: { temperature: '°C', speed: 'm/s' },
  imperial: { temperature: '°F', speed: 'mph' },
};

const AIR_QUALITY_LABELS: Record<number, string> = {
  1: 'Good 🟢',
  2: 'Fair 🟡',
  3: 'Moderate 🟠',
  4: 'Poor 🔴',
  5: 'Very poor 🟣',
};

const MAX_FORECAST_DAYS = 5;

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1).toLowerCase();
}

function conditionText(conditions: ReadonlyArray<{ description: string }>): string {
  return escapeHtml(capitalize(conditions[0]?.description ?? ''));
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Shift a Unix time (seconds) by a UTC offset (seconds). Read the result
 * with getUTC* accessors only.
 */
function toLocal(unixSeconds: number, offsetSeconds: number): Date {
  return new Date((unixSeconds + offsetSeconds) * 1000);
}

function dayKey(local: Date): string {
  return local.toISOString().slice(0, 10);
}

function clock(local: Date): string {
  return `${pad(local.getUTCHours())}:${pad(local.getUTCMinutes())}`;
}

function dayLabel(local: Date, withYear: boolean): string {
  const date = `${pad(local.getUTCDate())}.${pad(local.getUTCMonth() + 1)}`;
  return `${withYear ? `${date}.${local.getUTCFullYear()}` : date} - ${WEEKDAYS[local.getUTCDay()]}`;
}

function hourEmoji(hour: number): string {
  if (hour >= 6 && hour < 12) return '🌅';
  if (hour >= 12 && hour < 18) return '☀️';
  if (hour >= 18 && hour < 22) return '🌇';
  return '🌙';
}

export function formatAirQualityIndex(aqi: number): string {
  return AIR_QUALITY_LABELS[aqi] ?? 'Unknown';
}

export function formatCurrentWeather(data: CurrentWeather, units: Units = 'metric'): string {
  const { temperature, speed } = UNIT_LABELS[units];
  return (
    `🌤️ <b>Weather in ${escapeHtml(data.name)}</b>\n\n` +
    `🌡️ Temperature: <b>${data.main.temp.toFixed(1)}${temperature}</b>\n` +
    `🤔 Feels like: <b>${data.main.feels_like.toFixed(1)}${temperature}</b>\n\n` +
    `💧 Humidity: ${data.main.humidity}%\n` +
    `🌬️ Wind: ${data.wind.speed} ${speed}\n` +
    `📊 Pressure: ${data.main.pressure} hPa\n\n` +
    `☁️ ${conditionText(data.weather)}`
  );
}

export function formatComparison(first: CurrentWeather, second: CurrentWeather, units: Units = 'metric'): string {
  const { temperature, speed } = UNIT_LABELS[units];
  const a = escapeHtml(first.name);
  const b = escapeHtml(second.name);
  const difference = Math.abs(first.main.temp - second.main.temp);
  const warmer =
    difference === 0
      ? '🟰 Same temperature in both cities'
      : `🔥 ${first.main.temp > second.main.temp ? a : b} is warmer by ${difference.toFixed(1)}${temperature}`;

  return (
    `⚖️ <b>Weather comparison</b>\n<b>${a} vs ${b}</b>\n\n` +
    `🌡️ <b>Temperature:</b>\n${a}: ${first.main.temp.toFixed(1)}${temperature}\n` +
    `${b}: ${second.main.temp.toFixed(1)}${temperature}\n${warmer}\n\n` +
    `💧 <b>Humidity:</b>\n${a}: ${first.main.humidity}%\n${b}: ${second.main.humidity}%\n\n` +
    `🌬️ <b>Wind:</b>\n${a}: ${first.wind.speed} ${speed}\n${b}: ${second.wind.speed} ${speed}\n\n` +
    `📊 <b>Pressure:</b>\n${a}: ${first.main.pressure} hPa\n${b}: ${second.main.pressure} hPa\n\n` +
    `☁️ <b>Conditions:</b>\n${a}: ${conditionText(first.weather)}\n${b}: ${conditionText(second.weather)}`
  );
}

/**
 * One line per local day (first five days present in the forecast) with the
 * mean temperature of that day's slots.
 */
export function formatDailyForecastList(forecast: Forecast, units: Units = 'metric'): string {
  const offset = forecast.city.timezone ?? 0;
  const days = new Map<string, { local: Date; temps: number[] }>();

  for (const item of forecast.list) {
    const local = toLocal(item.dt, offset);
    const key = dayKey(local);
    const day = days.get(key);
    if (day) {
      day.temps.push(item.main.temp);
    } else {
      days.set(key, { local, temps: [item.main.temp] });
    }
  }

  let text =
    `📅 <b>5-day forecast</b>\n📍 <b>${escapeHtml(forecast.city.name)}</b>\n\n` +
    'Choose a day for the detailed forecast:\n';

  for (const { local, temps } of [...days.values()].slice(0, MAX_FORECAST_DAYS)) {
    const mean = temps.reduce((sum, temp) => sum + temp, 0) / temps.length;
    text += `\n☀️ ${dayLabel(local, false)} (${mean.toFixed(1)}${UNIT_LABELS[units].temperature})`;
  }

  return text;
}

/**
 * Every forecast slot of the local day `today + dayOffset`, where "today" is
 * the city's local date at `now`.
 */
export function formatHourlyForecastDetail(
  forecast: Forecast,
  dayOffset: number,
  now: Date = new Date(),
  units: Units = 'metric'
): string {
  const offset = forecast.city.timezone ?? 0;
  const today = toLocal(Math.floor(now.getTime() / 1000), offset);
  const target = new Date(Date.UTC(today.getUTCFullYear(), today.getUTCMonth(), today.getUTCDate() + dayOffset));
  const targetKey = dayKey(target);
  const targetLabel = dayLabel(target, true);

  const slots = forecast.list.filter(item => dayKey(toLocal(item.dt, offset)) === targetKey);
  if (slots.length === 0) {
    return `No forecast data for ${targetLabel}.`;
  }

  let text = `🗓️ <b>Detailed forecast</b>\n📍 <b>${escapeHtml(forecast.city.name)}</b>\n\n📅 <b>${targetLabel}</b>\n`;
  for (const item of slots) {
    const local = toLocal(item.dt, offset);
    text +=
      `\n${hourEmoji(local.getUTCHours())} ${clock(local)}: ` +
      `${item.main.temp.toFixed(1)}${UNIT_LABELS[units].temperature}, ${conditionText(item.weather)}`;
  }
  return text;
}

export function formatExtendedWeather(
  current: CurrentWeather,
  airQuality: AirQuality | null,
  units: Units = 'metric'
): string {
  const { temperature, speed } = UNIT_LABELS[units];
  const offset = current.timezone ?? 0;
  const visibilityKm = (current.visibility ?? 10000) / 1000;
  const sunrise = current.sys ? clock(toLocal(current.sys.sunrise, offset)) : 'n/a';
  const sunset = current.sys ? clock(toLocal(current.sys.sunset, offset)) : 'n/a';

  let text =
    `📍 <b>Extended weather data\n${escapeHtml(current.name)}</b>\n\n` +
    `🌡️ Temperature: ${current.main.temp.toFixed(1)}${temperature} ` +
    `(feels like ${current.main.feels_like.toFixed(1)}${temperature})\n` +
    `💧 Humidity: ${current.main.humidity}%\n` +
    `📊 Pressure: ${current.main.pressure} hPa\n` +
    `🌬️ Wind: ${current.wind.speed} ${speed}\n` +
    `👁️ Visibility: ${visibilityKm.toFixed(1)} km\n` +
    `☁️ Cloudiness: ${current.clouds?.all ?? 0}%\n` +
    `🌅 Sunrise: ${sunrise}\n` +
    `🌇 Sunset: ${sunset}\n`;

  const reading = airQuality?.list[0];
  if (reading) {
    text +=
      '\n🏭 <b>Air quality:</b>\n' +
      `Overall: ${formatAirQualityIndex(reading.main.aqi)}\n` +
      `O₃: ${(reading.components['o3'] ?? 0).toFixed(2)} µg/m³\n\n`;
  } else {
    text += '\n';
  }

  return text + `📝 <b>Conditions:</b> ${conditionText(current.weather)}`;
}

/**
 * Note appended to a reply built from an expired cache entry
 */
export function formatStaleNotice(fetchedAt: string, now: Date = new Date()): string {
  const fetchedAtMs = Date.parse(fetchedAt);
  if (Number.isNaN(fetchedAtMs)) {
    return '⚠️ <i>Live data is unavailable. Showing cached data.</i>';
  }
  const age = Math.max(0, now.getTime() - fetchedAtMs);
  return `⚠️ <i>Live data is unavailable. Showing cached data from ${formatDuration(age)} ago.</i>`;
}

export function formatNotificationSettings(settings: NotificationSettings): string {
  return (
    `🔔 <b>Notification settings</b>\n\n` +
    `Notifications: ${settings.enabled ? 'on ✅' : 'off ❌'}\n` +
    `Interval: every ${settings.intervalHours} h`
  );
}
