/**
 * Sends each user the current weather for their saved city once their
 * notification interval has elapsed.
 */

import { formatCurrentWeather, formatStaleNotice } from '../formatting/messages.js';
import type { UserSettingsStore } from '../settings/user-settings-store.js';
import { normalizeError } from '../utils.js';
import type { Units } from '../weather/openweather-client.js';
import type { WeatherService } from '../weather/weather-service.js';
import { isNotificationDue, notificationSettings, savedLocation } from './policy.js';

/** Delivers one message to one user */
export type NotificationSender = (userId: string, text: string) => Promise<void>;

export type NotificationOutcome =
  | { userId: string; status: 'sent' }
  | { userId: string; status: 'skipped'; reason: 'disabled' | 'not-due' | 'no-location' }
  | { userId: string; status: 'failed'; reason: string };

export interface NotificationCheckerOptions {
  units?: Units;
}

export const NOTIFICATION_HEADER = '🔔 <b>Your weather notification</b>';

export class NotificationChecker {
  private readonly units: Units;

  constructor(
    private readonly settings: UserSettingsStore,
    private readonly weather: WeatherService,
    private readonly send: NotificationSender,
    options: NotificationCheckerOptions = {}
  ) {
    this.units = options.units ?? 'metric';
  }

  async check(userId: string, now: Date = new Date()): Promise<NotificationOutcome> {
    const settings = await this.settings.load(userId);
    const status = isNotificationDue(settings, now);
    const location = savedLocation(settings);
    if (status !== 'due' || !location) {
      return { userId, status: 'skipped', reason: status === 'due' ? 'no-location' : status };
    }

    const result = await this.weather.getCurrentWeatherByCity(location.city);
    if (!result.ok) {
      console.warn(`⚠️  Notification for user ${userId} skipped:`, result.error.message);
      return { userId, status: 'failed', reason: result.error.message };
    }

    let text = formatCurrentWeather(result.data, this.units);
    if (result.source === 'stale') {
      text += `\n\n${formatStaleNotice(result.fetchedAt, now)}`;
    }

    try {
      await this.send(userId, NOTIFICATION_HEADER);
      await this.send(userId, text);
    } catch (error) {
      const message = normalizeError(error).message;
      console.error(`✗ Could not deliver notification to user ${userId}:`, message);
      return { userId, status: 'failed', reason: message };
    }

    // A failed save is logged by the store; the message has already gone out
    await this.settings.update(userId, current => ({
      ...current,
      notifications: { ...notificationSettings(current), lastNotifiedAt: now.toISOString() },
    }));

    return { userId, status: 'sent' };
  }

  /**
   * Check every stored user, one at a time
   */
  async checkAll(now: Date = new Date()): Promise<NotificationOutcome[]> {
    const outcomes: NotificationOutcome[] = [];
    for (const userId of await this.settings.listUserIds()) {
      outcomes.push(await this.check(userId, now));
    }
    return outcomes;
  }
}
