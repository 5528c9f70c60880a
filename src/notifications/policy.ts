/**
 * Notification settings rules. Pure functions over UserSettings.
 */

import type { NotificationSettings, SavedLocation, UserSettings } from '../settings/user-settings-store.js';

export const DEFAULT_NOTIFICATION_SETTINGS: NotificationSettings = { enabled: false, intervalHours: 3 };

/** Intervals offered to the user, in the order they cycle through */
export const NOTIFICATION_INTERVALS_HOURS = [1, 3, 6, 12, 24] as const;

export type NotificationStatus = 'disabled' | 'not-due' | 'no-location' | 'due';

const HOUR_MS = 60 * 60 * 1000;

export function notificationSettings(settings: UserSettings): NotificationSettings {
  return settings.notifications ?? DEFAULT_NOTIFICATION_SETTINGS;
}

export function nextNotificationInterval(current: number): number {
  const index = NOTIFICATION_INTERVALS_HOURS.findIndex(hours => hours === current);
  if (index === -1) {
    return DEFAULT_NOTIFICATION_SETTINGS.intervalHours;
  }
  return NOTIFICATION_INTERVALS_HOURS[(index + 1) % NOTIFICATION_INTERVALS_HOURS.length] ?? current;
}

export function toggleNotifications(settings: UserSettings): UserSettings {
  const notifications = notificationSettings(settings);
  return { ...settings, notifications: { ...notifications, enabled: !notifications.enabled } };
}

export function cycleNotificationInterval(settings: UserSettings): UserSettings {
  const notifications = notificationSettings(settings);
  return {
    ...settings,
    notifications: { ...notifications, intervalHours: nextNotificationInterval(notifications.intervalHours) },
  };
}

/**
 * The saved location, or null unless city and both coordinates are present
 */
export function savedLocation(settings: UserSettings): SavedLocation | null {
  const { city, lat, lon } = settings;
  if (!city || lat === undefined || lon === undefined) {
    return null;
  }
  return { city, lat, lon };
}

export function isNotificationDue(settings: UserSettings, now: Date): NotificationStatus {
  const notifications = notificationSettings(settings);
  if (!notifications.enabled) {
    return 'disabled';
  }

  if (notifications.lastNotifiedAt !== undefined) {
    const last = Date.parse(notifications.lastNotifiedAt);
    if (!Number.isNaN(last) && now.getTime() - last < notifications.intervalHours * HOUR_MS) {
      return 'not-due';
    }
  }

  return savedLocation(settings) ? 'due' : 'no-location';
}
