import { describe, it, expect } from 'vitest';
import {
  cycleNotificationInterval,
  isNotificationDue,
  nextNotificationInterval,
  savedLocation,
  toggleNotifications,
} from '../../src/notifications/policy.js';
import type { UserSettings } from '../../src/settings/user-settings-store.js';

const NOW = new Date('2024-05-01T12:00:00.000Z');
const located: UserSettings = { city: 'Oslo', lat: 59.91, lon: 10.75 };

describe('notification policy', () => {
  describe('toggleNotifications', () => {
    it('should_enableNotificationsWithDefaultInterval', () => {
      expect(toggleNotifications(located)).toEqual({ ...located, notifications: { enabled: true, intervalHours: 3 } });
    });

    it('should_disableNotificationsAndKeepRest', () => {
      const settings: UserSettings = {
        notifications: { enabled: true, intervalHours: 6, lastNotifiedAt: '2024-05-01T00:00:00.000Z' },
      };

      expect(toggleNotifications(settings)).toEqual({
        notifications: { enabled: false, intervalHours: 6, lastNotifiedAt: '2024-05-01T00:00:00.000Z' },
      });
    });
  });

  describe('nextNotificationInterval', () => {
    it('should_cycle1To3To6To12To24To1', () => {
      expect([1, 3, 6, 12, 24].map(nextNotificationInterval)).toEqual([3, 6, 12, 24, 1]);
    });

    it('should_resetUnknownIntervalTo3', () => {
      expect(nextNotificationInterval(2)).toBe(3);
      expect(nextNotificationInterval(48)).toBe(3);
    });
  });

  describe('cycleNotificationInterval', () => {
    it('should_startFromDefaults_when_nothingIsStored', () => {
      expect(cycleNotificationInterval({})).toEqual({ notifications: { enabled: false, intervalHours: 6 } });
    });
  });

  describe('savedLocation', () => {
    it('should_acceptZeroCoordinates', () => {
      expect(savedLocation({ city: 'Null Island', lat: 0, lon: 0 })).toEqual({ city: 'Null Island', lat: 0, lon: 0 });
    });

    it('should_requireCityAndBothCoordinates', () => {
      expect(savedLocation({ city: 'Oslo', lat: 59.91 })).toBeNull();
      expect(savedLocation({ lat: 1, lon: 2 })).toBeNull();
    });
  });

  describe('isNotificationDue', () => {
    it('should_beDisabledByDefault', () => {
      expect(isNotificationDue(located, NOW)).toBe('disabled');
    });

    it('should_beDue_when_neverNotified', () => {
      expect(isNotificationDue({ ...located, notifications: { enabled: true, intervalHours: 3 } }, NOW)).toBe('due');
    });

    it('should_notBeDueBeforeIntervalHasPassed', () => {
      const settings: UserSettings = {
        ...located,
        notifications: { enabled: true, intervalHours: 3, lastNotifiedAt: '2024-05-01T09:00:00.001Z' },
      };

      expect(isNotificationDue(settings, NOW)).toBe('not-due');
    });

    it('should_beDueOnceIntervalHasPassedExactly', () => {
      const settings: UserSettings = {
        ...located,
        notifications: { enabled: true, intervalHours: 3, lastNotifiedAt: '2024-05-01T09:00:00.000Z' },
      };

      expect(isNotificationDue(settings, NOW)).toBe('due');
    });

    it('should_treatUnreadableTimestampAsNeverNotified', () => {
      const settings: UserSettings = {
        ...located,
        notifications: { enabled: true, intervalHours: 3, lastNotifiedAt: 'soon' },
      };

      expect(isNotificationDue(settings, NOW)).toBe('due');
    });

    it('should_reportMissingLocation', () => {
      expect(isNotificationDue({ notifications: { enabled: true, intervalHours: 1 } }, NOW)).toBe('no-location');
    });
  });
});
