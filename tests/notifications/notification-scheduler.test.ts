import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { CacheManager } from '../../src/caching/cache-manager.js';
import { MemoryRecordStore } from '../../src/caching/memory-record-store.js';
import { NotificationChecker, type NotificationOutcome } from '../../src/notifications/notification-checker.js';
import { NotificationScheduler } from '../../src/notifications/notification-scheduler.js';
import { UserSettingsStore } from '../../src/settings/user-settings-store.js';
import { OpenWeatherClient } from '../../src/weather/openweather-client.js';
import { WeatherService } from '../../src/weather/weather-service.js';

function createChecker(): NotificationChecker {
  const api = new OpenWeatherClient({ apiKey: 'test-key', fetchImpl: vi.fn<typeof fetch>() });
  const service = new WeatherService(api, new CacheManager(new MemoryRecordStore(), { ttlMs: 1000 }));
  return new NotificationChecker(new UserSettingsStore('/nonexistent/user_settings.json'), service, vi.fn());
}

describe('NotificationScheduler', () => {
  let checker: NotificationChecker;

  beforeEach(() => {
    vi.useFakeTimers();
    checker = createChecker();
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('should_rejectNonPositiveInterval', () => {
    expect(() => new NotificationScheduler(checker, { intervalMs: 0 })).toThrow('intervalMs must be a positive number');
  });

  it('should_checkAllUsersOnEveryTickUntilStopped', async () => {
    const checkAll = vi.spyOn(checker, 'checkAll').mockResolvedValue([]);
    const scheduler = new NotificationScheduler(checker, { intervalMs: 60_000 });

    scheduler.start();
    expect(scheduler.isRunning).toBe(true);
    await vi.advanceTimersByTimeAsync(120_000);
    expect(checkAll).toHaveBeenCalledTimes(2);

    scheduler.stop();
    expect(scheduler.isRunning).toBe(false);
    await vi.advanceTimersByTimeAsync(120_000);
    expect(checkAll).toHaveBeenCalledTimes(2);
  });

  it('should_ignoreSecondStart', async () => {
    const checkAll = vi.spyOn(checker, 'checkAll').mockResolvedValue([]);
    const scheduler = new NotificationScheduler(checker, { intervalMs: 60_000 });

    scheduler.start();
    scheduler.start();
    await vi.advanceTimersByTimeAsync(60_000);
    scheduler.stop();

    expect(checkAll).toHaveBeenCalledTimes(1);
  });

  it('should_skipRunWhilePreviousOneIsInProgress', async () => {
    let finish: (outcomes: NotificationOutcome[]) => void = () => {};
    vi.spyOn(checker, 'checkAll').mockImplementation(
      () => new Promise<NotificationOutcome[]>(resolve => {
        finish = resolve;
      })
    );
    const scheduler = new NotificationScheduler(checker, { intervalMs: 60_000 });

    const first = scheduler.runOnce();
    expect(await scheduler.runOnce()).toBeNull();

    finish([]);
    expect(await first).toEqual([]);
  });

  it('should_logHowManyNotificationsWereSent', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(checker, 'checkAll').mockResolvedValue([
      { userId: '1', status: 'sent' },
      { userId: '2', status: 'skipped', reason: 'disabled' },
    ]);

    await new NotificationScheduler(checker, { intervalMs: 60_000 }).runOnce();

    expect(errorSpy).toHaveBeenCalledWith('🔔 Sent 1 weather notification');
  });

  it('should_logFailedRunInsteadOfThrowing', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(checker, 'checkAll').mockRejectedValue(new Error('settings unavailable'));

    expect(await new NotificationScheduler(checker, { intervalMs: 60_000 }).runOnce()).toBeNull();
    expect(errorSpy).toHaveBeenCalledWith('✗ Notification check failed:', 'settings unavailable');
  });
});
