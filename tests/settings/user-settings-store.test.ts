import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { UserSettingsStore } from '../../src/settings/user-settings-store.js';

describe('UserSettingsStore', () => {
  let tempDir: string;
  let settingsPath: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'user-settings-'));
    settingsPath = path.join(tempDir, 'user_settings.json');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should_returnEmptySettingsForUnknownUser', async () => {
    const store = new UserSettingsStore(settingsPath);

    expect(await store.load('42')).toEqual({});
    expect(await store.listUserIds()).toEqual([]);
  });

  it('should_saveAndLoadSettingsKeyedByUserId', async () => {
    const store = new UserSettingsStore(settingsPath);

    expect(await store.save('42', { city: 'Moscow', lat: 55.75, lon: 37.61 })).toEqual({ ok: true });

    expect(await new UserSettingsStore(settingsPath).load('42')).toEqual({ city: 'Moscow', lat: 55.75, lon: 37.61 });
    expect(JSON.parse(await fs.readFile(settingsPath, 'utf-8'))).toEqual({
      '42': { city: 'Moscow', lat: 55.75, lon: 37.61 },
    });
  });

  it('should_keepOtherUsers_when_oneUserIsSaved', async () => {
    const store = new UserSettingsStore(settingsPath);

    await store.save('1', { city: 'Oslo' });
    await store.save('2', { city: 'Rome' });

    expect(await store.listUserIds()).toEqual(['1', '2']);
    expect(await store.load('1')).toEqual({ city: 'Oslo' });
  });

  it('should_applyConcurrentUpdatesWithoutLosingAny', async () => {
    const store = new UserSettingsStore(settingsPath);

    await Promise.all(
      ['a', 'b', 'c', 'd'].map(userId => store.update(userId, current => ({ ...current, city: `City ${userId}` })))
    );

    expect(await store.listUserIds()).toEqual(['a', 'b', 'c', 'd']);
  });

  it('should_handCurrentSettingsToUpdateAndReturnNewOnes', async () => {
    const store = new UserSettingsStore(settingsPath);
    await store.save('42', { city: 'Lima', notifications: { enabled: false, intervalHours: 3 } });

    const { settings, result } = await store.update('42', current => ({
      ...current,
      notifications: { enabled: true, intervalHours: current.notifications?.intervalHours ?? 1 },
    }));

    expect(result).toEqual({ ok: true });
    expect(settings).toEqual({ city: 'Lima', notifications: { enabled: true, intervalHours: 3 } });
    expect(await store.load('42')).toEqual(settings);
  });

  it('should_rememberLocationWithoutTouchingNotifications', async () => {
    const store = new UserSettingsStore(settingsPath);
    await store.save('7', { city: 'Paris', notifications: { enabled: true, intervalHours: 6 } });

    await store.rememberLocation('7', { city: 'Lisbon', lat: 38.72, lon: -9.14 });

    expect(await store.load('7')).toEqual({
      city: 'Lisbon',
      lat: 38.72,
      lon: -9.14,
      notifications: { enabled: true, intervalHours: 6 },
    });
  });

  it('should_treatCorruptFileAsHoldingNoUsers', async () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    await fs.writeFile(settingsPath, '{"42": {"city": ', 'utf-8');
    const store = new UserSettingsStore(settingsPath);

    expect(await store.load('42')).toEqual({});
    expect(warnSpy.mock.calls[0]?.[0]).toBe(`⚠️  Settings file ${settingsPath} is corrupt, treating as empty:`);

    await store.save('42', { city: 'Oslo' });
    expect(await store.load('42')).toEqual({ city: 'Oslo' });
  });

  it('should_treatNonObjectDocumentAsHoldingNoUsers', async () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    await fs.writeFile(settingsPath, '[1, 2, 3]', 'utf-8');

    expect(await new UserSettingsStore(settingsPath).listUserIds()).toEqual([]);
    expect(warnSpy).toHaveBeenCalledWith(`⚠️  Settings file ${settingsPath} does not hold an object, treating as empty`);
  });

  it('should_ignoreUserWhoseSettingsAreInvalid', async () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    await fs.writeFile(
      settingsPath,
      JSON.stringify({ '1': { city: 'Oslo' }, '2': { lat: 'north' } }),
      'utf-8'
    );
    const store = new UserSettingsStore(settingsPath);

    expect(await store.load('2')).toEqual({});
    expect(await store.listUserIds()).toEqual(['1']);
    expect(warnSpy).toHaveBeenCalledWith(`⚠️  Ignoring invalid settings for user 2 in ${settingsPath}`);
  });

  it('should_reportFailedWrite', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const blocker = path.join(tempDir, 'blocker');
    await fs.writeFile(blocker, 'not a directory', 'utf-8');
    const store = new UserSettingsStore(path.join(blocker, 'settings.json'));

    const result = await store.save('42', { city: 'Oslo' });

    expect(result.ok).toBe(false);
    expect(errorSpy.mock.calls[0]?.[0]).toBe('⚠️  Failed to save settings for user 42:');
  });
});
