/**
 * Per-user settings persisted as one JSON object keyed by user id:
 *
 * ```json
 * {
 *   "42": {
 *     "city": "Moscow",
 *     "lat": 55.7558,
 *     "lon": 37.6176,
 *     "notifications": { "enabled": true, "intervalHours": 3 }
 *   }
 * }
 * ```
 *
 * Reads never fail: a missing or corrupt document holds no users, and a user
 * whose settings do not validate reads as `{}`.
 */

import AsyncLock from 'async-lock';
import { z } from 'zod';
import { JsonDocumentFile } from '../storage/json-document.js';
import type { PersistenceResult } from '../types.js';

export const NotificationSettingsSchema = z.object({
  enabled: z.boolean(),
  intervalHours: z.number().positive(),
  /** ISO-8601 time of the last notification sent */
  lastNotifiedAt: z.string().optional(),
});

export const UserSettingsSchema = z.object({
  city: z.string().min(1).optional(),
  lat: z.number().optional(),
  lon: z.number().optional(),
  notifications: NotificationSettingsSchema.optional(),
});

export type NotificationSettings = z.infer<typeof NotificationSettingsSchema>;
export type UserSettings = z.infer<typeof UserSettingsSchema>;

export interface SavedLocation {
  city: string;
  lat: number;
  lon: number;
}

export interface SettingsUpdate {
  settings: UserSettings;
  result: PersistenceResult;
}

const SETTINGS_LOCK_KEY = 'user-settings';

export class UserSettingsStore {
  private readonly document: JsonDocumentFile;
  private readonly lock = new AsyncLock();

  constructor(readonly filePath: string) {
    this.document = new JsonDocumentFile(filePath);
  }

  async load(userId: string): Promise<UserSettings> {
    const users = await this.lock.acquire(SETTINGS_LOCK_KEY, () => this.readAll());
    return users.get(userId) ?? {};
  }

  async save(userId: string, settings: UserSettings): Promise<PersistenceResult> {
    const { result } = await this.update(userId, () => settings);
    return result;
  }

  /**
   * Load, change and save one user's settings as a single step. Concurrent
   * updates for different users never overwrite each other.
   */
  async update(userId: string, mutate: (current: UserSettings) => UserSettings): Promise<SettingsUpdate> {
    const update = await this.lock.acquire(SETTINGS_LOCK_KEY, async (): Promise<SettingsUpdate> => {
      const users = await this.readAll();
      const settings = mutate(structuredClone(users.get(userId) ?? {}));
      users.set(userId, settings);
      const result = await this.document.write(Object.fromEntries(users));
      return { settings, result };
    });

    if (!update.result.ok) {
      console.error(`⚠️  Failed to save settings for user ${userId}:`, update.result.error.message);
    }

    return update;
  }

  async listUserIds(): Promise<string[]> {
    const users = await this.lock.acquire(SETTINGS_LOCK_KEY, () => this.readAll());
    return [...users.keys()];
  }

  rememberLocation(userId: string, location: SavedLocation): Promise<SettingsUpdate> {
    return this.update(userId, current => ({ ...current, ...location }));
  }

  private async readAll(): Promise<Map<string, UserSettings>> {
    const users = new Map<string, UserSettings>();
    const result = await this.document.read();

    if (result.status === 'unreadable' || result.status === 'corrupt') {
      console.warn(`⚠️  Settings file ${this.filePath} is ${result.status}, treating as empty:`, result.error.message);
      return users;
    }
    if (result.status !== 'ok') {
      return users;
    }

    const document = z.record(z.unknown()).safeParse(result.value);
    if (!document.success) {
      console.warn(`⚠️  Settings file ${this.filePath} does not hold an object, treating as empty`);
      return users;
    }

    for (const [userId, value] of Object.entries(document.data)) {
      const parsed = UserSettingsSchema.safeParse(value);
      if (parsed.success) {
        users.set(userId, parsed.data);
      } else {
        console.warn(`⚠️  Ignoring invalid settings for user ${userId} in ${this.filePath}`);
      }
    }

    return users;
  }
}
