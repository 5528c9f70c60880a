/**
 * JSON File Record Store
 *
 * Persists the whole cache as one human-readable JSON array:
 *
 * ```json
 * [
 *   {
 *     "kind": "current-weather",
 *     "key": { "city": "moscow" },
 *     "fetchedAt": "2024-05-01T09:30:00.000Z",
 *     "payload": { "name": "Moscow", "main": { "temp": 12.4 } }
 *   },
 *   {
 *     "kind": "air-quality",
 *     "key": { "lat": 55.7558, "lon": 37.6176 },
 *     "fetchedAt": "2024-05-01T09:31:12.000Z",
 *     "payload": { "list": [] }
 *   }
 * ]
 * ```
 *
 * A missing, empty or unparseable file loads as an empty cache. Elements that
 * do not match the entry shape are skipped; the next write drops them.
 */

import { z } from 'zod';
import { JsonValueSchema } from '../schemas.js';
import { JsonDocumentFile } from '../storage/json-document.js';
import type { PersistenceResult } from '../types.js';
import type { CacheEntry, CacheKey, RecordStore } from './types.js';

// Any city string upsert can produce must load back, the empty name included
const StoredKeySchema = z.union([
  z.object({ city: z.string() }).strict(),
  z.object({ lat: z.number(), lon: z.number() }).strict(),
]);

const StoredEntrySchema = z.object({
  kind: z.string().min(1),
  key: StoredKeySchema,
  fetchedAt: z.string(),
  payload: JsonValueSchema,
});

type StoredKey = z.infer<typeof StoredKeySchema>;
type StoredEntry = z.infer<typeof StoredEntrySchema>;

function toStoredKey(key: CacheKey): StoredKey {
  return key.type === 'city' ? { city: key.city } : { lat: key.lat, lon: key.lon };
}

function fromStoredKey(key: StoredKey): CacheKey {
  return 'city' in key
    ? { type: 'city', city: key.city }
    : { type: 'coordinates', lat: key.lat, lon: key.lon };
}

function toStoredEntry(entry: CacheEntry): StoredEntry {
  return {
    kind: entry.kind,
    key: toStoredKey(entry.key),
    fetchedAt: entry.fetchedAt,
    payload: entry.payload,
  };
}

export class JsonFileRecordStore implements RecordStore {
  private readonly document: JsonDocumentFile;

  constructor(readonly filePath: string) {
    this.document = new JsonDocumentFile(filePath);
  }

  async load(): Promise<CacheEntry[]> {
    const result = await this.document.read();

    switch (result.status) {
      case 'missing':
      case 'empty':
        return [];
      case 'unreadable':
      case 'corrupt':
        console.warn(`⚠️  Cache file ${this.filePath} is ${result.status}, treating as empty:`, result.error.message);
        return [];
      case 'ok':
        break;
    }

    if (!Array.isArray(result.value)) {
      console.warn(`⚠️  Cache file ${this.filePath} does not hold an array, treating as empty`);
      return [];
    }

    const entries: CacheEntry[] = [];
    let skipped = 0;
    for (const element of result.value) {
      const parsed = StoredEntrySchema.safeParse(element);
      if (!parsed.success) {
        skipped++;
        continue;
      }
      entries.push({
        kind: parsed.data.kind,
        key: fromStoredKey(parsed.data.key),
        fetchedAt: parsed.data.fetchedAt,
        payload: parsed.data.payload,
      });
    }

    if (skipped > 0) {
      console.warn(`⚠️  Skipped ${skipped} malformed cache entries in ${this.filePath}`);
    }

    return entries;
  }

  async replace(entries: readonly CacheEntry[]): Promise<PersistenceResult> {
    return this.document.write(entries.map(toStoredEntry));
  }
}
