import type { PersistenceResult } from '../types.js';
import type { CacheEntry, RecordStore } from './types.js';

/**
 * In-process record store. Hands out deep copies so callers cannot reach
 * into stored state.
 */
export class MemoryRecordStore implements RecordStore {
  private entries: CacheEntry[];
  private writes = 0;

  constructor(initial: readonly CacheEntry[] = []) {
    this.entries = structuredClone([...initial]);
  }

  load(): Promise<CacheEntry[]> {
    return Promise.resolve(structuredClone(this.entries));
  }

  replace(entries: readonly CacheEntry[]): Promise<PersistenceResult> {
    this.entries = structuredClone([...entries]);
    this.writes++;
    return Promise.resolve({ ok: true });
  }

  /**
   * Number of completed replace() calls
   */
  get writeCount(): number {
    return this.writes;
  }
}
