import { promises as fs } from 'fs';
import * as path from 'path';
import { PersistenceError } from '../errors.js';
import type { PersistenceResult } from '../types.js';
import { isErrnoException, normalizeError } from '../utils.js';

/**
 * Outcome of reading a JSON document from disk.
 *
 * Only `ok` carries data; every other status means "start from nothing".
 */
export type ReadDocumentResult =
  | { status: 'ok'; value: unknown }
  | { status: 'missing' }
  | { status: 'empty' }
  | { status: 'unreadable'; error: Error }
  | { status: 'corrupt'; error: Error };

/**
 * A single JSON file that is always read and replaced as a whole.
 *
 * Writes go to a temporary sibling which is then renamed over the target,
 * so a concurrent reader sees either the old document or the new one.
 */
export class JsonDocumentFile {
  private writeCounter = 0;

  constructor(readonly filePath: string) {}

  async read(): Promise<ReadDocumentResult> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return { status: 'missing' };
      }
      return { status: 'unreadable', error: normalizeError(error) };
    }

    if (raw.trim().length === 0) {
      return { status: 'empty' };
    }

    try {
      const value: unknown = JSON.parse(raw);
      return { status: 'ok', value };
    } catch (error) {
      return { status: 'corrupt', error: normalizeError(error) };
    }
  }

  async write(value: unknown): Promise<PersistenceResult> {
    this.writeCounter++;
    const tmpPath = `${this.filePath}.${process.pid}.${this.writeCounter}.tmp`;

    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tmpPath, `${JSON.stringify(value, null, 2)}\n`, 'utf-8');
      await fs.rename(tmpPath, this.filePath);
      return { ok: true };
    } catch (error) {
      const err = normalizeError(error);
      await fs.rm(tmpPath, { force: true }).catch((cleanupError: unknown) => {
        console.warn(`⚠️  Could not remove temporary file ${tmpPath}:`, normalizeError(cleanupError).message);
      });
      return {
        ok: false,
        error: new PersistenceError(`Failed to write ${this.filePath}: ${err.message}`, this.filePath, err),
      };
    }
  }
}
