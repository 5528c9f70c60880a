/**
 * Shared type definitions for weather-lookup
 */

import type { PersistenceError } from './errors.js';

/**
 * Any value that survives a JSON round trip unchanged
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Error categories used across the cache, the settings store and the API client
 */
export enum ErrorType {
  PERSISTENCE = 'persistence',
  UPSTREAM = 'upstream',
  AUTH = 'auth',
  NOT_FOUND = 'not_found',
  RATE_LIMIT = 'rate_limit',
  INVALID_RESPONSE = 'invalid_response',
}

/**
 * Structured error response (for CLI output and logs)
 */
export interface ErrorResponse {
  /** Error message */
  error: string;
  /** Error category */
  errorType: ErrorType;
  /** Suggestion for fixing */
  suggestion?: string;
}

/**
 * Result of writing a whole JSON document.
 *
 * Stores never throw on write failure; callers log the error and carry on
 * with whatever data they already hold in memory.
 */
export type PersistenceResult =
  | { ok: true }
  | { ok: false; error: PersistenceError };
