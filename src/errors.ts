/**
 * Error classes for weather-lookup
 */

import { ErrorType } from './types.js';

/**
 * A JSON document could not be written (disk full, permissions, bad path).
 *
 * Returned as a value from store writes, never thrown to end users.
 */
export class PersistenceError extends Error {
  readonly errorType = ErrorType.PERSISTENCE;

  constructor(
    message: string,
    readonly path: string,
    readonly cause?: Error
  ) {
    super(message);
    this.name = 'PersistenceError';
  }
}

/**
 * Failure talking to the upstream weather API
 */
export class WeatherApiError extends Error {
  constructor(
    message: string,
    readonly errorType: ErrorType,
    readonly status?: number
  ) {
    super(message);
    this.name = 'WeatherApiError';
  }

  /**
   * Whether a later attempt could succeed (network trouble, 5xx, throttling)
   */
  get retryable(): boolean {
    return this.errorType === ErrorType.UPSTREAM || this.errorType === ErrorType.RATE_LIMIT;
  }
}
