/**
 * Utility functions for weather-lookup
 */

import type { ErrorResponse, ErrorType } from './types.js';

/**
 * Type guard for Error instances (including subclasses)
 */
export function isError(value: unknown): value is Error {
  return value instanceof Error;
}

/**
 * Type guard for Node.js system errors (anything carrying a string `code`)
 *
 * Replaces `error as NodeJS.ErrnoException` casts around fs calls.
 */
export function isErrnoException(value: unknown): value is NodeJS.ErrnoException {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return 'code' in value && typeof value.code === 'string';
}

/**
 * Normalize an unknown thrown value to an Error
 *
 * Error instances are returned as-is (stack preserved). Strings become the
 * message verbatim, other values are serialized with JSON.stringify and fall
 * back to String() when serialization fails (circular references).
 */
export function normalizeError(error: unknown): Error {
  if (isError(error)) {
    return error;
  }
  if (typeof error === 'string') {
    return new Error(error);
  }
  if (typeof error === 'object' && error !== null) {
    try {
      return new Error(JSON.stringify(error));
    } catch {
      return new Error(String(error));
    }
  }
  return new Error(String(error));
}

/**
 * Format error response with actionable message
 */
export function formatErrorResponse(
  error: unknown,
  errorType: ErrorType,
  suggestion?: string
): ErrorResponse {
  return {
    error: normalizeError(error).message,
    errorType,
    suggestion,
  };
}

/**
 * Format duration in human-readable form
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(2)}s`;
  }
  if (ms < 3600000) {
    const minutes = Math.floor(ms / 60000);
    const seconds = ((ms % 60000) / 1000).toFixed(0);
    return `${minutes}m ${seconds}s`;
  }
  const hours = Math.floor(ms / 3600000);
  const minutes = Math.floor((ms % 3600000) / 60000);
  return `${hours}h ${minutes}m`;
}
