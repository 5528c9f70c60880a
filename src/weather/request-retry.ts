/**
 * HTTP GET with exponential backoff
 *
 * Attempt n waits `baseDelayMs * 2^(n-1)` before retrying:
 * - 401 and 404 fail immediately (retrying cannot help)
 * - 429, other non-2xx statuses and network errors are retried
 * - a body that is not JSON fails immediately
 */

import { setTimeout as sleep } from 'timers/promises';
import { WeatherApiError } from '../errors.js';
import { JsonValueSchema } from '../schemas.js';
import { ErrorType, type JsonValue } from '../types.js';
import { normalizeError } from '../utils.js';

export interface RequestOptions {
  /** Total attempts including the first (minimum 1) */
  maxAttempts: number;
  baseDelayMs: number;
  fetchImpl: typeof fetch;
  /** Message used when the API answers 404 */
  notFoundMessage?: string;
}

export function backoffDelay(baseDelayMs: number, attempt: number): number {
  return baseDelayMs * Math.pow(2, attempt - 1);
}

function statusError(status: number, endpoint: string, notFoundMessage?: string): WeatherApiError {
  switch (status) {
    case 401:
      return new WeatherApiError('Invalid API key (HTTP 401). Check OPENWEATHER_API_KEY.', ErrorType.AUTH, 401);
    case 404:
      return new WeatherApiError(notFoundMessage ?? `Not found: ${endpoint}`, ErrorType.NOT_FOUND, 404);
    case 429:
      return new WeatherApiError(`Too many requests to ${endpoint} (HTTP 429)`, ErrorType.RATE_LIMIT, 429);
    default:
      return new WeatherApiError(`Request to ${endpoint} failed with HTTP ${status}`, ErrorType.UPSTREAM, status);
  }
}

export async function requestJson(url: URL, options: RequestOptions): Promise<JsonValue> {
  const maxAttempts = Math.max(1, options.maxAttempts);
  // Never log the query string: it carries the API key
  const endpoint = url.pathname;
  let lastError: WeatherApiError | null = null;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (lastError) {
      const delayMs = backoffDelay(options.baseDelayMs, attempt - 1);
      console.warn(`⚠️  ${lastError.message}. Retrying in ${delayMs}ms (attempt ${attempt}/${maxAttempts})`);
      await sleep(delayMs);
    }

    let response: Response;
    try {
      response = await options.fetchImpl(url);
    } catch (error) {
      lastError = new WeatherApiError(
        `Network error calling ${endpoint}: ${normalizeError(error).message}`,
        ErrorType.UPSTREAM
      );
      continue;
    }

    if (!response.ok) {
      const error = statusError(response.status, endpoint, options.notFoundMessage);
      // Release the connection; the body of a failed response is never read
      await response.body?.cancel();
      if (!error.retryable) {
        throw error;
      }
      lastError = error;
      continue;
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new WeatherApiError(`Response from ${endpoint} is not valid JSON`, ErrorType.INVALID_RESPONSE, response.status);
    }

    const parsed = JsonValueSchema.safeParse(body);
    if (!parsed.success) {
      throw new WeatherApiError(`Response from ${endpoint} is not valid JSON`, ErrorType.INVALID_RESPONSE, response.status);
    }
    return parsed.data;
  }

  console.error(`✗ Giving up on ${endpoint} after ${maxAttempts} attempts`);
  throw lastError ?? new WeatherApiError(`Request to ${endpoint} failed`, ErrorType.UPSTREAM);
}
