/**
 * Shared zod schemas
 */

import { z } from 'zod';
import type { JsonValue } from './types.js';

/**
 * Any JSON value (recursive). Used to accept upstream bodies and cached
 * payloads without interpreting them.
 */
export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);
