/**
 * Schemas Index
 *
 * Zod schemas shared by the relay service.
 *
 * @module @relayshare/shared/schemas
 */

import { z } from 'zod';

export {
  shareTokenSchema,
  callbackDataSchema,
  encodeCallbackData,
  parseCallbackData,
  navigationCallbackData,
  type CallbackData,
} from './callback-data.schemas';

/**
 * Validate data against a schema without throwing
 *
 * @example
 * ```typescript
 * const result = validateSafe(shareTokenSchema, input);
 * if (result.success) {
 *   console.log(result.data);
 * } else {
 *   console.log(result.error.errors);
 * }
 * ```
 */
export function validateSafe<T extends z.ZodType>(
  schema: T,
  data: unknown
): { success: true; data: z.infer<T> } | { success: false; error: z.ZodError } {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}
