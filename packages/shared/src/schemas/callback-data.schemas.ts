/**
 * Callback Data Schemas
 *
 * Inline buttons carry their action in a short colon-separated string
 * (Telegram limits callback data to 64 bytes):
 *
 * - `spage:<page>:<token>` navigate a shared file page
 * - `page:<page>`          navigate the owner's share listing
 * - `info:<token>`         show the link of a share
 * - `delete:<token>:<page>` delete a share, then redisplay listing page
 * - `noop`                 disabled control
 *
 * @module @relayshare/shared/schemas/callback-data
 */

import { z } from 'zod';
import { CALLBACK_ACTION } from '../constants/relay.constants';
import type { NavigationAction, PagingTarget } from '../types/pagination.types';

/**
 * Share tokens are base64url strings
 */
export const shareTokenSchema = z
  .string()
  .regex(/^[A-Za-z0-9_-]{6,32}$/, 'Invalid share token');

const pageNumberSchema = z.coerce.number().int().positive();

export const callbackDataSchema = z.discriminatedUnion('action', [
  z.object({
    action: z.literal(CALLBACK_ACTION.SHARE_PAGE),
    page: pageNumberSchema,
    shareToken: shareTokenSchema,
  }),
  z.object({
    action: z.literal(CALLBACK_ACTION.LISTING_PAGE),
    page: pageNumberSchema,
  }),
  z.object({
    action: z.literal(CALLBACK_ACTION.INFO),
    shareToken: shareTokenSchema,
  }),
  z.object({
    action: z.literal(CALLBACK_ACTION.DELETE),
    shareToken: shareTokenSchema,
    page: pageNumberSchema,
  }),
  z.object({
    action: z.literal(CALLBACK_ACTION.NOOP),
  }),
]);

export type CallbackData = z.infer<typeof callbackDataSchema>;

/**
 * Serialize callback data for an inline button
 */
export function encodeCallbackData(data: CallbackData): string {
  switch (data.action) {
    case CALLBACK_ACTION.SHARE_PAGE:
      return `${data.action}:${data.page}:${data.shareToken}`;
    case CALLBACK_ACTION.LISTING_PAGE:
      return `${data.action}:${data.page}`;
    case CALLBACK_ACTION.INFO:
      return `${data.action}:${data.shareToken}`;
    case CALLBACK_ACTION.DELETE:
      return `${data.action}:${data.shareToken}:${data.page}`;
    case CALLBACK_ACTION.NOOP:
      return data.action;
  }
}

/**
 * Parse callback data received from a button press
 *
 * @returns Parsed data, or null when the string is malformed or unknown
 */
export function parseCallbackData(raw: string): CallbackData | null {
  const [action, first, second] = raw.split(':');

  let candidate: Record<string, unknown>;
  switch (action) {
    case CALLBACK_ACTION.SHARE_PAGE:
      candidate = { action, page: first, shareToken: second };
      break;
    case CALLBACK_ACTION.LISTING_PAGE:
      candidate = { action, page: first };
      break;
    case CALLBACK_ACTION.INFO:
      candidate = { action, shareToken: first };
      break;
    case CALLBACK_ACTION.DELETE:
      candidate = { action, shareToken: first, page: second };
      break;
    case CALLBACK_ACTION.NOOP:
      candidate = { action };
      break;
    default:
      return null;
  }

  const result = callbackDataSchema.safeParse(candidate);
  return result.success ? result.data : null;
}

/**
 * Callback data for a navigation control acting on `target`
 */
export function navigationCallbackData(target: PagingTarget, action: NavigationAction): CallbackData {
  if (action.type === 'noop') {
    return { action: CALLBACK_ACTION.NOOP };
  }
  return target.kind === 'share'
    ? { action: CALLBACK_ACTION.SHARE_PAGE, page: action.page, shareToken: target.shareToken }
    : { action: CALLBACK_ACTION.LISTING_PAGE, page: action.page };
}
