/**
 * Share deep links of the form https://t.me/<bot>?start=<token>
 */

import { shareTokenSchema } from '@relayshare/shared';

export function shareLink(botUsername: string, shareToken: string): string {
  return `https://t.me/${botUsername}?start=${shareToken}`;
}

export function botLink(botUsername: string): string {
  return `https://t.me/${botUsername}`;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Share token of a pasted deep link to this bot, or null
 */
export function extractShareToken(text: string, botUsername: string): string | null {
  const pattern = new RegExp(`https?://t\\.me/${escapeRegExp(botUsername)}\\?start=([A-Za-z0-9_-]+)`, 'i');
  const candidate = pattern.exec(text)?.[1];
  if (!candidate) {
    return null;
  }
  return shareTokenSchema.safeParse(candidate).success ? candidate : null;
}

/**
 * Payload of `/start <payload>`, or null for a bare `/start`
 */
export function parseStartPayload(text: string): string | null {
  const match = /^\/start(?:@\w+)?(?:\s+(\S+))?\s*$/.exec(text.trim());
  return match?.[1] ?? null;
}
