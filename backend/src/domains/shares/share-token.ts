import { randomBytes } from 'node:crypto';
import { RELAY_CONFIG } from '@relayshare/shared';

/**
 * New unguessable share token: 8 random bytes, base64url (11 characters)
 */
export function generateShareToken(): string {
  return randomBytes(RELAY_CONFIG.SHARE_TOKEN_BYTES).toString('base64url');
}
