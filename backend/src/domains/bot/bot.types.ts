import type { PrincipalId } from '@relayshare/shared';

/**
 * Who sent an update and where to answer
 */
export interface BotContext {
  principalId: PrincipalId;
  chatId: number;
  displayName: string;
}

/**
 * Toast shown for a button press
 */
export interface CallbackAnswer {
  text?: string;
  showAlert?: boolean;
}
