/**
 * Reply and inline keyboards
 */

import {
  RELAY_CONFIG,
  buildNavigationControls,
  encodeCallbackData,
  navigationCallbackData,
  type PagingTarget,
  type ShareSummary,
} from '@relayshare/shared';
import type {
  InlineKeyboardButton,
  InlineKeyboardMarkup,
  ReplyKeyboardMarkup,
} from '@/infrastructure/telegram';
import { BUTTONS } from './messages';

export function mainMenuKeyboard(): ReplyKeyboardMarkup {
  return {
    keyboard: [[{ text: BUTTONS.UPLOAD }, { text: BUTTONS.MY_FILES }], [{ text: BUTTONS.HELP }]],
    resize_keyboard: true,
  };
}

export function uploadKeyboard(): ReplyKeyboardMarkup {
  return {
    keyboard: [[{ text: BUTTONS.FINISH }], [{ text: BUTTONS.CANCEL }]],
    resize_keyboard: true,
  };
}

/**
 * Navigation rows for a page; empty when there is only one page
 */
export function navigationRows(page: number, totalPages: number, target: PagingTarget): InlineKeyboardButton[][] {
  return buildNavigationControls(page, totalPages, RELAY_CONFIG.MAX_PAGE_CONTROLS).map((row) =>
    row.map((control) => ({
      text: control.label,
      callback_data: encodeCallbackData(navigationCallbackData(target, control.action)),
    }))
  );
}

export function navigationKeyboard(page: number, totalPages: number, target: PagingTarget): InlineKeyboardMarkup | undefined {
  const rows = navigationRows(page, totalPages, target);
  return rows.length > 0 ? { inline_keyboard: rows } : undefined;
}

export function restrictedKeyboard(inviteLink: string, retryLink: string): InlineKeyboardMarkup {
  return {
    inline_keyboard: [[{ text: BUTTONS.JOIN_GROUP, url: inviteLink }], [{ text: BUTTONS.TRY_AGAIN, url: retryLink }]],
  };
}

export function redirectKeyboard(link: string): InlineKeyboardMarkup {
  return { inline_keyboard: [[{ text: BUTTONS.OPEN_PRIVATE, url: link }]] };
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 1)}…` : text;
}

/**
 * One info and one delete button per share, then the listing navigation
 */
export function listingKeyboard(shares: readonly ShareSummary[], page: number, totalPages: number): InlineKeyboardMarkup {
  const rows: InlineKeyboardButton[][] = shares.map((share) => [
    {
      text: `📄 ${truncate(share.caption, RELAY_CONFIG.LISTING_CAPTION_PREVIEW_LENGTH)} (${share.itemCount})`,
      callback_data: encodeCallbackData({ action: 'info', shareToken: share.shareToken }),
    },
    {
      text: '🗑️',
      callback_data: encodeCallbackData({ action: 'delete', shareToken: share.shareToken, page }),
    },
  ]);
  rows.push(...navigationRows(page, totalPages, { kind: 'listing' }));
  return { inline_keyboard: rows };
}
