/**
 * Bot Transport Port
 *
 * The operations the relay needs from the messaging platform. Domain
 * services depend on this interface; TelegramClient implements it and tests
 * substitute an in-process fake.
 *
 * @module infrastructure/telegram/IBotTransport
 */

import type { ChatMemberStatus, InlineKeyboardMarkup, ReplyMarkup } from './telegram.types';

export type ChatId = number | string;

export interface SendMessageOptions {
  replyMarkup?: ReplyMarkup;
  replyToMessageId?: number;
  disableLinkPreview?: boolean;
}

export interface SentMessage {
  messageId: number;
}

export interface IBotTransport {
  sendMessage(chatId: ChatId, text: string, options?: SendMessageOptions): Promise<SentMessage>;

  editMessageText(
    chatId: ChatId,
    messageId: number,
    text: string,
    options?: { replyMarkup?: InlineKeyboardMarkup }
  ): Promise<void>;

  deleteMessage(chatId: ChatId, messageId: number): Promise<void>;

  deleteMessages(chatId: ChatId, messageIds: readonly number[]): Promise<void>;

  /**
   * Forward messages, keeping their origin. Returns the new message ids
   * in input order; messages the platform skipped are absent.
   */
  forwardMessages(toChatId: ChatId, fromChatId: ChatId, messageIds: readonly number[]): Promise<number[]>;

  /**
   * Copy messages without a forward header. Same result contract as
   * forwardMessages.
   */
  copyMessages(toChatId: ChatId, fromChatId: ChatId, messageIds: readonly number[]): Promise<number[]>;

  answerCallbackQuery(callbackQueryId: string, options?: { text?: string; showAlert?: boolean }): Promise<void>;

  getChatMemberStatus(chatId: ChatId, userId: number): Promise<ChatMemberStatus>;
}
