/**
 * Telegram Bot API Client
 *
 * Direct client for the Bot API over fetch. Every response is validated
 * against its zod schema; failures surface as TelegramApiError.
 */

import { z } from 'zod';
import { createChildLogger } from '@/shared/utils/logger';
import { TelegramApiError } from '@/shared/errors/relay-errors';
import type { ChatId, IBotTransport, SendMessageOptions, SentMessage } from './IBotTransport';
import {
  apiEnvelopeSchema,
  chatMemberSchema,
  messageIdSchema,
  telegramMessageSchema,
  telegramUserSchema,
  type ChatMemberStatus,
  type InlineKeyboardMarkup,
  type TelegramUser,
} from './telegram.types';

/**
 * Bot API limit of message ids per bulk call
 */
export const MAX_IDS_PER_BULK_CALL = 100;

/**
 * Split ids into consecutive runs that are strictly increasing and at most
 * `max` long. Bulk forward and copy calls require increasing ids; sending
 * the runs in order preserves the caller's order.
 */
export function increasingRuns(ids: readonly number[], max: number = MAX_IDS_PER_BULK_CALL): number[][] {
  const runs: number[][] = [];
  let current: number[] = [];

  for (const id of ids) {
    const last = current[current.length - 1];
    if (current.length >= max || (last !== undefined && id <= last)) {
      runs.push(current);
      current = [];
    }
    current.push(id);
  }
  if (current.length > 0) {
    runs.push(current);
  }
  return runs;
}

export interface TelegramClientOptions {
  botToken: string;
  baseUrl?: string;
  fetchImpl?: typeof fetch;
}

type ApiParams = Record<string, unknown>;

export class TelegramClient implements IBotTransport {
  private readonly baseUrl: string;
  private readonly botToken: string;
  private readonly fetchImpl: typeof fetch;
  private readonly log = createChildLogger({ service: 'TelegramClient' });

  constructor(options: TelegramClientOptions) {
    this.botToken = options.botToken;
    this.baseUrl = (options.baseUrl ?? 'https://api.telegram.org').replace(/\/+$/, '');
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  /**
   * Call a Bot API method and validate its result
   *
   * @throws TelegramApiError when the API answers ok=false or the body is not a Bot API envelope
   */
  async call<T>(method: string, params: ApiParams, resultSchema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const body = Object.fromEntries(Object.entries(params).filter(([, value]) => value !== undefined));

    const response = await this.fetchImpl(`${this.baseUrl}/bot${this.botToken}/${method}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });

    let payload: unknown;
    try {
      payload = await response.json();
    } catch {
      throw new TelegramApiError(method, response.status, `${response.status} ${response.statusText}`);
    }

    const envelope = apiEnvelopeSchema.safeParse(payload);
    if (!envelope.success) {
      throw new TelegramApiError(method, response.status, 'Malformed Bot API response');
    }

    if (!envelope.data.ok) {
      const { error_code: errorCode, description, parameters } = envelope.data;
      this.log.warn({ method, errorCode, description }, 'Bot API call failed');
      throw new TelegramApiError(method, errorCode, description, parameters?.retry_after);
    }

    const result = resultSchema.safeParse(envelope.data.result);
    if (!result.success) {
      throw new TelegramApiError(method, response.status, `Unexpected ${method} result shape`);
    }
    return result.data;
  }

  async getMe(): Promise<TelegramUser> {
    return this.call('getMe', {}, telegramUserSchema);
  }

  async setWebhook(url: string, secretToken?: string): Promise<void> {
    await this.call(
      'setWebhook',
      { url, secret_token: secretToken, allowed_updates: ['message', 'callback_query'] },
      z.literal(true)
    );
    this.log.info({ url }, 'Webhook registered');
  }

  async sendMessage(chatId: ChatId, text: string, options: SendMessageOptions = {}): Promise<SentMessage> {
    const message = await this.call(
      'sendMessage',
      {
        chat_id: chatId,
        text,
        reply_markup: options.replyMarkup,
        reply_parameters: options.replyToMessageId ? { message_id: options.replyToMessageId } : undefined,
        link_preview_options: options.disableLinkPreview ? { is_disabled: true } : undefined,
      },
      telegramMessageSchema
    );
    return { messageId: message.message_id };
  }

  async editMessageText(
    chatId: ChatId,
    messageId: number,
    text: string,
    options: { replyMarkup?: InlineKeyboardMarkup } = {}
  ): Promise<void> {
    await this.call(
      'editMessageText',
      { chat_id: chatId, message_id: messageId, text, reply_markup: options.replyMarkup },
      z.union([telegramMessageSchema, z.literal(true)])
    );
  }

  async deleteMessage(chatId: ChatId, messageId: number): Promise<void> {
    await this.call('deleteMessage', { chat_id: chatId, message_id: messageId }, z.literal(true));
  }

  async deleteMessages(chatId: ChatId, messageIds: readonly number[]): Promise<void> {
    for (let i = 0; i < messageIds.length; i += MAX_IDS_PER_BULK_CALL) {
      await this.call(
        'deleteMessages',
        { chat_id: chatId, message_ids: messageIds.slice(i, i + MAX_IDS_PER_BULK_CALL) },
        z.literal(true)
      );
    }
  }

  async forwardMessages(toChatId: ChatId, fromChatId: ChatId, messageIds: readonly number[]): Promise<number[]> {
    return this.bulkRelay('forwardMessages', toChatId, fromChatId, messageIds);
  }

  async copyMessages(toChatId: ChatId, fromChatId: ChatId, messageIds: readonly number[]): Promise<number[]> {
    return this.bulkRelay('copyMessages', toChatId, fromChatId, messageIds);
  }

  async answerCallbackQuery(
    callbackQueryId: string,
    options: { text?: string; showAlert?: boolean } = {}
  ): Promise<void> {
    await this.call(
      'answerCallbackQuery',
      { callback_query_id: callbackQueryId, text: options.text, show_alert: options.showAlert },
      z.literal(true)
    );
  }

  async getChatMemberStatus(chatId: ChatId, userId: number): Promise<ChatMemberStatus> {
    const member = await this.call('getChatMember', { chat_id: chatId, user_id: userId }, chatMemberSchema);
    return member.status;
  }

  private async bulkRelay(
    method: 'forwardMessages' | 'copyMessages',
    toChatId: ChatId,
    fromChatId: ChatId,
    messageIds: readonly number[]
  ): Promise<number[]> {
    const relayed: number[] = [];
    for (const run of increasingRuns(messageIds)) {
      const ids = await this.call(
        method,
        { chat_id: toChatId, from_chat_id: fromChatId, message_ids: run },
        z.array(messageIdSchema)
      );
      relayed.push(...ids.map((entry) => entry.message_id));
    }
    return relayed;
  }
}
