/**
 * Telegram Bot API Types
 *
 * Zod schemas for the subset of the Bot API the relay uses. Inbound updates
 * and API results are validated with them, so the TypeScript types are
 * inferred rather than declared twice.
 *
 * Reference: https://core.telegram.org/bots/api
 *
 * @module infrastructure/telegram/telegram.types
 */

import { z } from 'zod';

export const telegramUserSchema = z.object({
  id: z.number().int(),
  is_bot: z.boolean().default(false),
  first_name: z.string().default(''),
  last_name: z.string().optional(),
  username: z.string().optional(),
});

export type TelegramUser = z.infer<typeof telegramUserSchema>;

export const telegramChatSchema = z.object({
  id: z.number().int(),
  type: z.enum(['private', 'group', 'supergroup', 'channel']),
  title: z.string().optional(),
  username: z.string().optional(),
});

export type TelegramChat = z.infer<typeof telegramChatSchema>;

const fileAttachmentSchema = z.object({
  file_id: z.string(),
  file_unique_id: z.string().optional(),
  file_name: z.string().optional(),
});

export const telegramMessageSchema = z.object({
  message_id: z.number().int(),
  date: z.number().int().default(0),
  chat: telegramChatSchema,
  from: telegramUserSchema.optional(),
  text: z.string().optional(),
  caption: z.string().optional(),
  media_group_id: z.string().optional(),
  photo: z.array(fileAttachmentSchema).optional(),
  video: fileAttachmentSchema.optional(),
  audio: fileAttachmentSchema.optional(),
  document: fileAttachmentSchema.optional(),
});

export type TelegramMessage = z.infer<typeof telegramMessageSchema>;

export const telegramCallbackQuerySchema = z.object({
  id: z.string(),
  from: telegramUserSchema,
  message: telegramMessageSchema.optional(),
  data: z.string().optional(),
});

export type TelegramCallbackQuery = z.infer<typeof telegramCallbackQuerySchema>;

export const telegramUpdateSchema = z.object({
  update_id: z.number().int(),
  message: telegramMessageSchema.optional(),
  callback_query: telegramCallbackQuerySchema.optional(),
});

export type TelegramUpdate = z.infer<typeof telegramUpdateSchema>;

export const messageIdSchema = z.object({
  message_id: z.number().int(),
});

export const chatMemberSchema = z.object({
  status: z.enum(['creator', 'administrator', 'member', 'restricted', 'left', 'kicked']),
  user: telegramUserSchema,
});

export type ChatMemberStatus = z.infer<typeof chatMemberSchema>['status'];

/**
 * Envelope of every Bot API response
 */
export const apiEnvelopeSchema = z.discriminatedUnion('ok', [
  z.object({ ok: z.literal(true), result: z.unknown() }),
  z.object({
    ok: z.literal(false),
    error_code: z.number().int(),
    description: z.string().default('Unknown error'),
    parameters: z
      .object({
        retry_after: z.number().optional(),
        migrate_to_chat_id: z.number().optional(),
      })
      .optional(),
  }),
]);

// ===== Outbound markup =====

export interface InlineKeyboardButton {
  text: string;
  callback_data?: string;
  url?: string;
}

export interface InlineKeyboardMarkup {
  inline_keyboard: InlineKeyboardButton[][];
}

export interface ReplyKeyboardMarkup {
  keyboard: Array<Array<{ text: string }>>;
  resize_keyboard?: boolean;
  one_time_keyboard?: boolean;
}

export type ReplyMarkup = InlineKeyboardMarkup | ReplyKeyboardMarkup;

/**
 * True when the message carries a file the relay accepts
 */
export function hasRelayableAttachment(message: TelegramMessage): boolean {
  return Boolean(
    (message.photo && message.photo.length > 0) || message.video || message.audio || message.document
  );
}
