/**
 * Bot Update Router
 *
 * Maps each inbound update to one operation: commands and reply-keyboard
 * buttons, submitted files, deep links and inline button presses. Gated
 * operations go through `withGate`; every handler error is logged and
 * answered with a generic notice so one update can never take the
 * process down.
 *
 * @module domains/bot/BotUpdateRouter
 */

import type { Logger } from 'pino';
import { parseCallbackData, shareTokenSchema, type CallbackData } from '@relayshare/shared';
import { createChildLogger } from '@/shared/utils/logger';
import {
  hasRelayableAttachment,
  type IBotTransport,
  type TelegramCallbackQuery,
  type TelegramMessage,
  type TelegramUpdate,
  type TelegramUser,
} from '@/infrastructure/telegram';
import { withGate, type GatedHandler, type IAccessGate } from '@/domains/access';
import type { DeliveryEngine } from '@/domains/delivery';
import type { BotContext, CallbackAnswer } from './bot.types';
import type { UploadCommandHandler } from './UploadCommandHandler';
import type { ShareListingHandler } from './ShareListingHandler';
import { mainMenuKeyboard, redirectKeyboard, restrictedKeyboard } from './keyboards';
import { BUTTONS, MESSAGES } from './messages';
import { botLink, extractShareToken, parseStartPayload, shareLink } from './deep-links';

export interface BotUpdateRouterDependencies {
  gate: IAccessGate;
  transport: IBotTransport;
  uploads: UploadCommandHandler;
  listings: ShareListingHandler;
  delivery: Pick<DeliveryEngine, 'retrieve' | 'navigate' | 'retryPending'>;
  botUsername: string;
  groupInviteLink: string;
  logger?: Logger;
}

interface MessageContext extends BotContext {
  message: TelegramMessage;
}

interface CallbackContext extends BotContext {
  query: TelegramCallbackQuery;
  data: CallbackData;
  messageId: number | undefined;
  answer: CallbackAnswer;
}

function displayName(user: TelegramUser): string {
  if (user.username) {
    return `@${user.username}`;
  }
  return [user.first_name, user.last_name].filter(Boolean).join(' ') || String(user.id);
}

/**
 * `/cmd@bot args` -> `/cmd`
 */
function commandOf(text: string): string | null {
  const first = text.trim().split(/\s+/)[0] ?? '';
  return first.startsWith('/') ? first.replace(/@\w+$/, '').toLowerCase() : null;
}

export class BotUpdateRouter {
  private readonly gate: IAccessGate;
  private readonly transport: IBotTransport;
  private readonly uploads: UploadCommandHandler;
  private readonly listings: ShareListingHandler;
  private readonly delivery: BotUpdateRouterDependencies['delivery'];
  private readonly botUsername: string;
  private readonly groupInviteLink: string;
  private readonly log: Logger;

  private readonly beginUpload: GatedHandler<MessageContext>;
  private readonly submitItem: GatedHandler<MessageContext>;
  private readonly listShares: GatedHandler<MessageContext>;
  private readonly handleListingCallback: GatedHandler<CallbackContext>;

  constructor(deps: BotUpdateRouterDependencies) {
    this.gate = deps.gate;
    this.transport = deps.transport;
    this.uploads = deps.uploads;
    this.listings = deps.listings;
    this.delivery = deps.delivery;
    this.botUsername = deps.botUsername;
    this.groupInviteLink = deps.groupInviteLink;
    this.log = deps.logger ?? createChildLogger({ service: 'BotUpdateRouter' });

    const denyMessage: GatedHandler<MessageContext> = (ctx) => this.sendRestricted(ctx);

    this.beginUpload = withGate(this.gate, denyMessage, (ctx) => this.uploads.begin(ctx));
    this.submitItem = withGate(this.gate, denyMessage, async (ctx) => {
      await this.uploads.submit(ctx, ctx.message.message_id, ctx.message.media_group_id);
    });
    this.listShares = withGate(this.gate, denyMessage, (ctx) => this.listings.show(ctx, 1));
    this.handleListingCallback = withGate(
      this.gate,
      async (ctx) => {
        ctx.answer = { text: MESSAGES.ACCESS_RESTRICTED, showAlert: true };
      },
      (ctx) => this.dispatchListingCallback(ctx)
    );
  }

  /**
   * Process one update. Never throws.
   */
  async handleUpdate(update: TelegramUpdate): Promise<void> {
    try {
      if (update.message) {
        await this.handleMessage(update.message);
      } else if (update.callback_query) {
        await this.handleCallback(update.callback_query);
      }
    } catch (error) {
      const chatId = update.message?.chat.id ?? update.callback_query?.message?.chat.id ?? update.callback_query?.from.id;
      const principalId = update.message?.from?.id ?? update.callback_query?.from.id;
      this.log.error(
        { err: error, updateId: update.update_id, principalId, data: update.callback_query?.data },
        'Update handling failed'
      );
      if (chatId !== undefined) {
        await this.transport.sendMessage(chatId, MESSAGES.GENERIC_ERROR).catch((sendError: unknown) => {
          this.log.warn({ err: sendError, chatId }, 'Error notice not delivered');
        });
      }
    }
  }

  private async handleMessage(message: TelegramMessage): Promise<void> {
    const from = message.from;
    if (!from || from.is_bot) {
      return;
    }

    const ctx: MessageContext = {
      principalId: from.id,
      chatId: message.chat.id,
      displayName: displayName(from),
      message,
    };

    if (message.chat.type !== 'private') {
      await this.redirectToPrivate(ctx);
      return;
    }

    const text = message.text;
    if (text === undefined) {
      if (hasRelayableAttachment(message)) {
        await this.submitItem(ctx);
      }
      return;
    }

    const command = commandOf(text);

    if (command === '/start') {
      await this.handleStart(ctx, parseStartPayload(text));
      return;
    }

    const linkedToken = extractShareToken(text, this.botUsername);
    if (linkedToken) {
      await this.delivery.retrieve(ctx, linkedToken);
      return;
    }

    switch (command ?? text.trim()) {
      case BUTTONS.UPLOAD:
      case '/upload':
        await this.beginUpload(ctx);
        return;
      case BUTTONS.FINISH:
      case '/finish':
        await this.uploads.finish(ctx);
        return;
      case BUTTONS.CANCEL:
      case '/cancel':
        await this.uploads.cancel(ctx);
        return;
      case BUTTONS.MY_FILES:
      case '/myfiles':
        await this.listShares(ctx);
        return;
      case BUTTONS.HELP:
      case '/help':
        await this.transport.sendMessage(ctx.chatId, MESSAGES.HELP, { replyMarkup: mainMenuKeyboard() });
        return;
      default:
        this.log.debug({ principalId: ctx.principalId }, 'Unrecognized text ignored');
    }
  }

  private async handleStart(ctx: MessageContext, payload: string | null): Promise<void> {
    if (payload === null) {
      await this.uploads.abandon(ctx);
      await this.transport.sendMessage(ctx.chatId, MESSAGES.WELCOME, { replyMarkup: mainMenuKeyboard() });
      await this.delivery.retryPending(ctx);
      return;
    }

    if (!shareTokenSchema.safeParse(payload).success) {
      await this.transport.sendMessage(ctx.chatId, MESSAGES.SHARE_NOT_FOUND);
      return;
    }
    await this.delivery.retrieve(ctx, payload);
  }

  private async handleCallback(query: TelegramCallbackQuery): Promise<void> {
    const data = query.data === undefined ? null : parseCallbackData(query.data);
    const ctx: CallbackContext | null = data
      ? {
          principalId: query.from.id,
          chatId: query.message?.chat.id ?? query.from.id,
          displayName: displayName(query.from),
          query,
          data,
          messageId: query.message?.message_id,
          answer: {},
        }
      : null;

    try {
      if (ctx) {
        await this.dispatchCallback(ctx);
      } else {
        this.log.debug({ data: query.data }, 'Unknown callback data');
      }
    } finally {
      await this.transport.answerCallbackQuery(query.id, ctx?.answer ?? {}).catch((error: unknown) => {
        this.log.warn({ err: error, callbackQueryId: query.id }, 'Callback answer not delivered');
      });
    }
  }

  private async dispatchCallback(ctx: CallbackContext): Promise<void> {
    const { data } = ctx;
    switch (data.action) {
      case 'noop':
        return;
      case 'spage':
        await this.delivery.navigate(ctx, data.shareToken, data.page);
        return;
      default:
        await this.handleListingCallback(ctx);
    }
  }

  private async dispatchListingCallback(ctx: CallbackContext): Promise<void> {
    const { data } = ctx;
    switch (data.action) {
      case 'page':
        await this.listings.show(ctx, data.page, ctx.messageId);
        return;
      case 'info':
        ctx.answer = await this.listings.info(ctx, data.shareToken);
        return;
      case 'delete':
        ctx.answer = await this.listings.delete(ctx, data.shareToken, data.page, ctx.messageId);
        return;
      default:
        return;
    }
  }

  private async sendRestricted(ctx: BotContext): Promise<void> {
    await this.transport.sendMessage(ctx.chatId, MESSAGES.ACCESS_RESTRICTED, {
      replyMarkup: restrictedKeyboard(this.groupInviteLink, botLink(this.botUsername)),
    });
  }

  /**
   * Commands and share links sent in a group get a button into the private chat
   */
  private async redirectToPrivate(ctx: MessageContext): Promise<void> {
    const text = ctx.message.text;
    if (text === undefined) {
      return;
    }

    const payload = commandOf(text) === '/start' ? parseStartPayload(text) : null;
    const token = payload ?? extractShareToken(text, this.botUsername);
    if (token === null && commandOf(text) === null) {
      return;
    }

    const link = token ? shareLink(this.botUsername, token) : botLink(this.botUsername);
    await this.transport.sendMessage(ctx.chatId, MESSAGES.PRIVATE_ONLY, {
      replyMarkup: redirectKeyboard(link),
      replyToMessageId: ctx.message.message_id,
    });
  }
}
