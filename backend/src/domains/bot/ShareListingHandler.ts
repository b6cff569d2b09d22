/**
 * Share Listing Handler
 *
 * The owner's paginated list of shares with info and delete buttons.
 */

import type { Logger } from 'pino';
import { RELAY_CONFIG, paginate } from '@relayshare/shared';
import { createChildLogger } from '@/shared/utils/logger';
import type { IBotTransport } from '@/infrastructure/telegram';
import type { ShareRegistry } from '@/domains/shares';
import type { BotContext, CallbackAnswer } from './bot.types';
import { listingKeyboard } from './keyboards';
import { MESSAGES, deletionWarningText, listingHeaderText, shareInfoText } from './messages';
import { shareLink } from './deep-links';

export interface ShareListingHandlerDependencies {
  registry: Pick<ShareRegistry, 'listByOwner' | 'countByOwner' | 'lookup' | 'delete'>;
  transport: IBotTransport;
  botUsername: string;
  pageSize?: number;
  logger?: Logger;
}

export class ShareListingHandler {
  private readonly registry: ShareListingHandlerDependencies['registry'];
  private readonly transport: IBotTransport;
  private readonly botUsername: string;
  private readonly pageSize: number;
  private readonly log: Logger;

  constructor(deps: ShareListingHandlerDependencies) {
    this.registry = deps.registry;
    this.transport = deps.transport;
    this.botUsername = deps.botUsername;
    this.pageSize = deps.pageSize ?? RELAY_CONFIG.FILES_PER_PAGE;
    this.log = deps.logger ?? createChildLogger({ service: 'ShareListingHandler' });
  }

  /**
   * Show a listing page, editing `messageId` in place when given
   */
  async show(ctx: BotContext, page: number, messageId?: number): Promise<void> {
    const total = await this.registry.countByOwner(ctx.principalId);

    if (total === 0) {
      await this.reply(ctx, MESSAGES.NO_SHARES, messageId);
      return;
    }

    const window = paginate(total, this.pageSize, page);
    const shares = await this.registry.listByOwner(ctx.principalId, window.offset, window.limit);
    const text = listingHeaderText(window.page, window.totalPages, total);
    const keyboard = listingKeyboard(shares, window.page, window.totalPages);

    if (messageId === undefined) {
      await this.transport.sendMessage(ctx.chatId, text, { replyMarkup: keyboard });
    } else {
      await this.transport.editMessageText(ctx.chatId, messageId, text, { replyMarkup: keyboard });
    }
  }

  async info(ctx: BotContext, shareToken: string): Promise<CallbackAnswer> {
    const record = await this.registry.lookup(shareToken);
    if (!record) {
      return { text: MESSAGES.SHARE_NOT_FOUND, showAlert: true };
    }
    if (record.ownerId !== ctx.principalId) {
      return { text: MESSAGES.NOT_OWNER, showAlert: true };
    }

    await this.transport.sendMessage(
      ctx.chatId,
      shareInfoText(record.caption, record.itemRefs.length, record.createdAt, shareLink(this.botUsername, shareToken)),
      { disableLinkPreview: true }
    );
    return {};
  }

  /**
   * Delete a share and redisplay the listing page it was deleted from
   */
  async delete(ctx: BotContext, shareToken: string, page: number, messageId?: number): Promise<CallbackAnswer> {
    const result = await this.registry.delete(shareToken, ctx.principalId);

    switch (result.outcome) {
      case 'not_found':
        return { text: MESSAGES.SHARE_NOT_FOUND, showAlert: true };
      case 'forbidden':
        return { text: MESSAGES.NOT_OWNER, showAlert: true };
      case 'deleted':
        await this.show(ctx, page, messageId);
        if (result.warnings.length > 0) {
          this.log.warn({ principalId: ctx.principalId, shareToken, warnings: result.warnings }, 'Share deleted with warnings');
          return { text: deletionWarningText(result.warnings.length), showAlert: true };
        }
        return { text: MESSAGES.SHARE_DELETED };
    }
  }

  private async reply(ctx: BotContext, text: string, messageId?: number): Promise<void> {
    if (messageId === undefined) {
      await this.transport.sendMessage(ctx.chatId, text);
    } else {
      await this.transport.editMessageText(ctx.chatId, messageId, text);
    }
  }
}
