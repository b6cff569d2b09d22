/**
 * Upload Command Handler
 *
 * Begin, submit, finish and cancel of a batch upload.
 *
 * @module domains/bot/UploadCommandHandler
 */

import type { Logger } from 'pino';
import { SHARE_KIND } from '@relayshare/shared';
import { createChildLogger } from '@/shared/utils/logger';
import { PersistenceError } from '@/shared/errors/relay-errors';
import type { ChatId, IBotTransport } from '@/infrastructure/telegram';
import type { IUploadSessionStore, MediaGroupAggregator, SubmitOutcome } from '@/domains/upload-session';
import type { ShareRegistry } from '@/domains/shares';
import type { BotContext } from './bot.types';
import { mainMenuKeyboard, uploadKeyboard } from './keyboards';
import { MESSAGES, batchCaption, uploadCompletedText, uploadLogText } from './messages';
import { shareLink } from './deep-links';

export interface UploadCommandHandlerDependencies {
  store: IUploadSessionStore;
  aggregator: Pick<MediaGroupAggregator, 'submit' | 'discardFor' | 'settleFor'>;
  registry: Pick<ShareRegistry, 'create'>;
  transport: IBotTransport;
  storageChatId: ChatId;
  botUsername: string;
  logger?: Logger;
}

export type FinishOutcome =
  | { status: 'created'; shareToken: string; itemCount: number }
  | { status: 'empty' }
  | { status: 'failed' };

export class UploadCommandHandler {
  private readonly store: IUploadSessionStore;
  private readonly aggregator: Pick<MediaGroupAggregator, 'submit' | 'discardFor' | 'settleFor'>;
  private readonly registry: Pick<ShareRegistry, 'create'>;
  private readonly transport: IBotTransport;
  private readonly storageChatId: ChatId;
  private readonly botUsername: string;
  private readonly log: Logger;

  constructor(deps: UploadCommandHandlerDependencies) {
    this.store = deps.store;
    this.aggregator = deps.aggregator;
    this.registry = deps.registry;
    this.transport = deps.transport;
    this.storageChatId = deps.storageChatId;
    this.botUsername = deps.botUsername;
    this.log = deps.logger ?? createChildLogger({ service: 'UploadCommandHandler' });
  }

  async begin(ctx: BotContext): Promise<void> {
    this.aggregator.discardFor(ctx.principalId);
    await this.store.begin(ctx.principalId);
    await this.transport.sendMessage(ctx.chatId, MESSAGES.UPLOAD_STARTED, { replyMarkup: uploadKeyboard() });
    this.log.info({ principalId: ctx.principalId }, 'Upload session started');
  }

  async submit(ctx: BotContext, messageId: number, groupId?: string): Promise<SubmitOutcome> {
    const outcome = await this.aggregator.submit({
      principalId: ctx.principalId,
      chatId: ctx.chatId,
      messageId,
      groupId,
    });
    if (outcome === 'not_collecting') {
      await this.transport.sendMessage(ctx.chatId, MESSAGES.UPLOAD_NOT_STARTED, { replyMarkup: mainMenuKeyboard() });
    }
    return outcome;
  }

  /**
   * Turn the session into a share and send its link
   *
   * On a registry failure the drained refs are put back so the user can
   * finish again without re-uploading.
   */
  async finish(ctx: BotContext): Promise<FinishOutcome> {
    const { itemRefs, itemCount } = await this.store.drain(ctx.principalId);

    if (itemCount === 0) {
      await this.transport.sendMessage(ctx.chatId, MESSAGES.NO_FILES, { replyMarkup: mainMenuKeyboard() });
      return { status: 'empty' };
    }

    let shareToken: string;
    try {
      shareToken = await this.registry.create(
        ctx.principalId,
        itemRefs,
        batchCaption(itemCount),
        itemCount === 1 ? SHARE_KIND.FILE : SHARE_KIND.COLLECTION
      );
    } catch (error) {
      if (!(error instanceof PersistenceError)) {
        throw error;
      }
      await this.store.restore(ctx.principalId, itemRefs);
      await this.transport.sendMessage(ctx.chatId, MESSAGES.FINISH_FAILED, { replyMarkup: uploadKeyboard() });
      return { status: 'failed' };
    }

    const link = shareLink(this.botUsername, shareToken);
    await this.transport.sendMessage(ctx.chatId, uploadCompletedText(itemCount, link), {
      replyMarkup: mainMenuKeyboard(),
      disableLinkPreview: true,
    });
    await this.writeUploadLog(ctx, itemCount, link);

    return { status: 'created', shareToken, itemCount };
  }

  /**
   * Drop albums still waiting for their timer, then finish with what has
   * been relayed
   */
  async cancel(ctx: BotContext): Promise<FinishOutcome> {
    const dropped = this.aggregator.discardFor(ctx.principalId);
    await this.aggregator.settleFor(ctx.principalId);
    this.log.info({ principalId: ctx.principalId, dropped }, 'Upload cancelled');
    return this.finish(ctx);
  }

  /**
   * Silently discard the session, e.g. when the user restarts the bot
   */
  async abandon(ctx: BotContext): Promise<void> {
    this.aggregator.discardFor(ctx.principalId);
    await this.store.abandon(ctx.principalId);
  }

  private async writeUploadLog(ctx: BotContext, itemCount: number, link: string): Promise<void> {
    try {
      await this.transport.sendMessage(
        this.storageChatId,
        uploadLogText(ctx.displayName, ctx.principalId, itemCount, link),
        { disableLinkPreview: true }
      );
    } catch (error) {
      this.log.warn({ err: error, principalId: ctx.principalId }, 'Upload log line not written');
    }
  }
}
