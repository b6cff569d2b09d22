/**
 * Relay Pipeline
 *
 * Moves submitted items into the private storage channel and removes them
 * again. The id of each channel copy becomes the item's durable ItemRef.
 *
 * @module domains/relay/RelayPipeline
 */

import type { Logger } from 'pino';
import type { ItemRef } from '@relayshare/shared';
import { createChildLogger } from '@/shared/utils/logger';
import { RelayError, TelegramApiError, errorMessage } from '@/shared/errors/relay-errors';
import type { ChatId, IBotTransport } from '@/infrastructure/telegram';

/**
 * Descriptions the Bot API returns for messages that are already gone or
 * too old to delete. Retraction treats them as done.
 */
const ALREADY_GONE_PATTERNS = ["message can't be deleted", 'message to delete not found'];

export function isAlreadyGone(error: unknown): boolean {
  if (!(error instanceof TelegramApiError)) {
    return false;
  }
  const description = error.description.toLowerCase();
  return ALREADY_GONE_PATTERNS.some((pattern) => description.includes(pattern));
}

export interface RetractionResult {
  retracted: number;
  warnings: string[];
}

export interface RelayPipelineDependencies {
  transport: IBotTransport;
  storageChatId: ChatId;
  logger?: Logger;
}

export class RelayPipeline {
  private readonly transport: IBotTransport;
  private readonly storageChatId: ChatId;
  private readonly log: Logger;

  constructor(deps: RelayPipelineDependencies) {
    this.transport = deps.transport;
    this.storageChatId = deps.storageChatId;
    this.log = deps.logger ?? createChildLogger({ service: 'RelayPipeline' });
  }

  get storageChat(): ChatId {
    return this.storageChatId;
  }

  /**
   * Forward messages into the storage channel
   *
   * @returns refs in the order of `messageIds`
   * @throws RelayError on transport failure or a partial relay
   */
  async relay(sourceChatId: ChatId, messageIds: readonly number[]): Promise<ItemRef[]> {
    if (messageIds.length === 0) {
      return [];
    }

    let refs: ItemRef[];
    try {
      refs = await this.transport.forwardMessages(this.storageChatId, sourceChatId, messageIds);
    } catch (error) {
      throw new RelayError(`Relay of ${messageIds.length} item(s) failed: ${errorMessage(error)}`, { cause: error });
    }

    if (refs.length !== messageIds.length) {
      this.log.warn({ requested: messageIds.length, relayed: refs.length, refs }, 'Partial relay');
      throw new RelayError(`Relayed ${refs.length} of ${messageIds.length} item(s)`);
    }

    this.log.debug({ sourceChatId, count: refs.length }, 'Items relayed');
    return refs;
  }

  /**
   * Delete relayed copies from the storage channel. Never throws.
   */
  async retract(itemRefs: readonly ItemRef[]): Promise<RetractionResult> {
    if (itemRefs.length === 0) {
      return { retracted: 0, warnings: [] };
    }

    try {
      await this.transport.deleteMessages(this.storageChatId, itemRefs);
      return { retracted: itemRefs.length, warnings: [] };
    } catch (bulkError) {
      if (isAlreadyGone(bulkError)) {
        return { retracted: itemRefs.length, warnings: [] };
      }
      this.log.warn({ err: bulkError, count: itemRefs.length }, 'Bulk retraction failed, deleting one by one');
    }

    const warnings: string[] = [];
    for (const ref of itemRefs) {
      try {
        await this.transport.deleteMessage(this.storageChatId, ref);
      } catch (error) {
        if (!isAlreadyGone(error)) {
          warnings.push(`Item ${ref}: ${errorMessage(error)}`);
        }
      }
    }

    return { retracted: itemRefs.length - warnings.length, warnings };
  }
}
