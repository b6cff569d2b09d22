/**
 * Media Group Aggregator
 *
 * Collects the items of one album (Telegram media group) and relays them
 * together once the album has been quiet for the debounce window. Items
 * without a group are relayed as they arrive. Relayed refs are appended to
 * the owner's upload session.
 *
 * @module domains/upload-session/MediaGroupAggregator
 */

import type { Logger } from 'pino';
import { RELAY_CONFIG, SESSION_MODE, type ItemRef, type PrincipalId } from '@relayshare/shared';
import { createChildLogger } from '@/shared/utils/logger';
import { InvalidStateError } from '@/shared/errors/relay-errors';
import { DebouncedBatcher, type ITimerScheduler } from '@/domains/scheduling';
import type { RelayPipeline } from '@/domains/relay';
import type { IUploadSessionStore } from './IUploadSessionStore';

export interface SubmittedItem {
  principalId: PrincipalId;
  chatId: number;
  messageId: number;
  groupId?: string;
}

/**
 * User-facing notices of the upload flow
 */
export interface IUploadNotifier {
  itemReceived(chatId: number, grouped: boolean): Promise<void>;
  relayFailed(chatId: number): Promise<void>;
  itemsOrphaned(chatId: number, count: number): Promise<void>;
}

export type SubmitOutcome = 'accepted' | 'not_collecting';

interface GroupOwner {
  principalId: PrincipalId;
  chatId: number;
}

export interface MediaGroupAggregatorDependencies {
  store: IUploadSessionStore;
  relay: RelayPipeline;
  notifier: IUploadNotifier;
  scheduler: ITimerScheduler;
  debounceMs?: number;
  logger?: Logger;
}

export class MediaGroupAggregator {
  private readonly store: IUploadSessionStore;
  private readonly relay: RelayPipeline;
  private readonly notifier: IUploadNotifier;
  private readonly batcher: DebouncedBatcher<number, GroupOwner>;
  private readonly log: Logger;

  constructor(deps: MediaGroupAggregatorDependencies) {
    this.store = deps.store;
    this.relay = deps.relay;
    this.notifier = deps.notifier;
    this.log = deps.logger ?? createChildLogger({ service: 'MediaGroupAggregator' });
    this.batcher = new DebouncedBatcher<number, GroupOwner>({
      delayMs: deps.debounceMs ?? RELAY_CONFIG.MEDIA_GROUP_DEBOUNCE_MS,
      scheduler: deps.scheduler,
      logger: this.log,
      onFlush: (messageIds, { key, meta }) => this.relayAndAccept(meta, messageIds, key),
    });
  }

  /**
   * Take one submitted item
   *
   * Returns `not_collecting` without side effects when the sender has no
   * open upload session.
   */
  async submit(item: SubmittedItem): Promise<SubmitOutcome> {
    const session = await this.store.get(item.principalId);
    if (session.mode !== SESSION_MODE.COLLECTING) {
      return 'not_collecting';
    }

    const owner: GroupOwner = { principalId: item.principalId, chatId: item.chatId };

    if (item.groupId) {
      const { created, size } = this.batcher.add(item.groupId, item.messageId, owner);
      this.log.debug({ principalId: item.principalId, groupId: item.groupId, size }, 'Album item buffered');
      if (created) {
        await this.notify(() => this.notifier.itemReceived(item.chatId, true));
      }
      return 'accepted';
    }

    await this.notify(() => this.notifier.itemReceived(item.chatId, false));
    await this.relayAndAccept(owner, [item.messageId]);
    return 'accepted';
  }

  /**
   * Drop every album of the principal still waiting for its timer
   *
   * @returns number of dropped items
   */
  discardFor(principalId: PrincipalId): number {
    const dropped = this.batcher.discardWhere((owner) => owner.principalId === principalId);
    const count = dropped.reduce((total, batch) => total + batch.items.length, 0);
    if (count > 0) {
      this.log.info(
        { principalId, groups: dropped.map((batch) => batch.key), items: count },
        'Pending albums discarded'
      );
    }
    return count;
  }

  hasPendingGroup(groupId: string): boolean {
    return this.batcher.has(groupId);
  }

  /**
   * Wait for album drains that have already started
   */
  async settle(): Promise<void> {
    await this.batcher.settle();
  }

  /**
   * Wait for the principal's own album drains; other principals' relays
   * are not awaited
   */
  async settleFor(principalId: PrincipalId): Promise<void> {
    await this.batcher.settleWhere((owner) => owner.principalId === principalId);
  }

  shutdown(): void {
    this.batcher.shutdown();
  }

  private async relayAndAccept(owner: GroupOwner, messageIds: number[], groupId?: string): Promise<void> {
    const { principalId, chatId } = owner;

    let refs: ItemRef[];
    try {
      refs = await this.relay.relay(chatId, messageIds);
    } catch (error) {
      this.log.error({ err: error, principalId, groupId, items: messageIds.length }, 'Relay failed, items dropped');
      await this.notify(() => this.notifier.relayFailed(chatId));
      return;
    }

    try {
      const count = await this.store.accept(principalId, refs);
      this.log.info({ principalId, groupId, accepted: refs.length, sessionCount: count }, 'Items accepted');
    } catch (error) {
      if (error instanceof InvalidStateError) {
        this.log.warn({ principalId, groupId, refs }, 'Session closed before relay finished, refs orphaned');
        await this.notify(() => this.notifier.itemsOrphaned(chatId, refs.length));
        return;
      }
      this.log.error({ err: error, principalId, groupId, refs }, 'Failed to record relayed items');
      await this.notify(() => this.notifier.relayFailed(chatId));
    }
  }

  private async notify(send: () => Promise<void>): Promise<void> {
    try {
      await send();
    } catch (error) {
      this.log.warn({ err: error }, 'Upload notice not delivered');
    }
  }
}
