/**
 * Composition root
 *
 * Wires the relay services together. Every collaborator with an external
 * side can be overridden, which is how tests run the whole bot in process.
 *
 * @module bootstrap/container
 */

import type Redis from 'ioredis';
import type { Logger } from 'pino';
import { RELAY_CONFIG } from '@relayshare/shared';
import { createChildLogger } from '@/shared/utils/logger';
import type { ChatId, IBotTransport } from '@/infrastructure/telegram';
import { MembershipGate, type IAccessGate } from '@/domains/access';
import { SystemTimerScheduler, sleep, type ITimerScheduler } from '@/domains/scheduling';
import { RelayPipeline } from '@/domains/relay';
import {
  InMemoryUploadSessionStore,
  MediaGroupAggregator,
  RedisUploadSessionStore,
  type IUploadSessionStore,
} from '@/domains/upload-session';
import {
  InMemoryViewerStateStore,
  RedisViewerStateStore,
  type IViewerStateStore,
} from '@/domains/viewer-state';
import { InMemoryShareRepository, ShareRegistry, type IShareRepository } from '@/domains/shares';
import { DeliveryEngine } from '@/domains/delivery';
import {
  BotUpdateRouter,
  ShareListingHandler,
  TelegramUploadNotifier,
  UpdateQueue,
  UploadCommandHandler,
} from '@/domains/bot';

export interface RelayConfig {
  botUsername: string;
  storageChatId: ChatId;
  requiredGroupId: ChatId;
  groupInviteLink: string;
  pageSize?: number;
  debounceMs?: number;
  settleDelayMs?: number;
}

export interface RelayOverrides {
  /** Used for the session and viewer stores unless those are given */
  redis?: Redis | null;
  shareRepository?: IShareRepository;
  sessionStore?: IUploadSessionStore;
  viewerState?: IViewerStateStore;
  gate?: IAccessGate;
  scheduler?: ITimerScheduler;
  sleep?: (ms: number) => Promise<void>;
  generateToken?: () => string;
  logger?: Logger;
}

export interface RelayContainer {
  transport: IBotTransport;
  gate: IAccessGate;
  relay: RelayPipeline;
  sessions: IUploadSessionStore;
  viewerState: IViewerStateStore;
  aggregator: MediaGroupAggregator;
  registry: ShareRegistry;
  delivery: DeliveryEngine;
  uploads: UploadCommandHandler;
  listings: ShareListingHandler;
  router: BotUpdateRouter;
  queue: UpdateQueue;
  /** Finish queued work and stop the album timers */
  shutdown(): Promise<void>;
}

export function createContainer(
  transport: IBotTransport,
  config: RelayConfig,
  overrides: RelayOverrides = {}
): RelayContainer {
  const log = overrides.logger ?? createChildLogger({ service: 'Container' });
  const redis = overrides.redis ?? null;
  const pageSize = config.pageSize ?? RELAY_CONFIG.FILES_PER_PAGE;

  const gate = overrides.gate ?? new MembershipGate({ transport, requiredGroupId: config.requiredGroupId });
  const relay = new RelayPipeline({ transport, storageChatId: config.storageChatId });

  const sessions =
    overrides.sessionStore ?? (redis ? new RedisUploadSessionStore({ redis }) : new InMemoryUploadSessionStore());
  const viewerState =
    overrides.viewerState ?? (redis ? new RedisViewerStateStore({ redis }) : new InMemoryViewerStateStore());

  const aggregator = new MediaGroupAggregator({
    store: sessions,
    relay,
    notifier: new TelegramUploadNotifier(transport),
    scheduler: overrides.scheduler ?? new SystemTimerScheduler(),
    debounceMs: config.debounceMs,
  });

  const registry = new ShareRegistry({
    repository: overrides.shareRepository ?? new InMemoryShareRepository(),
    relay,
    generateToken: overrides.generateToken,
  });

  const delivery = new DeliveryEngine({
    gate,
    registry,
    viewerState,
    transport,
    storageChatId: config.storageChatId,
    botUsername: config.botUsername,
    groupInviteLink: config.groupInviteLink,
    pageSize,
    settleDelayMs: config.settleDelayMs,
    sleep: overrides.sleep ?? sleep,
  });

  const uploads = new UploadCommandHandler({
    store: sessions,
    aggregator,
    registry,
    transport,
    storageChatId: config.storageChatId,
    botUsername: config.botUsername,
  });

  const listings = new ShareListingHandler({
    registry,
    transport,
    botUsername: config.botUsername,
    pageSize,
  });

  const router = new BotUpdateRouter({
    gate,
    transport,
    uploads,
    listings,
    delivery,
    botUsername: config.botUsername,
    groupInviteLink: config.groupInviteLink,
  });

  const queue = new UpdateQueue((update) => router.handleUpdate(update));

  log.info(
    { sessionStore: redis ? 'redis' : 'memory', pageSize, botUsername: config.botUsername },
    'Relay services created'
  );

  return {
    transport,
    gate,
    relay,
    sessions,
    viewerState,
    aggregator,
    registry,
    delivery,
    uploads,
    listings,
    router,
    queue,
    async shutdown() {
      await queue.drain();
      await aggregator.settle();
      aggregator.shutdown();
    },
  };
}
