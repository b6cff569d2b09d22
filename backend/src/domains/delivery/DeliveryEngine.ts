/**
 * Delivery Engine
 *
 * Serves a share to a viewer one page at a time. Every retrieval and every
 * page change re-checks the gate. A rendered page is the copied items
 * followed, after a settle delay, by a panel with navigation buttons; the
 * page is remembered per viewer so it can be retracted on the next move.
 *
 * @module domains/delivery/DeliveryEngine
 */

import type { Logger } from 'pino';
import {
  RELAY_CONFIG,
  paginate,
  sliceWindow,
  type PageView,
  type PrincipalId,
  type ShareRecord,
} from '@relayshare/shared';
import { createChildLogger } from '@/shared/utils/logger';
import { RelayError, errorMessage } from '@/shared/errors/relay-errors';
import type { ChatId, IBotTransport } from '@/infrastructure/telegram';
import type { IAccessGate } from '@/domains/access';
import type { ShareRegistry } from '@/domains/shares';
import type { IViewerStateStore } from '@/domains/viewer-state';
import { sleep as defaultSleep } from '@/domains/scheduling';
import { navigationKeyboard, restrictedKeyboard } from '@/domains/bot/keyboards';
import { MESSAGES, panelText } from '@/domains/bot/messages';
import { shareLink } from '@/domains/bot/deep-links';

export interface Viewer {
  principalId: PrincipalId;
  chatId: number;
}

export type DeliveryOutcome = 'rendered' | 'unchanged' | 'denied' | 'not_found' | 'empty';

export interface DeliveryEngineDependencies {
  gate: IAccessGate;
  registry: Pick<ShareRegistry, 'lookup'>;
  viewerState: IViewerStateStore;
  transport: IBotTransport;
  storageChatId: ChatId;
  botUsername: string;
  groupInviteLink: string;
  pageSize?: number;
  settleDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export class DeliveryEngine {
  private readonly gate: IAccessGate;
  private readonly registry: Pick<ShareRegistry, 'lookup'>;
  private readonly viewerState: IViewerStateStore;
  private readonly transport: IBotTransport;
  private readonly storageChatId: ChatId;
  private readonly botUsername: string;
  private readonly groupInviteLink: string;
  private readonly pageSize: number;
  private readonly settleDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly log: Logger;

  constructor(deps: DeliveryEngineDependencies) {
    this.gate = deps.gate;
    this.registry = deps.registry;
    this.viewerState = deps.viewerState;
    this.transport = deps.transport;
    this.storageChatId = deps.storageChatId;
    this.botUsername = deps.botUsername;
    this.groupInviteLink = deps.groupInviteLink;
    this.pageSize = deps.pageSize ?? RELAY_CONFIG.FILES_PER_PAGE;
    this.settleDelayMs = deps.settleDelayMs ?? RELAY_CONFIG.PANEL_SETTLE_DELAY_MS;
    this.sleep = deps.sleep ?? defaultSleep;
    this.log = deps.logger ?? createChildLogger({ service: 'DeliveryEngine' });
  }

  /**
   * First display of a share, from a link or a retried pending token
   */
  async retrieve(viewer: Viewer, shareToken: string, page: number = 1): Promise<DeliveryOutcome> {
    if (!(await this.authorize(viewer, shareToken))) {
      return 'denied';
    }
    const state = await this.viewerState.get(viewer.principalId);
    if (state.pendingShareToken !== null) {
      await this.viewerState.setPendingShare(viewer.principalId, null);
    }
    return this.render(viewer, shareToken, await this.registry.lookup(shareToken), page);
  }

  /**
   * Move to another page of a share. The current page stays when it is
   * already displayed; otherwise the previous page is retracted first.
   */
  async navigate(viewer: Viewer, shareToken: string, page: number): Promise<DeliveryOutcome> {
    if (!(await this.authorize(viewer, shareToken))) {
      return 'denied';
    }

    const record = await this.registry.lookup(shareToken);
    const { pageView } = await this.viewerState.get(viewer.principalId);
    // out-of-range requests clamp, so compare against the page that would render
    if (record && pageView && pageView.shareToken === shareToken) {
      const target = paginate(record.itemRefs.length, this.pageSize, page).page;
      if (pageView.page === target) {
        return 'unchanged';
      }
    }

    if (pageView) {
      await this.retractPage(viewer, pageView);
      await this.viewerState.setPageView(viewer.principalId, null);
    }
    return this.render(viewer, shareToken, record, page);
  }

  /**
   * Retrieve the token recorded when the gate last refused this viewer
   *
   * @returns null when nothing is pending
   */
  async retryPending(viewer: Viewer): Promise<DeliveryOutcome | null> {
    const { pendingShareToken } = await this.viewerState.get(viewer.principalId);
    if (!pendingShareToken) {
      return null;
    }
    return this.retrieve(viewer, pendingShareToken);
  }

  private async authorize(viewer: Viewer, shareToken: string): Promise<boolean> {
    if (await this.gate.isAuthorized(viewer.principalId)) {
      return true;
    }

    await this.viewerState.setPendingShare(viewer.principalId, shareToken);
    await this.transport.sendMessage(viewer.chatId, MESSAGES.ACCESS_RESTRICTED, {
      replyMarkup: restrictedKeyboard(this.groupInviteLink, shareLink(this.botUsername, shareToken)),
    });
    this.log.info({ principalId: viewer.principalId, shareToken }, 'Retrieval refused by gate');
    return false;
  }

  private async render(
    viewer: Viewer,
    shareToken: string,
    record: ShareRecord | null,
    requestedPage: number
  ): Promise<DeliveryOutcome> {
    if (!record) {
      await this.transport.sendMessage(viewer.chatId, MESSAGES.SHARE_NOT_FOUND);
      return 'not_found';
    }
    if (record.itemRefs.length === 0) {
      await this.transport.sendMessage(viewer.chatId, MESSAGES.SHARE_EMPTY);
      return 'empty';
    }

    const window = paginate(record.itemRefs.length, this.pageSize, requestedPage);
    const refs = sliceWindow(record.itemRefs, window);

    let itemMessageIds: number[];
    try {
      itemMessageIds = await this.transport.copyMessages(viewer.chatId, this.storageChatId, refs);
    } catch (error) {
      throw new RelayError(`Delivery of ${shareToken} page ${window.page} failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    if (itemMessageIds.length < refs.length) {
      this.log.warn(
        { shareToken, page: window.page, requested: refs.length, delivered: itemMessageIds.length },
        'Some items could not be delivered'
      );
    }

    // stored before the panel so copied items can be retracted even if the panel fails
    const pageView: PageView = {
      shareToken,
      page: window.page,
      totalPages: window.totalPages,
      itemMessageIds,
      panelMessageId: null,
    };
    await this.viewerState.setPageView(viewer.principalId, pageView);

    await this.sleep(this.settleDelayMs);

    const panel = await this.transport.sendMessage(
      viewer.chatId,
      panelText(record.caption, window.page, window.totalPages, record.itemRefs.length),
      { replyMarkup: navigationKeyboard(window.page, window.totalPages, { kind: 'share', shareToken }) }
    );
    await this.viewerState.setPageView(viewer.principalId, { ...pageView, panelMessageId: panel.messageId });

    this.log.info(
      { principalId: viewer.principalId, shareToken, page: window.page, items: itemMessageIds.length },
      'Page rendered'
    );
    return 'rendered';
  }

  private async retractPage(viewer: Viewer, pageView: PageView): Promise<void> {
    const messageIds =
      pageView.panelMessageId === null ? pageView.itemMessageIds : [...pageView.itemMessageIds, pageView.panelMessageId];
    if (messageIds.length === 0) {
      return;
    }
    try {
      await this.transport.deleteMessages(viewer.chatId, messageIds);
    } catch (error) {
      this.log.warn(
        { err: error, principalId: viewer.principalId, shareToken: pageView.shareToken, page: pageView.page },
        'Previous page could not be retracted'
      );
    }
  }
}
