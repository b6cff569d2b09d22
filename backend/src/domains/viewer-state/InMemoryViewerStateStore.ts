import type { PageView, PrincipalId, ViewerState } from '@relayshare/shared';
import { EMPTY_VIEWER_STATE, type IViewerStateStore } from './IViewerStateStore';

export class InMemoryViewerStateStore implements IViewerStateStore {
  private readonly states = new Map<PrincipalId, ViewerState>();

  async get(principalId: PrincipalId): Promise<ViewerState> {
    return { ...(this.states.get(principalId) ?? EMPTY_VIEWER_STATE) };
  }

  async setPendingShare(principalId: PrincipalId, shareToken: string | null): Promise<void> {
    const current = await this.get(principalId);
    this.states.set(principalId, { ...current, pendingShareToken: shareToken });
  }

  async setPageView(principalId: PrincipalId, pageView: PageView | null): Promise<void> {
    const current = await this.get(principalId);
    this.states.set(principalId, { ...current, pageView });
  }
}
