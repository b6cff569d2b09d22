/**
 * Viewer State Store Interface
 *
 * @module domains/viewer-state
 */

import type { PageView, PrincipalId, ViewerState } from '@relayshare/shared';

export interface IViewerStateStore {
  get(principalId: PrincipalId): Promise<ViewerState>;
  setPendingShare(principalId: PrincipalId, shareToken: string | null): Promise<void>;
  setPageView(principalId: PrincipalId, pageView: PageView | null): Promise<void>;
}

export const EMPTY_VIEWER_STATE: ViewerState = { pendingShareToken: null, pageView: null };
