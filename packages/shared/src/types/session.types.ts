/**
 * Upload Session and Viewer State Types
 *
 * Flow:
 * 1. Principal presses "Upload files" -> session enters `collecting`
 * 2. Each relayed item ref is appended in arrival order
 * 3. "Finish upload" drains the refs into one share
 *
 * @module @relayshare/shared/types/session
 */

import type { SessionModeValue } from '../constants/relay.constants';
import type { ItemRef, PrincipalId } from './share.types';

/**
 * Per-principal upload session
 *
 * Invariant: `itemCount === itemRefs.length`.
 */
export interface UploadSession {
  principalId: PrincipalId;
  mode: SessionModeValue;
  itemRefs: ItemRef[];
  itemCount: number;
}

/**
 * Refs handed out by draining a session
 */
export interface DrainedSession {
  itemRefs: ItemRef[];
  itemCount: number;
}

/**
 * One displayed page of a share, tracked so that it can be retracted when
 * the viewer navigates away.
 */
export interface PageView {
  shareToken: string;
  page: number;
  totalPages: number;
  itemMessageIds: number[];
  panelMessageId: number | null;
}

/**
 * Retrieval state kept per viewer
 */
export interface ViewerState {
  /** Token the viewer asked for while the gate refused access */
  pendingShareToken: string | null;
  pageView: PageView | null;
}
