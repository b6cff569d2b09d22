/**
 * Share Types
 *
 * A share bundles the relayed items of one upload session behind a public,
 * unguessable token.
 *
 * @module @relayshare/shared/types/share
 */

import type { ShareKindValue } from '../constants/relay.constants';

/**
 * Durable handle of a relayed item: the message id of its copy inside the
 * private storage channel. Assigned by the transport once relay succeeds.
 */
export type ItemRef = number;

/**
 * Identity of a principal (the Telegram user id)
 */
export type PrincipalId = number;

/**
 * A persisted share
 *
 * `itemRefs` keeps upload order; paging depends on it.
 */
export interface ShareRecord {
  shareToken: string;
  itemRefs: ItemRef[];
  ownerId: PrincipalId;
  caption: string;
  kind: ShareKindValue;
  createdAt: Date;
}

/**
 * Row of an owner's share listing
 */
export interface ShareSummary {
  shareToken: string;
  caption: string;
  kind: ShareKindValue;
  itemCount: number;
  createdAt: Date;
}

/**
 * Result of deleting a share
 *
 * `warnings` lists retraction failures of the underlying relayed items.
 * The registry delete is authoritative and is never rolled back because of them.
 */
export type ShareDeletionResult =
  | { outcome: 'deleted'; record: ShareRecord; warnings: string[] }
  | { outcome: 'not_found' }
  | { outcome: 'forbidden' };
