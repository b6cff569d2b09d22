/**
 * Share Repository Interface
 *
 * @module domains/shares
 */

import type { PrincipalId, ShareRecord } from '@relayshare/shared';

export interface IShareRepository {
  /**
   * @returns false when the token is already taken
   */
  insert(record: ShareRecord): Promise<boolean>;
  findByToken(shareToken: string): Promise<ShareRecord | null>;
  /** Newest first */
  findByOwner(ownerId: PrincipalId, offset: number, limit: number): Promise<ShareRecord[]>;
  countByOwner(ownerId: PrincipalId): Promise<number>;
  /**
   * @returns false when no row matched
   */
  deleteByToken(shareToken: string): Promise<boolean>;
}
