/**
 * Upload Session Store Interface
 *
 * One upload session per principal. Items are only accepted while the
 * session is collecting; finishing drains the session back to idle.
 *
 * @module domains/upload-session
 */

import type { DrainedSession, ItemRef, PrincipalId, UploadSession } from '@relayshare/shared';

export interface IUploadSessionStore {
  /**
   * Reset the principal's session and enter collecting mode. Idempotent.
   */
  begin(principalId: PrincipalId): Promise<void>;

  /**
   * Append refs in order
   *
   * @returns the session's new item count
   * @throws InvalidStateError if the session is not collecting
   */
  accept(principalId: PrincipalId, refs: readonly ItemRef[]): Promise<number>;

  /**
   * Return the accumulated refs and reset to idle. An idle session drains empty.
   */
  drain(principalId: PrincipalId): Promise<DrainedSession>;

  /**
   * Discard the session without producing a share
   */
  abandon(principalId: PrincipalId): Promise<void>;

  /**
   * Current snapshot; idle and empty when no session exists
   */
  get(principalId: PrincipalId): Promise<UploadSession>;

  /**
   * Put drained refs back in front of the session and re-enter collecting mode
   */
  restore(principalId: PrincipalId, refs: readonly ItemRef[]): Promise<void>;
}
