/**
 * Upload Session Store (in-memory implementation)
 *
 * Used in tests and when Redis is not configured. State is lost on restart.
 *
 * @module domains/upload-session
 */

import { SESSION_MODE, type DrainedSession, type ItemRef, type PrincipalId, type UploadSession } from '@relayshare/shared';
import { InvalidStateError } from '@/shared/errors/relay-errors';
import type { IUploadSessionStore } from './IUploadSessionStore';

export class InMemoryUploadSessionStore implements IUploadSessionStore {
  private readonly sessions = new Map<PrincipalId, ItemRef[]>();

  async begin(principalId: PrincipalId): Promise<void> {
    this.sessions.set(principalId, []);
  }

  async accept(principalId: PrincipalId, refs: readonly ItemRef[]): Promise<number> {
    const items = this.sessions.get(principalId);
    if (!items) {
      throw new InvalidStateError(`Upload session of ${principalId} is not collecting`);
    }
    items.push(...refs);
    return items.length;
  }

  async drain(principalId: PrincipalId): Promise<DrainedSession> {
    const items = this.sessions.get(principalId) ?? [];
    this.sessions.delete(principalId);
    return { itemRefs: items, itemCount: items.length };
  }

  async abandon(principalId: PrincipalId): Promise<void> {
    this.sessions.delete(principalId);
  }

  async get(principalId: PrincipalId): Promise<UploadSession> {
    const items = this.sessions.get(principalId);
    return {
      principalId,
      mode: items ? SESSION_MODE.COLLECTING : SESSION_MODE.IDLE,
      itemRefs: items ? [...items] : [],
      itemCount: items?.length ?? 0,
    };
  }

  async restore(principalId: PrincipalId, refs: readonly ItemRef[]): Promise<void> {
    const items = this.sessions.get(principalId) ?? [];
    this.sessions.set(principalId, [...refs, ...items]);
  }
}
