/**
 * Share Registry
 *
 * Issues share tokens for finished uploads and resolves them again. The
 * registry row is authoritative: deleting a share removes the row first and
 * only then retracts the relayed items, best effort.
 *
 * @module domains/shares/ShareRegistry
 */

import type { Logger } from 'pino';
import type {
  ItemRef,
  PrincipalId,
  ShareDeletionResult,
  ShareKindValue,
  ShareRecord,
  ShareSummary,
} from '@relayshare/shared';
import { createChildLogger } from '@/shared/utils/logger';
import { PersistenceError, errorMessage } from '@/shared/errors/relay-errors';
import type { RelayPipeline } from '@/domains/relay';
import type { IShareRepository } from './IShareRepository';
import { generateShareToken } from './share-token';

const MAX_TOKEN_ATTEMPTS = 3;
const MAX_CAPTION_LENGTH = 255;

export interface ShareRegistryDependencies {
  repository: IShareRepository;
  relay: Pick<RelayPipeline, 'retract'>;
  generateToken?: () => string;
  now?: () => Date;
  logger?: Logger;
}

export class ShareRegistry {
  private readonly repository: IShareRepository;
  private readonly relay: Pick<RelayPipeline, 'retract'>;
  private readonly generateToken: () => string;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(deps: ShareRegistryDependencies) {
    this.repository = deps.repository;
    this.relay = deps.relay;
    this.generateToken = deps.generateToken ?? generateShareToken;
    this.now = deps.now ?? (() => new Date());
    this.log = deps.logger ?? createChildLogger({ service: 'ShareRegistry' });
  }

  /**
   * Persist a share and return its token
   *
   * @throws PersistenceError on storage failure
   */
  async create(
    ownerId: PrincipalId,
    itemRefs: readonly ItemRef[],
    caption: string,
    kind: ShareKindValue
  ): Promise<string> {
    const base = {
      itemRefs: [...itemRefs],
      ownerId,
      caption: caption.slice(0, MAX_CAPTION_LENGTH),
      kind,
      createdAt: this.now(),
    };

    for (let attempt = 1; attempt <= MAX_TOKEN_ATTEMPTS; attempt++) {
      const record: ShareRecord = { shareToken: this.generateToken(), ...base };
      let inserted: boolean;
      try {
        inserted = await this.repository.insert(record);
      } catch (error) {
        this.log.error({ err: error, ownerId, items: itemRefs.length }, 'Failed to persist share');
        throw new PersistenceError(`Share could not be saved: ${errorMessage(error)}`, { cause: error });
      }
      if (inserted) {
        this.log.info({ ownerId, shareToken: record.shareToken, items: itemRefs.length }, 'Share created');
        return record.shareToken;
      }
    }

    throw new PersistenceError(`No free share token after ${MAX_TOKEN_ATTEMPTS} attempts`);
  }

  /**
   * @throws PersistenceError on read failure
   */
  async lookup(shareToken: string): Promise<ShareRecord | null> {
    return this.read(() => this.repository.findByToken(shareToken), { shareToken });
  }

  /**
   * Owner's shares, newest first
   */
  async listByOwner(ownerId: PrincipalId, offset: number, limit: number): Promise<ShareSummary[]> {
    const records = await this.read(() => this.repository.findByOwner(ownerId, offset, limit), { ownerId });
    return records.map((record) => ({
      shareToken: record.shareToken,
      caption: record.caption,
      kind: record.kind,
      itemCount: record.itemRefs.length,
      createdAt: record.createdAt,
    }));
  }

  async countByOwner(ownerId: PrincipalId): Promise<number> {
    return this.read(() => this.repository.countByOwner(ownerId), { ownerId });
  }

  /**
   * Delete a share on behalf of its owner
   *
   * Retraction failures come back as warnings; the row stays deleted.
   */
  async delete(shareToken: string, requesterId: PrincipalId): Promise<ShareDeletionResult> {
    const record = await this.lookup(shareToken);
    if (!record) {
      return { outcome: 'not_found' };
    }
    if (record.ownerId !== requesterId) {
      this.log.warn({ shareToken, requesterId, ownerId: record.ownerId }, 'Delete refused, requester is not the owner');
      return { outcome: 'forbidden' };
    }

    const removed = await this.read(() => this.repository.deleteByToken(shareToken), { shareToken });
    if (!removed) {
      return { outcome: 'not_found' };
    }

    const { warnings } = await this.relay.retract(record.itemRefs);
    if (warnings.length > 0) {
      this.log.warn({ shareToken, warnings }, 'Share deleted, some items could not be retracted');
    } else {
      this.log.info({ shareToken, items: record.itemRefs.length }, 'Share deleted');
    }
    return { outcome: 'deleted', record, warnings };
  }

  private async read<T>(operation: () => Promise<T>, context: Record<string, unknown>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      this.log.error({ err: error, ...context }, 'Share registry read failed');
      throw new PersistenceError(`Share registry unavailable: ${errorMessage(error)}`, { cause: error });
    }
  }
}
