/**
 * MssqlShareRepository
 *
 * Share rows in SQL Server. `item_refs` holds the channel message ids as a
 * comma-separated list in upload order.
 */

import type { Logger } from 'pino';
import { SHARE_KIND, type PrincipalId, type ShareKindValue, type ShareRecord } from '@relayshare/shared';
import { createChildLogger } from '@/shared/utils/logger';
import { executeQuery } from '@/infrastructure/database/database';
import type { IShareRepository } from './IShareRepository';

/**
 * Raw row; mssql returns BIGINT columns as strings
 */
export interface ShareDbRecord {
  share_token: string;
  item_refs: string;
  owner_id: string | number;
  caption: string;
  kind: string;
  created_at: Date;
}

/** Primary key violation */
const DUPLICATE_KEY_ERROR = 2627;

const SELECT_COLUMNS = 'share_token, item_refs, owner_id, caption, kind, created_at';

export function serializeItemRefs(itemRefs: readonly number[]): string {
  return itemRefs.join(',');
}

export function parseItemRefs(raw: string): number[] {
  return raw
    .split(',')
    .map((part) => Number(part.trim()))
    .filter((ref) => Number.isSafeInteger(ref) && ref > 0);
}

function parseKind(raw: string): ShareKindValue {
  return raw === SHARE_KIND.FILE ? SHARE_KIND.FILE : SHARE_KIND.COLLECTION;
}

export function parseShareRow(row: ShareDbRecord): ShareRecord {
  return {
    shareToken: row.share_token,
    itemRefs: parseItemRefs(row.item_refs),
    ownerId: Number(row.owner_id),
    caption: row.caption,
    kind: parseKind(row.kind),
    createdAt: row.created_at,
  };
}

function isDuplicateKey(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'number' in error && error.number === DUPLICATE_KEY_ERROR;
}

export class MssqlShareRepository implements IShareRepository {
  private readonly logger: Logger;

  constructor(deps?: { logger?: Logger }) {
    this.logger = deps?.logger ?? createChildLogger({ service: 'MssqlShareRepository' });
  }

  async insert(record: ShareRecord): Promise<boolean> {
    try {
      await executeQuery(
        `INSERT INTO shares (share_token, item_refs, owner_id, caption, kind, created_at)
         VALUES (@share_token, @item_refs, @owner_id, @caption, @kind, @created_at)`,
        {
          share_token: record.shareToken,
          item_refs: serializeItemRefs(record.itemRefs),
          owner_id: record.ownerId,
          caption: record.caption,
          kind: record.kind,
          created_at: record.createdAt,
        }
      );
      return true;
    } catch (error) {
      if (isDuplicateKey(error)) {
        this.logger.warn({ shareToken: record.shareToken }, 'Share token collision');
        return false;
      }
      throw error;
    }
  }

  async findByToken(shareToken: string): Promise<ShareRecord | null> {
    const result = await executeQuery<ShareDbRecord>(
      `SELECT ${SELECT_COLUMNS} FROM shares WHERE share_token = @share_token`,
      { share_token: shareToken }
    );
    const row = result.recordset[0];
    return row ? parseShareRow(row) : null;
  }

  async findByOwner(ownerId: PrincipalId, offset: number, limit: number): Promise<ShareRecord[]> {
    if (limit <= 0) {
      return [];
    }
    const result = await executeQuery<ShareDbRecord>(
      `SELECT ${SELECT_COLUMNS} FROM shares
       WHERE owner_id = @owner_id
       ORDER BY created_at DESC, share_token
       OFFSET @offset ROWS FETCH NEXT @limit ROWS ONLY`,
      { owner_id: ownerId, offset, limit }
    );
    return result.recordset.map(parseShareRow);
  }

  async countByOwner(ownerId: PrincipalId): Promise<number> {
    const result = await executeQuery<{ total: number }>(
      'SELECT COUNT(*) AS total FROM shares WHERE owner_id = @owner_id',
      { owner_id: ownerId }
    );
    return result.recordset[0]?.total ?? 0;
  }

  async deleteByToken(shareToken: string): Promise<boolean> {
    const result = await executeQuery('DELETE FROM shares WHERE share_token = @share_token', {
      share_token: shareToken,
    });
    return (result.rowsAffected[0] ?? 0) > 0;
  }
}
