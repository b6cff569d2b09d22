import type { PrincipalId, ShareRecord } from '@relayshare/shared';
import type { IShareRepository } from './IShareRepository';

function copy(record: ShareRecord): ShareRecord {
  return { ...record, itemRefs: [...record.itemRefs] };
}

export class InMemoryShareRepository implements IShareRepository {
  private readonly records = new Map<string, ShareRecord>();

  async insert(record: ShareRecord): Promise<boolean> {
    if (this.records.has(record.shareToken)) {
      return false;
    }
    this.records.set(record.shareToken, copy(record));
    return true;
  }

  async findByToken(shareToken: string): Promise<ShareRecord | null> {
    const record = this.records.get(shareToken);
    return record ? copy(record) : null;
  }

  async findByOwner(ownerId: PrincipalId, offset: number, limit: number): Promise<ShareRecord[]> {
    return [...this.records.values()]
      .filter((record) => record.ownerId === ownerId)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .slice(offset, offset + Math.max(0, limit))
      .map(copy);
  }

  async countByOwner(ownerId: PrincipalId): Promise<number> {
    let count = 0;
    for (const record of this.records.values()) {
      if (record.ownerId === ownerId) {
        count++;
      }
    }
    return count;
  }

  async deleteByToken(shareToken: string): Promise<boolean> {
    return this.records.delete(shareToken);
  }
}
