/**
 * Viewer State Store (Redis implementation)
 *
 * Redis Keys:
 * - `relay:viewer:{principalId}` - hash with `pending` (token) and `page` (PageView JSON)
 *
 * @module domains/viewer-state
 */

import type Redis from 'ioredis';
import type { Logger } from 'pino';
import { z } from 'zod';
import { RELAY_CONFIG, type PageView, type PrincipalId, type ViewerState } from '@relayshare/shared';
import { createChildLogger } from '@/shared/utils/logger';
import type { IViewerStateStore } from './IViewerStateStore';

const pageViewSchema = z.object({
  shareToken: z.string(),
  page: z.number().int().positive(),
  totalPages: z.number().int().positive(),
  itemMessageIds: z.array(z.number().int()),
  panelMessageId: z.number().int().nullable(),
});

export function viewerKey(principalId: PrincipalId): string {
  return `relay:viewer:${principalId}`;
}

export interface RedisViewerStateStoreDependencies {
  redis: Redis;
  ttlMs?: number;
  logger?: Logger;
}

export class RedisViewerStateStore implements IViewerStateStore {
  private readonly redis: Redis;
  private readonly ttlMs: number;
  private readonly log: Logger;

  constructor(deps: RedisViewerStateStoreDependencies) {
    this.redis = deps.redis;
    this.ttlMs = deps.ttlMs ?? RELAY_CONFIG.UPLOAD_SESSION_TTL_MS;
    this.log = deps.logger ?? createChildLogger({ service: 'RedisViewerStateStore' });
  }

  async get(principalId: PrincipalId): Promise<ViewerState> {
    const [pending, page] = await this.redis.hmget(viewerKey(principalId), 'pending', 'page');
    return {
      pendingShareToken: pending ?? null,
      pageView: page ? this.parsePageView(principalId, page) : null,
    };
  }

  async setPendingShare(principalId: PrincipalId, shareToken: string | null): Promise<void> {
    await this.write(principalId, 'pending', shareToken);
  }

  async setPageView(principalId: PrincipalId, pageView: PageView | null): Promise<void> {
    await this.write(principalId, 'page', pageView ? JSON.stringify(pageView) : null);
  }

  private async write(principalId: PrincipalId, field: 'pending' | 'page', value: string | null): Promise<void> {
    const key = viewerKey(principalId);
    if (value === null) {
      await this.redis.hdel(key, field);
      return;
    }
    await this.redis.multi().hset(key, field, value).pexpire(key, this.ttlMs).exec();
  }

  private parsePageView(principalId: PrincipalId, raw: string): PageView | null {
    try {
      const parsed = pageViewSchema.safeParse(JSON.parse(raw));
      if (parsed.success) {
        return parsed.data;
      }
    } catch (error) {
      this.log.warn({ err: error, principalId }, 'Unreadable page view discarded');
      return null;
    }
    this.log.warn({ principalId }, 'Malformed page view discarded');
    return null;
  }
}
