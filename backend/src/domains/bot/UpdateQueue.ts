/**
 * Update Queue
 *
 * Runs updates of the same principal one after another and updates of
 * different principals concurrently. Webhook deliveries can overlap; this
 * keeps e.g. a finish from racing the file submitted right before it.
 *
 * @module domains/bot/UpdateQueue
 */

import type { Logger } from 'pino';
import { createChildLogger } from '@/shared/utils/logger';
import type { TelegramUpdate } from '@/infrastructure/telegram';

export type UpdateHandler = (update: TelegramUpdate) => Promise<void>;

export function principalOf(update: TelegramUpdate): number | null {
  return update.message?.from?.id ?? update.callback_query?.from.id ?? null;
}

export class UpdateQueue {
  private readonly chains = new Map<string, Promise<void>>();
  private readonly log: Logger;

  constructor(
    private readonly handler: UpdateHandler,
    logger?: Logger
  ) {
    this.log = logger ?? createChildLogger({ service: 'UpdateQueue' });
  }

  enqueue(update: TelegramUpdate): Promise<void> {
    const principal = principalOf(update);
    const key = principal === null ? `update:${update.update_id}` : `principal:${principal}`;
    const previous = this.chains.get(key) ?? Promise.resolve();

    const next = previous
      .then(() => this.handler(update))
      .catch((error: unknown) => {
        this.log.error({ err: error, updateId: update.update_id, principalId: principal }, 'Queued update failed');
      })
      .finally(() => {
        if (this.chains.get(key) === next) {
          this.chains.delete(key);
        }
      });

    this.chains.set(key, next);
    return next;
  }

  get pending(): number {
    return this.chains.size;
  }

  /**
   * Wait until every queued update has been handled
   */
  async drain(): Promise<void> {
    while (this.chains.size > 0) {
      await Promise.all([...this.chains.values()]);
    }
  }
}
