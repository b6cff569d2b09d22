/**
 * Debounced Batcher
 *
 * Per-key buffers flushed once no item has arrived for `delayMs`. Each
 * arrival cancels the key's timer and schedules a new one, so a batch drains
 * exactly once, `delayMs` after its last item.
 *
 * Key lifecycle: absent -> buffering -> draining -> absent. A key that
 * arrives again while its previous batch is draining starts a new batch.
 *
 * @module domains/scheduling/DebouncedBatcher
 */

import type { Logger } from 'pino';
import { createChildLogger } from '@/shared/utils/logger';
import type { ITimerScheduler, TimerHandle } from './ITimerScheduler';

export interface BatchContext<TMeta> {
  key: string;
  meta: TMeta;
}

export type FlushHandler<TItem, TMeta> = (items: TItem[], context: BatchContext<TMeta>) => Promise<void>;

export interface DebouncedBatcherOptions<TItem, TMeta> {
  delayMs: number;
  scheduler: ITimerScheduler;
  onFlush: FlushHandler<TItem, TMeta>;
  logger?: Logger;
}

interface PendingBatch<TItem, TMeta> {
  items: TItem[];
  meta: TMeta;
  timer: TimerHandle;
}

export interface AddResult {
  /** True when the item opened a new batch */
  created: boolean;
  size: number;
}

export class DebouncedBatcher<TItem, TMeta> {
  private readonly pending = new Map<string, PendingBatch<TItem, TMeta>>();
  private readonly inFlight = new Map<Promise<void>, BatchContext<TMeta>>();
  private readonly delayMs: number;
  private readonly scheduler: ITimerScheduler;
  private readonly onFlush: FlushHandler<TItem, TMeta>;
  private readonly log: Logger;

  constructor(options: DebouncedBatcherOptions<TItem, TMeta>) {
    this.delayMs = options.delayMs;
    this.scheduler = options.scheduler;
    this.onFlush = options.onFlush;
    this.log = options.logger ?? createChildLogger({ service: 'DebouncedBatcher' });
  }

  /**
   * Append an item to the key's batch and restart its timer.
   * `meta` is taken from the first item of a batch.
   */
  add(key: string, item: TItem, meta: TMeta): AddResult {
    const existing = this.pending.get(key);

    if (existing) {
      existing.timer.cancel();
      existing.items.push(item);
      existing.timer = this.scheduler.schedule(this.delayMs, () => this.flush(key));
      return { created: false, size: existing.items.length };
    }

    this.pending.set(key, {
      items: [item],
      meta,
      timer: this.scheduler.schedule(this.delayMs, () => this.flush(key)),
    });
    return { created: true, size: 1 };
  }

  has(key: string): boolean {
    return this.pending.has(key);
  }

  get size(): number {
    return this.pending.size;
  }

  /**
   * Cancel and drop every pending batch whose meta matches
   *
   * @returns the dropped batches
   */
  discardWhere(predicate: (meta: TMeta, key: string) => boolean): Array<BatchContext<TMeta> & { items: TItem[] }> {
    const dropped: Array<BatchContext<TMeta> & { items: TItem[] }> = [];
    for (const [key, batch] of this.pending) {
      if (predicate(batch.meta, key)) {
        batch.timer.cancel();
        this.pending.delete(key);
        dropped.push({ key, meta: batch.meta, items: batch.items });
      }
    }
    return dropped;
  }

  /**
   * Wait for every drain that has started
   */
  async settle(): Promise<void> {
    await this.settleWhere(() => true);
  }

  /**
   * Wait only for started drains whose meta matches; other keys' drains
   * are not awaited
   */
  async settleWhere(predicate: (meta: TMeta, key: string) => boolean): Promise<void> {
    for (;;) {
      const matching = [...this.inFlight]
        .filter(([, context]) => predicate(context.meta, context.key))
        .map(([drain]) => drain);
      if (matching.length === 0) {
        return;
      }
      await Promise.all(matching);
    }
  }

  /**
   * Cancel all timers without draining
   */
  shutdown(): void {
    for (const batch of this.pending.values()) {
      batch.timer.cancel();
    }
    this.pending.clear();
  }

  private flush(key: string): void {
    const batch = this.pending.get(key);
    if (!batch) {
      return;
    }
    this.pending.delete(key);

    const context: BatchContext<TMeta> = { key, meta: batch.meta };
    const drain = this.onFlush(batch.items, context)
      .catch((error: unknown) => {
        this.log.error({ err: error, key, size: batch.items.length }, 'Batch flush failed');
      })
      .finally(() => {
        this.inFlight.delete(drain);
      });
    this.inFlight.set(drain, context);
  }
}
