/**
 * DebouncedBatcher Unit Tests
 *
 * Timers are driven by vitest fake timers through SystemTimerScheduler.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { DebouncedBatcher } from '@/domains/scheduling/DebouncedBatcher';
import { SystemTimerScheduler } from '@/domains/scheduling/ITimerScheduler';
import { createTestLogger } from '@/__tests__/helpers/mockPinoFactory';

describe('DebouncedBatcher', () => {
  let flushed: Array<{ key: string; meta: string; items: number[] }>;
  let batcher: DebouncedBatcher<number, string>;

  beforeEach(() => {
    vi.useFakeTimers();
    flushed = [];
    batcher = new DebouncedBatcher<number, string>({
      delayMs: 2000,
      scheduler: new SystemTimerScheduler(),
      onFlush: async (items, { key, meta }) => {
        flushed.push({ key, meta, items });
      },
    });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('opens a batch on the first item and reports growth afterwards', () => {
    expect(batcher.add('g1', 1, 'owner')).toEqual({ created: true, size: 1 });
    expect(batcher.add('g1', 2, 'other')).toEqual({ created: false, size: 2 });
    expect(batcher.has('g1')).toBe(true);
    expect(batcher.size).toBe(1);
  });

  it('flushes once, delayMs after the last item', async () => {
    batcher.add('g1', 1, 'a');
    await vi.advanceTimersByTimeAsync(1500);
    batcher.add('g1', 2, 'b');
    await vi.advanceTimersByTimeAsync(1500);
    batcher.add('g1', 3, 'c');

    await vi.advanceTimersByTimeAsync(1999);
    expect(flushed).toEqual([]);

    await vi.advanceTimersByTimeAsync(1);
    await batcher.settle();

    expect(flushed).toEqual([{ key: 'g1', meta: 'a', items: [1, 2, 3] }]);
    expect(batcher.has('g1')).toBe(false);
  });

  it('keeps keys independent', async () => {
    batcher.add('g1', 1, 'a');
    await vi.advanceTimersByTimeAsync(1000);
    batcher.add('g2', 10, 'b');

    await vi.advanceTimersByTimeAsync(1000);
    expect(flushed.map((f) => f.key)).toEqual(['g1']);

    await vi.advanceTimersByTimeAsync(1000);
    await batcher.settle();
    expect(flushed.map((f) => f.key)).toEqual(['g1', 'g2']);
  });

  it('starts a new batch when a key reappears after its flush', async () => {
    batcher.add('g1', 1, 'a');
    await vi.advanceTimersByTimeAsync(2000);
    expect(batcher.add('g1', 2, 'b')).toEqual({ created: true, size: 1 });

    await vi.advanceTimersByTimeAsync(2000);
    await batcher.settle();
    expect(flushed).toEqual([
      { key: 'g1', meta: 'a', items: [1] },
      { key: 'g1', meta: 'b', items: [2] },
    ]);
  });

  it('discards matching batches without flushing them', async () => {
    batcher.add('g1', 1, 'alice');
    batcher.add('g2', 2, 'bob');

    const dropped = batcher.discardWhere((meta) => meta === 'alice');

    expect(dropped).toEqual([{ key: 'g1', meta: 'alice', items: [1] }]);
    await vi.advanceTimersByTimeAsync(5000);
    await batcher.settle();
    expect(flushed).toEqual([{ key: 'g2', meta: 'bob', items: [2] }]);
  });

  it('settle waits for a drain that is still running', async () => {
    let release: () => void = () => undefined;
    const done: string[] = [];
    const slow = new DebouncedBatcher<number, string>({
      delayMs: 100,
      scheduler: new SystemTimerScheduler(),
      onFlush: async (_items, { key }) => {
        await new Promise<void>((resolve) => {
          release = resolve;
        });
        done.push(key);
      },
    });

    slow.add('g1', 1, 'a');
    await vi.advanceTimersByTimeAsync(100);

    const settled = slow.settle();
    expect(done).toEqual([]);
    release();
    await settled;
    expect(done).toEqual(['g1']);
  });

  it('settleWhere ignores drains of other metas', async () => {
    let releaseBob: () => void = () => undefined;
    const done: string[] = [];
    const mixed = new DebouncedBatcher<number, string>({
      delayMs: 100,
      scheduler: new SystemTimerScheduler(),
      onFlush: async (_items, { key, meta }) => {
        if (meta === 'bob') {
          await new Promise<void>((resolve) => {
            releaseBob = resolve;
          });
        }
        done.push(key);
      },
    });

    mixed.add('g1', 1, 'alice');
    mixed.add('g2', 2, 'bob');
    await vi.advanceTimersByTimeAsync(100);

    await mixed.settleWhere((meta) => meta === 'alice');
    expect(done).toEqual(['g1']);

    releaseBob();
    await mixed.settle();
    expect(done).toEqual(['g1', 'g2']);
  });

  it('logs a failed flush and keeps working', async () => {
    const { testLogger, hasLogWithMessage } = createTestLogger();
    const failing = new DebouncedBatcher<number, string>({
      delayMs: 100,
      scheduler: new SystemTimerScheduler(),
      onFlush: async () => {
        throw new Error('boom');
      },
      logger: testLogger,
    });

    failing.add('g1', 1, 'a');
    await vi.advanceTimersByTimeAsync(100);
    await failing.settle();

    expect(hasLogWithMessage('Batch flush failed')).toBe(true);
    expect(failing.size).toBe(0);
  });

  it('shutdown cancels pending timers', async () => {
    batcher.add('g1', 1, 'a');
    batcher.shutdown();

    await vi.advanceTimersByTimeAsync(5000);
    expect(flushed).toEqual([]);
    expect(batcher.size).toBe(0);
  });
});
