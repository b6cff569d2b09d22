import { describe, it, expect } from 'vitest';
import { UpdateQueue, principalOf } from '@/domains/bot/UpdateQueue';
import type { TelegramUpdate } from '@/infrastructure/telegram';
import { callbackUpdate, textUpdate } from '@/__tests__/helpers/updates';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('UpdateQueue', () => {
  it('finds the principal of messages and callbacks', () => {
    expect(principalOf(textUpdate(1001, 'hi'))).toBe(1001);
    expect(principalOf(callbackUpdate(2002, 'noop'))).toBe(2002);
    expect(principalOf({ update_id: 1 })).toBeNull();
  });

  it('runs one principal\'s updates in arrival order', async () => {
    const gate = deferred();
    const order: string[] = [];
    const queue = new UpdateQueue(async (update: TelegramUpdate) => {
      const text = update.message?.text ?? '';
      if (text === 'first') {
        await gate.promise;
      }
      order.push(text);
    });

    const first = queue.enqueue(textUpdate(1001, 'first'));
    const second = queue.enqueue(textUpdate(1001, 'second'));
    const other = queue.enqueue(textUpdate(2002, 'other'));

    await other;
    expect(order).toEqual(['other']);

    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(['other', 'first', 'second']);
    expect(queue.pending).toBe(0);
  });

  it('keeps the chain alive after a failing update', async () => {
    const handled: string[] = [];
    const queue = new UpdateQueue(async (update) => {
      const text = update.message?.text ?? '';
      if (text === 'boom') {
        throw new Error('handler failed');
      }
      handled.push(text);
    });

    await queue.enqueue(textUpdate(1001, 'boom'));
    await queue.enqueue(textUpdate(1001, 'after'));

    expect(handled).toEqual(['after']);
  });

  it('drain waits for everything queued', async () => {
    const gate = deferred();
    let done = false;
    const queue = new UpdateQueue(async () => {
      await gate.promise;
      done = true;
    });

    void queue.enqueue(textUpdate(1001, 'slow'));
    const drained = queue.drain();
    gate.resolve();
    await drained;

    expect(done).toBe(true);
  });
});
