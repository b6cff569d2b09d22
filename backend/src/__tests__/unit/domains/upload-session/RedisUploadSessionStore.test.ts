/**
 * RedisUploadSessionStore Unit Tests
 *
 * The ioredis client is replaced by a mock; the Lua scripts are checked by
 * the arguments they receive.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type Redis from 'ioredis';
import {
  ACCEPT_SCRIPT,
  DRAIN_SCRIPT,
  RESTORE_SCRIPT,
  RedisUploadSessionStore,
  refsKey,
  sessionKey,
} from '@/domains/upload-session/RedisUploadSessionStore';
import { InvalidStateError } from '@/shared/errors/relay-errors';

function createRedisMock() {
  const transaction = {
    del: vi.fn(),
    set: vi.fn(),
    exec: vi.fn().mockResolvedValue([]),
  };
  transaction.del.mockReturnValue(transaction);
  transaction.set.mockReturnValue(transaction);

  return {
    transaction,
    multi: vi.fn(() => transaction),
    eval: vi.fn(),
    del: vi.fn().mockResolvedValue(2),
    get: vi.fn(),
    lrange: vi.fn(),
  };
}

describe('RedisUploadSessionStore', () => {
  const principal = 1001;
  const ttlMs = 60_000;
  let redis: ReturnType<typeof createRedisMock>;
  let store: RedisUploadSessionStore;

  beforeEach(() => {
    redis = createRedisMock();
    store = new RedisUploadSessionStore({ redis: redis as unknown as Redis, ttlMs });
  });

  it('builds keys from the principal id', () => {
    expect(sessionKey(principal)).toBe('relay:upload:1001');
    expect(refsKey(principal)).toBe('relay:upload:1001:refs');
  });

  it('begin clears the refs and marks the session collecting', async () => {
    await store.begin(principal);

    expect(redis.transaction.del).toHaveBeenCalledWith('relay:upload:1001:refs');
    expect(redis.transaction.set).toHaveBeenCalledWith('relay:upload:1001', 'collecting', 'PX', ttlMs);
    expect(redis.transaction.exec).toHaveBeenCalledTimes(1);
  });

  it('begin fails when a command inside the transaction fails', async () => {
    const error = new Error('OOM command not allowed when used memory > maxmemory');
    redis.transaction.exec.mockResolvedValue([
      [null, 1],
      [error, null],
    ]);

    await expect(store.begin(principal)).rejects.toBe(error);
  });

  it('begin fails when the transaction is discarded', async () => {
    redis.transaction.exec.mockResolvedValue(null);

    await expect(store.begin(principal)).rejects.toThrow('Upload session transaction for 1001 was discarded');
  });

  it('accept runs the append script and returns the new length', async () => {
    redis.eval.mockResolvedValue(3);

    await expect(store.accept(principal, [11, 12])).resolves.toBe(3);
    expect(redis.eval).toHaveBeenCalledWith(
      ACCEPT_SCRIPT,
      2,
      'relay:upload:1001',
      'relay:upload:1001:refs',
      ttlMs,
      11,
      12
    );
  });

  it('accept throws when the script reports no collecting session', async () => {
    redis.eval.mockResolvedValue(-1);

    await expect(store.accept(principal, [11])).rejects.toBeInstanceOf(InvalidStateError);
  });

  it('drain converts the returned list to refs', async () => {
    redis.eval.mockResolvedValue(['11', '12', 'junk']);

    await expect(store.drain(principal)).resolves.toEqual({ itemRefs: [11, 12], itemCount: 2 });
    expect(redis.eval).toHaveBeenCalledWith(DRAIN_SCRIPT, 2, 'relay:upload:1001', 'relay:upload:1001:refs');
  });

  it('drain of a missing session is empty', async () => {
    redis.eval.mockResolvedValue(null);

    await expect(store.drain(principal)).resolves.toEqual({ itemRefs: [], itemCount: 0 });
  });

  it('get reports idle when the mode key is absent', async () => {
    redis.get.mockResolvedValue(null);
    redis.lrange.mockResolvedValue(['11']);

    await expect(store.get(principal)).resolves.toEqual({
      principalId: principal,
      mode: 'idle',
      itemRefs: [],
      itemCount: 0,
    });
  });

  it('get reads the refs of a collecting session', async () => {
    redis.get.mockResolvedValue('collecting');
    redis.lrange.mockResolvedValue(['11', '12']);

    await expect(store.get(principal)).resolves.toEqual({
      principalId: principal,
      mode: 'collecting',
      itemRefs: [11, 12],
      itemCount: 2,
    });
  });

  it('abandon deletes both keys', async () => {
    await store.abandon(principal);

    expect(redis.del).toHaveBeenCalledWith('relay:upload:1001', 'relay:upload:1001:refs');
  });

  it('restore runs the prepend script', async () => {
    redis.eval.mockResolvedValue(1);

    await store.restore(principal, [11, 12]);

    expect(redis.eval).toHaveBeenCalledWith(
      RESTORE_SCRIPT,
      2,
      'relay:upload:1001',
      'relay:upload:1001:refs',
      ttlMs,
      11,
      12
    );
  });
});
