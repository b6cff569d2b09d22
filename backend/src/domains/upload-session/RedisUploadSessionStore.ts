/**
 * Upload Session Store (Redis implementation)
 *
 * Redis Keys:
 * - `relay:upload:{principalId}` - session mode (present only while collecting)
 * - `relay:upload:{principalId}:refs` - list of accepted item refs
 *
 * Check-and-append, drain and restore run as Lua scripts so a drain can
 * never interleave with an append. Both keys expire after the session TTL,
 * refreshed on every write.
 *
 * @module domains/upload-session
 */

import type Redis from 'ioredis';
import type { Logger } from 'pino';
import {
  RELAY_CONFIG,
  SESSION_MODE,
  type DrainedSession,
  type ItemRef,
  type PrincipalId,
  type UploadSession,
} from '@relayshare/shared';
import { createChildLogger } from '@/shared/utils/logger';
import { InvalidStateError } from '@/shared/errors/relay-errors';
import type { IUploadSessionStore } from './IUploadSessionStore';

const KEY_PREFIX = 'relay:upload:';

export function sessionKey(principalId: PrincipalId): string {
  return `${KEY_PREFIX}${principalId}`;
}

export function refsKey(principalId: PrincipalId): string {
  return `${KEY_PREFIX}${principalId}:refs`;
}

/**
 * KEYS[1] session, KEYS[2] refs; ARGV[1] ttl ms, ARGV[2..] refs.
 * Returns -1 when not collecting, otherwise the new length.
 */
export const ACCEPT_SCRIPT = `
if redis.call('GET', KEYS[1]) ~= 'collecting' then
  return -1
end
local len = redis.call('LLEN', KEYS[2])
if #ARGV > 1 then
  len = redis.call('RPUSH', KEYS[2], unpack(ARGV, 2))
end
redis.call('PEXPIRE', KEYS[1], ARGV[1])
redis.call('PEXPIRE', KEYS[2], ARGV[1])
return len
`;

/**
 * KEYS[1] session, KEYS[2] refs. Returns the refs and deletes both keys.
 */
export const DRAIN_SCRIPT = `
local refs = redis.call('LRANGE', KEYS[2], 0, -1)
redis.call('DEL', KEYS[1], KEYS[2])
return refs
`;

/**
 * KEYS[1] session, KEYS[2] refs; ARGV[1] ttl ms, ARGV[2..] refs to prepend.
 */
export const RESTORE_SCRIPT = `
for i = #ARGV, 2, -1 do
  redis.call('LPUSH', KEYS[2], ARGV[i])
end
redis.call('SET', KEYS[1], 'collecting', 'PX', ARGV[1])
if #ARGV > 1 then
  redis.call('PEXPIRE', KEYS[2], ARGV[1])
end
return 1
`;

export interface RedisUploadSessionStoreDependencies {
  redis: Redis;
  ttlMs?: number;
  logger?: Logger;
}

function toRefs(values: readonly unknown[]): ItemRef[] {
  return values.map(Number).filter((ref) => Number.isSafeInteger(ref) && ref > 0);
}

export class RedisUploadSessionStore implements IUploadSessionStore {
  private readonly redis: Redis;
  private readonly ttlMs: number;
  private readonly log: Logger;

  constructor(deps: RedisUploadSessionStoreDependencies) {
    this.redis = deps.redis;
    this.ttlMs = deps.ttlMs ?? RELAY_CONFIG.UPLOAD_SESSION_TTL_MS;
    this.log = deps.logger ?? createChildLogger({ service: 'RedisUploadSessionStore' });
  }

  async begin(principalId: PrincipalId): Promise<void> {
    const results = await this.redis
      .multi()
      .del(refsKey(principalId))
      .set(sessionKey(principalId), SESSION_MODE.COLLECTING, 'PX', this.ttlMs)
      .exec();
    if (results === null) {
      throw new Error(`Upload session transaction for ${principalId} was discarded`);
    }
    const failure = results.find(([error]) => error !== null)?.[0];
    if (failure) {
      throw failure;
    }
    this.log.debug({ principalId }, 'Upload session started');
  }

  async accept(principalId: PrincipalId, refs: readonly ItemRef[]): Promise<number> {
    const result = await this.redis.eval(
      ACCEPT_SCRIPT,
      2,
      sessionKey(principalId),
      refsKey(principalId),
      this.ttlMs,
      ...refs
    );

    const count = Number(result);
    if (count < 0) {
      throw new InvalidStateError(`Upload session of ${principalId} is not collecting`);
    }
    return count;
  }

  async drain(principalId: PrincipalId): Promise<DrainedSession> {
    const result = await this.redis.eval(DRAIN_SCRIPT, 2, sessionKey(principalId), refsKey(principalId));
    const itemRefs = Array.isArray(result) ? toRefs(result) : [];
    return { itemRefs, itemCount: itemRefs.length };
  }

  async abandon(principalId: PrincipalId): Promise<void> {
    await this.redis.del(sessionKey(principalId), refsKey(principalId));
  }

  async get(principalId: PrincipalId): Promise<UploadSession> {
    const [mode, refs] = await Promise.all([
      this.redis.get(sessionKey(principalId)),
      this.redis.lrange(refsKey(principalId), 0, -1),
    ]);

    if (mode !== SESSION_MODE.COLLECTING) {
      return { principalId, mode: SESSION_MODE.IDLE, itemRefs: [], itemCount: 0 };
    }
    const itemRefs = toRefs(refs);
    return { principalId, mode: SESSION_MODE.COLLECTING, itemRefs, itemCount: itemRefs.length };
  }

  async restore(principalId: PrincipalId, refs: readonly ItemRef[]): Promise<void> {
    await this.redis.eval(RESTORE_SCRIPT, 2, sessionKey(principalId), refsKey(principalId), this.ttlMs, ...refs);
    this.log.info({ principalId, restored: refs.length }, 'Upload session restored');
  }
}
