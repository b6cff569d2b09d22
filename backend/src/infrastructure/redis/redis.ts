/**
 * Redis Configuration with Profile System
 *
 * - PRODUCTION: retries with backoff, offline queue enabled
 * - TEST: fast-fail settings
 *
 * Redis is optional: without REDIS_HOST the upload session and viewer
 * state stores run in process memory.
 *
 * @module infrastructure/redis/redis
 */

import Redis, { type RedisOptions } from 'ioredis';
import { createChildLogger } from '@/shared/utils/logger';
import { env, isTest } from '@/infrastructure/config/environment';

const logger = createChildLogger({ service: 'RedisConfig' });

export type RedisProfile = 'PRODUCTION' | 'TEST';

const REDIS_PROFILES: Record<RedisProfile, Partial<RedisOptions>> = {
  PRODUCTION: {
    maxRetriesPerRequest: 3,
    connectTimeout: 10000,
    commandTimeout: 5000,
    enableOfflineQueue: true,
    retryStrategy: (times: number) => {
      const delay = Math.min(times * 50, 2000);
      logger.debug({ attempt: times, delayMs: delay }, 'Retrying Redis connection');
      return delay;
    },
    reconnectOnError: (err: Error) => {
      if (err.message.includes('READONLY')) {
        logger.warn({ error: err.message }, 'Reconnecting due to READONLY error');
        return true;
      }
      return false;
    },
  },

  TEST: {
    maxRetriesPerRequest: 1,
    connectTimeout: 2000,
    commandTimeout: 1000,
    enableOfflineQueue: false,
    retryStrategy: (times: number) => (times > 1 ? null : 100),
  },
};

export function getDefaultProfile(): RedisProfile {
  return isTest ? 'TEST' : 'PRODUCTION';
}

/**
 * True when Redis connection settings are present
 */
export function isRedisConfigured(): boolean {
  return Boolean(env.REDIS_HOST && env.REDIS_PORT);
}

/**
 * Create Redis client with specified profile
 *
 * Uses TLS on port 6380 and skips AUTH when no password is set.
 */
export function createRedisClient(profile: RedisProfile = getDefaultProfile()): Redis {
  const redisHost = env.REDIS_HOST;
  const redisPort = env.REDIS_PORT;
  const redisPassword = env.REDIS_PASSWORD;

  if (!redisHost || !redisPort) {
    throw new Error('Redis configuration is incomplete. Provide REDIS_HOST and REDIS_PORT.');
  }

  const finalConfig: RedisOptions = {
    host: redisHost,
    port: redisPort,
    ...(redisPassword ? { password: redisPassword } : {}),
    lazyConnect: false,
    ...(redisPort === 6380 ? { tls: {} } : {}),
    ...REDIS_PROFILES[profile],
  };

  logger.info(
    {
      profile,
      host: redisHost,
      port: redisPort,
      tls: redisPort === 6380,
      maxRetriesPerRequest: finalConfig.maxRetriesPerRequest,
    },
    'Creating Redis client'
  );

  const client = new Redis(finalConfig);

  client.on('ready', () => {
    logger.info({ profile }, 'Redis client ready');
  });

  client.on('error', (err: Error) => {
    logger.error({ profile, err }, 'Redis client error');
  });

  client.on('reconnecting', (timeMs: number) => {
    logger.info({ profile, delayMs: timeMs }, 'Redis client reconnecting');
  });

  client.on('end', () => {
    logger.warn({ profile }, 'Redis connection ended');
  });

  return client;
}

let _defaultRedisClient: Redis | null = null;

/**
 * Initialize the shared Redis client and wait until it is ready
 */
export async function initRedis(): Promise<Redis> {
  if (_defaultRedisClient && _defaultRedisClient.status === 'ready') {
    return _defaultRedisClient;
  }

  const client = createRedisClient(getDefaultProfile());
  _defaultRedisClient = client;

  if (client.status !== 'ready') {
    await new Promise<void>((resolve, reject) => {
      const timeout = setTimeout(() => {
        reject(new Error('Redis connection timeout'));
      }, 10000);

      client.once('ready', () => {
        clearTimeout(timeout);
        resolve();
      });

      client.once('error', (err: Error) => {
        clearTimeout(timeout);
        reject(err);
      });
    });
  }

  return client;
}

export async function closeRedis(): Promise<void> {
  if (_defaultRedisClient) {
    await _defaultRedisClient.quit();
    _defaultRedisClient = null;
    logger.info('Redis connection closed');
  }
}

export async function checkRedisHealth(): Promise<boolean> {
  if (!_defaultRedisClient) {
    return false;
  }
  try {
    return (await _defaultRedisClient.ping()) === 'PONG';
  } catch (error) {
    logger.error({ err: error }, 'Redis health check failed');
    return false;
  }
}
