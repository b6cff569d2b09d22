/**
 * Redis infrastructure
 * @module infrastructure/redis
 */

export {
  createRedisClient,
  initRedis,
  closeRedis,
  checkRedisHealth,
  isRedisConfigured,
  getDefaultProfile,
  type RedisProfile,
} from './redis';
