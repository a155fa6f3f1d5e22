import type { Redis } from 'ioredis';
import type { SharedCacheBackend } from '../ai/resultCache.js';

export function createRedisCacheBackend(redis: Redis): SharedCacheBackend {
  return {
    async get(key) {
      return redis.get(key);
    },
    async set(key, value, ttlSeconds) {
      await redis.set(key, value, 'EX', ttlSeconds);
    },
    async del(key) {
      await redis.del(key);
    },
  };
}
