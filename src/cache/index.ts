import type { CacheConfig } from '../config/schema.js';
import { MemoryCache } from './memory.js';
import { RedisCache, createRedisClient } from './redis.js';
import type { ResponseCache } from './types.js';

export type { ResponseCache } from './types.js';
export { MemoryCache } from './memory.js';
export { RedisCache, type RedisClient } from './redis.js';

/** Build the cache backend named by the config; `none` disables caching. */
export function createCache(config: CacheConfig): ResponseCache | undefined {
  switch (config.type) {
    case 'memory':
      return new MemoryCache();
    case 'redis':
      return new RedisCache(createRedisClient(config), config.prefix, config.ttlSeconds);
    case 'none':
      return undefined;
  }
}
