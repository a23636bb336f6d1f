import type { SearchGatewayConfig } from '../config/index.js';
import type { ProfileCache } from './ProfileCache.js';
import { MemoryProfileCache } from './MemoryProfileCache.js';
import { RedisProfileCache } from './RedisProfileCache.js';

/**
 * Create a profile cache based on configuration
 */
export function createProfileCache(config: SearchGatewayConfig): ProfileCache {
  switch (config.cache.provider) {
    case 'memory':
      return new MemoryProfileCache(config.cache.ttlSeconds);

    case 'redis':
      if (!config.cache.connectionString) {
        throw new Error('Redis connection string is required when using Redis cache provider');
      }
      return new RedisProfileCache(
        config.cache.connectionString,
        config.cache.ttlSeconds,
        config.cache.redis?.database,
        config.cache.redis?.keyPrefix
      );

    default:
      throw new Error(`Unknown cache provider: ${String(config.cache.provider)}`);
  }
}

export * from './ProfileCache.js';
export * from './MemoryProfileCache.js';
export * from './RedisProfileCache.js';
