import { createClient } from 'redis';
import type { CachedRecord, Profile, Region, SearchType } from '../types/index.js';
import { searchKeyId } from '../types/index.js';
import { BaseProfileCache } from './ProfileCache.js';
import { logger, logCacheOperation } from '../utils/logger.js';

type RedisClient = ReturnType<typeof createClient>;

interface StoredRecord {
  profiles: Profile[];
  status: number;
  cachedAt: string;
  expiresAt: string;
}

function isStoredRecord(value: unknown): value is StoredRecord {
  return (
    typeof value === 'object' &&
    value !== null &&
    'profiles' in value &&
    Array.isArray(value.profiles) &&
    'status' in value &&
    typeof value.status === 'number' &&
    'cachedAt' in value &&
    typeof value.cachedAt === 'string' &&
    'expiresAt' in value &&
    typeof value.expiresAt === 'string'
  );
}

function parseStoredRecord(raw: string): StoredRecord | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  return isStoredRecord(parsed) ? parsed : null;
}

/**
 * Redis cache provider
 * Shared between gateway instances; expiry is delegated to Redis
 */
export class RedisProfileCache extends BaseProfileCache {
  private client: RedisClient;
  private keyPrefix: string;

  constructor(
    connectionString: string,
    defaultTtlSeconds: number,
    database: number = 0,
    keyPrefix: string = 'adventurers:'
  ) {
    super(defaultTtlSeconds);
    this.keyPrefix = keyPrefix;
    this.client = createClient({
      url: connectionString,
      database,
    });
    this.client.on('error', (error: Error) => {
      logger.error('Redis client error', { provider: 'redis' }, error);
    });
  }

  protected async doInitialize(): Promise<void> {
    await this.client.connect();
    await this.client.ping();
  }

  protected async doClose(): Promise<void> {
    await this.client.quit();
  }

  private recordKey(region: Region, query: string, searchType: SearchType): string {
    return `${this.keyPrefix}search:${searchKeyId({ region, query, searchType })}`;
  }

  async get(region: Region, query: string, searchType: SearchType): Promise<CachedRecord | null> {
    this.ensureInitialized();

    const key = this.recordKey(region, query, searchType);
    const raw = await this.client.get(key);
    const parsed = raw ? parseStoredRecord(raw) : null;

    if (!parsed) {
      if (raw) {
        logger.warn('Discarding malformed cache record', { cache_key: key });
      }
      this.misses++;
      logCacheOperation('miss', key);
      return null;
    }

    this.hits++;
    logCacheOperation('hit', key);
    return {
      profiles: parsed.profiles,
      status: parsed.status,
      cachedAt: new Date(parsed.cachedAt),
      expiresAt: new Date(parsed.expiresAt),
    };
  }

  async set(
    region: Region,
    query: string,
    searchType: SearchType,
    record: { profiles: Profile[]; status: number },
    ttlSeconds: number = this.defaultTtlSeconds
  ): Promise<CachedRecord> {
    this.ensureInitialized();

    const key = this.recordKey(region, query, searchType);
    const cached = this.buildRecord(record, ttlSeconds);
    await this.client.set(key, JSON.stringify(cached), { EX: ttlSeconds });

    logCacheOperation('set', key);
    return cached;
  }

  async healthCheck(): Promise<{ healthy: boolean; message?: string }> {
    try {
      this.ensureInitialized();
      await this.client.ping();
      return { healthy: true, message: 'Redis connection healthy' };
    } catch (error) {
      return {
        healthy: false,
        message: `Redis health check failed: ${error instanceof Error ? error.message : String(error)}`,
      };
    }
  }

  protected async getProviderMetrics(): Promise<Record<string, number>> {
    return { database_keys: await this.client.dbSize() };
  }
}
