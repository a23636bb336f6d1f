import type { CachedRecord, Profile, Region, SearchType } from '../types/index.js';
import { searchKeyId } from '../types/index.js';
import { BaseProfileCache } from './ProfileCache.js';
import { logCacheOperation } from '../utils/logger.js';

/**
 * In-process cache provider
 * Entries expire lazily on read and are swept when the map grows past its limit
 */
export class MemoryProfileCache extends BaseProfileCache {
  private entries = new Map<string, CachedRecord>();

  constructor(
    defaultTtlSeconds: number,
    private readonly maxEntries: number = 10000,
    now: () => number = Date.now
  ) {
    super(defaultTtlSeconds, now);
  }

  protected async doInitialize(): Promise<void> {
    this.entries.clear();
  }

  protected async doClose(): Promise<void> {
    this.entries.clear();
  }

  async get(region: Region, query: string, searchType: SearchType): Promise<CachedRecord | null> {
    this.ensureInitialized();

    const key = searchKeyId({ region, query, searchType });
    const record = this.entries.get(key);

    if (!record || record.expiresAt.getTime() <= this.now()) {
      if (record) {
        this.entries.delete(key);
      }
      this.misses++;
      logCacheOperation('miss', key);
      return null;
    }

    this.hits++;
    logCacheOperation('hit', key);
    return record;
  }

  async set(
    region: Region,
    query: string,
    searchType: SearchType,
    record: { profiles: Profile[]; status: number },
    ttlSeconds?: number
  ): Promise<CachedRecord> {
    this.ensureInitialized();

    const key = searchKeyId({ region, query, searchType });
    const cached = this.buildRecord(record, ttlSeconds);
    this.entries.set(key, cached);

    if (this.entries.size > this.maxEntries) {
      this.sweep();
    }

    logCacheOperation('set', key);
    return cached;
  }

  async healthCheck(): Promise<{ healthy: boolean; message?: string }> {
    if (!this.initialized) {
      return { healthy: false, message: 'Memory cache not initialized' };
    }
    return { healthy: true, message: `Memory cache holding ${this.entries.size} entries` };
  }

  protected async getProviderMetrics(): Promise<Record<string, number>> {
    return { entries: this.entries.size };
  }

  /**
   * Drop expired entries, then the oldest ones until back under the limit
   */
  private sweep(): void {
    const now = this.now();
    for (const [key, record] of this.entries) {
      if (record.expiresAt.getTime() <= now) {
        this.entries.delete(key);
      }
    }

    // Map iteration follows insertion order
    for (const key of this.entries.keys()) {
      if (this.entries.size <= this.maxEntries) {
        break;
      }
      this.entries.delete(key);
    }
  }
}
