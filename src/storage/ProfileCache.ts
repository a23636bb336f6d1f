import type { CachedRecord, Profile, Region, SearchType } from '../types/index.js';

/**
 * Profile cache interface
 * Keys are (region, query, searchType); queries compare case-insensitively
 */
export interface ProfileCache {
  // Lifecycle
  initialize(): Promise<void>;
  close(): Promise<void>;

  get(region: Region, query: string, searchType: SearchType): Promise<CachedRecord | null>;
  set(
    region: Region,
    query: string,
    searchType: SearchType,
    record: { profiles: Profile[]; status: number },
    ttlSeconds?: number
  ): Promise<CachedRecord>;

  // Health and metrics
  healthCheck(): Promise<{ healthy: boolean; message?: string }>;
  getMetrics(): Promise<Record<string, number>>;
}

/**
 * Base class for cache providers with common functionality
 */
export abstract class BaseProfileCache implements ProfileCache {
  protected initialized = false;
  protected hits = 0;
  protected misses = 0;

  constructor(
    protected readonly defaultTtlSeconds: number,
    protected readonly now: () => number = Date.now
  ) {}

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }
    await this.doInitialize();
    this.initialized = true;
  }

  async close(): Promise<void> {
    if (!this.initialized) {
      return;
    }
    await this.doClose();
    this.initialized = false;
  }

  protected ensureInitialized(): void {
    if (!this.initialized) {
      throw new Error('Profile cache not initialized. Call initialize() first.');
    }
  }

  protected buildRecord(
    record: { profiles: Profile[]; status: number },
    ttlSeconds: number = this.defaultTtlSeconds
  ): CachedRecord {
    const now = this.now();
    return {
      profiles: record.profiles,
      status: record.status,
      cachedAt: new Date(now),
      expiresAt: new Date(now + ttlSeconds * 1000),
    };
  }

  async getMetrics(): Promise<Record<string, number>> {
    return {
      hits: this.hits,
      misses: this.misses,
      ...(await this.getProviderMetrics()),
    };
  }

  protected abstract doInitialize(): Promise<void>;
  protected abstract doClose(): Promise<void>;
  protected abstract getProviderMetrics(): Promise<Record<string, number>>;

  abstract get(region: Region, query: string, searchType: SearchType): Promise<CachedRecord | null>;
  abstract set(
    region: Region,
    query: string,
    searchType: SearchType,
    record: { profiles: Profile[]; status: number },
    ttlSeconds?: number
  ): Promise<CachedRecord>;
  abstract healthCheck(): Promise<{ healthy: boolean; message?: string }>;
}
