import type { Profile, Region, SearchResult, SearchType } from '../types/index.js';
import { logger } from '../utils/logger.js';

/**
 * Runs one remote profile search. The admission service calls it in the
 * background and caches whatever it resolves to.
 */
export interface ProfileSearcher {
  search(region: Region, query: string, searchType: SearchType): Promise<SearchResult>;
}

function isProfileList(value: unknown): value is Profile[] {
  return Array.isArray(value) && value.every(item =>
    typeof item === 'object' &&
    item !== null &&
    'familyName' in item &&
    typeof item.familyName === 'string'
  );
}

/**
 * Searcher backed by an upstream profile service
 * A 404 from upstream means "no adventurer found" and is cached like any other status
 */
export class UpstreamProfileSearcher implements ProfileSearcher {
  constructor(
    private readonly baseUrl: string,
    private readonly timeoutMs: number
  ) {}

  async search(region: Region, query: string, searchType: SearchType): Promise<SearchResult> {
    const url = new URL('/v1/adventurer/search', this.baseUrl);
    url.searchParams.set('region', region);
    url.searchParams.set('query', query);
    url.searchParams.set('searchType', searchType);

    const response = await logger.timeAsync('upstreamSearch', () => fetch(url, {
      headers: { accept: 'application/json' },
      signal: AbortSignal.timeout(this.timeoutMs),
    }), { region, query, searchType });

    if (!response.ok) {
      logger.debug('Upstream search returned non-success status', {
        region,
        query,
        searchType,
        status: response.status
      });
      return { profiles: [], status: response.status };
    }

    const body: unknown = await response.json();
    if (!isProfileList(body)) {
      throw new Error(`Upstream returned an unexpected payload for ${region}/${query}`);
    }

    return { profiles: body, status: response.status };
  }
}

/**
 * Used when no upstream is configured: every search resolves as unavailable
 */
export class UnavailableProfileSearcher implements ProfileSearcher {
  async search(): Promise<SearchResult> {
    return { profiles: [], status: 503 };
  }
}
