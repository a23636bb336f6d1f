export const REGIONS = ['eu', 'na', 'sa', 'kr'] as const;

export type Region = typeof REGIONS[number];

/**
 * Wire codes used by the upstream search form: 1 searches by
 * character name, 2 by family name.
 */
export type SearchType = '1' | '2';

export type SearchTypeLabel = 'characterName' | 'familyName';

export const SEARCH_TYPE_LABELS: Record<SearchType, SearchTypeLabel> = {
  '1': 'characterName',
  '2': 'familyName',
};

export interface SearchKey {
  region: Region;
  query: string;
  searchType: SearchType;
}

/**
 * Names compare case-insensitively, so both the cache and the
 * in-flight registry key on the lowercased query.
 */
export function searchKeyId(key: SearchKey): string {
  return `${key.region}:${key.searchType}:${key.query.toLowerCase()}`;
}

export type AdmissionResult =
  | { kind: 'started' }
  | { kind: 'pending' }
  | { kind: 'ceiling-exceeded'; scope: 'client' | 'global' };
