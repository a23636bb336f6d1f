/**
 * Adventurer profile records as returned by a profile search.
 * The gateway never inspects them beyond passing them through.
 */

export interface Character {
  name: string;
  class: string;
  main: boolean;
  level?: number;
}

export interface GuildSummary {
  name: string;
}

export interface Profile {
  familyName: string;
  profileTarget: string;
  region: string;
  guild?: GuildSummary;
  characters: Character[];
}

export interface CachedRecord {
  profiles: Profile[];
  status: number;
  cachedAt: Date;
  expiresAt: Date;
}

export interface SearchResult {
  profiles: Profile[];
  status: number;
}
