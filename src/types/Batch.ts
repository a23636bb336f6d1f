import type { Profile } from './Profile.js';
import type { Region, SearchType, SearchTypeLabel } from './Search.js';

export const ITEM_STATUSES = ['cached', 'started', 'pending', 'rejected', 'invalid', 'error'] as const;

export type ItemStatus = typeof ITEM_STATUSES[number];

export type BatchStats = Record<ItemStatus, number>;

export interface BatchRequest {
  region: string;
  searchType: string;
  queries: string[];
  bypassCache: boolean;
}

/**
 * One terminal classification per input query.
 * `data` is only present on cached successes, `error` only on
 * invalid, rejected and error outcomes.
 */
export interface ItemOutcome {
  query: string;
  status: ItemStatus;
  httpStatus: number;
  data?: Profile[];
  error?: string;
}

export interface BatchResponse {
  region: Region;
  searchType: SearchTypeLabel;
  results: ItemOutcome[];
  stats: BatchStats;
}

/**
 * Batch after the precondition gate: region and search type are
 * normalized and the bypass flag reflects the caller's authorization.
 */
export interface AcceptedBatch {
  region: Region;
  searchType: SearchType;
  queries: string[];
  bypassCache: boolean;
  clientId: string;
}

export type GateRejection =
  | { kind: 'bad-request'; message: string }
  | { kind: 'maintenance'; region: Region; message: string };

export type GateResult =
  | { ok: true; batch: AcceptedBatch }
  | { ok: false; rejection: GateRejection };
