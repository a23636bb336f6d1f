import type { ProfileCache } from '../storage/index.js';
import {
  SEARCH_TYPE_LABELS,
  type AcceptedBatch,
  type BatchRequest,
  type BatchResponse,
  type BatchStats,
  type GateRejection,
  type GateResult,
  type ItemOutcome,
  type Region,
  type SearchType,
  toErrorWithMessage,
} from '../types/index.js';
import {
  validate,
  validateAdventurerName,
  validateRegion,
  validateSearchType,
  batchRequestSchema,
  type ValidationOutcome,
} from '../utils/validation.js';
import { createOperationLogger, type LogContext } from '../utils/logger.js';
import { metrics, GatewayMetrics } from '../utils/metrics.js';
import type { AdmissionController } from './TaskAdmissionService.js';
import type { AdminAuthorizer } from './AdminAuthorizer.js';
import { MaintenanceService, type MaintenanceRegistry } from './MaintenanceService.js';

export const INVALID_BODY_MESSAGE = 'Invalid JSON body.';
export const EMPTY_QUERIES_MESSAGE = 'queries list cannot be empty.';
export const CACHED_FAILURE_MESSAGE = 'cached non-200 response';
export const CEILING_EXCEEDED_MESSAGE = 'You have exceeded the maximum number of concurrent tasks.';

export interface SearchValidators {
  validateRegion(candidates: readonly string[]): ValidationOutcome<Region>;
  validateSearchType(candidates: readonly string[]): SearchType;
  validateAdventurerName(candidates: readonly string[], region: Region, searchType: SearchType): ValidationOutcome<string>;
}

export const defaultValidators: SearchValidators = {
  validateRegion,
  validateSearchType,
  validateAdventurerName,
};

export interface BatchSearchDependencies {
  cache: Pick<ProfileCache, 'get'>;
  admission: AdmissionController;
  authorizer: AdminAuthorizer;
  maintenance: MaintenanceRegistry;
  validators?: SearchValidators;
  maxQueries?: number;
}

/**
 * Who is asking: the client identity used for admission and the raw
 * credential checked before a cache bypass is honoured.
 */
export interface CallerContext {
  clientId: string;
  credential?: string;
  correlationId?: string;
}

/**
 * An item that has not reached a terminal outcome yet. `query` starts as the
 * raw input and becomes the normalized name once validation passes.
 */
export interface PendingItem {
  raw: string;
  query: string;
}

export type StageResult =
  | { done: false; item: PendingItem }
  | { done: true; outcome: ItemOutcome };

export type ItemStage = (item: PendingItem, batch: AcceptedBatch) => Promise<StageResult>;

export type SingleSearchResult =
  | { ok: false; rejection: GateRejection }
  | { ok: true; region: Region; searchType: SearchType; outcome: ItemOutcome };

export function createEmptyStats(): BatchStats {
  return { cached: 0, started: 0, pending: 0, rejected: 0, invalid: 0, error: 0 };
}

const CACHED_OK_STATUS = 200;

function parseRequest(body: unknown): BatchRequest | null {
  try {
    return validate(batchRequestSchema, body);
  } catch {
    return null;
  }
}

function errorMessage(error: unknown): string {
  return toErrorWithMessage(error).message;
}

/**
 * Batch search orchestration.
 *
 * Every query runs through the same stages in a fixed order: validate,
 * cache lookup, task admission. The first stage to return a terminal outcome
 * decides the item, so no item can end up in two buckets.
 */
export class BatchSearchService {
  private readonly validators: SearchValidators;
  private readonly maxQueries: number;
  private readonly stages: ItemStage[];

  constructor(private readonly deps: BatchSearchDependencies) {
    this.validators = deps.validators ?? defaultValidators;
    this.maxQueries = deps.maxQueries ?? 200;
    this.stages = [
      this.validateStage.bind(this),
      this.cacheStage.bind(this),
      this.admissionStage.bind(this),
    ];
  }

  /**
   * Batch-level preconditions. Nothing is classified unless this passes.
   */
  admitBatch(body: unknown, caller: CallerContext): GateResult {
    const request = parseRequest(body);
    if (!request) {
      return { ok: false, rejection: { kind: 'bad-request', message: INVALID_BODY_MESSAGE } };
    }

    const region = this.validators.validateRegion([request.region]);
    if (!region.ok) {
      return { ok: false, rejection: { kind: 'bad-request', message: region.message } };
    }

    const searchType = this.validators.validateSearchType([request.searchType]);

    if (request.queries.length === 0) {
      return { ok: false, rejection: { kind: 'bad-request', message: EMPTY_QUERIES_MESSAGE } };
    }

    if (request.queries.length > this.maxQueries) {
      return {
        ok: false,
        rejection: { kind: 'bad-request', message: `queries list exceeds max size of ${this.maxQueries}.` },
      };
    }

    const maintenance = this.checkMaintenance(region.value);
    if (maintenance) {
      return { ok: false, rejection: maintenance };
    }

    // Unauthorized bypass requests are downgraded, never refused
    const bypassCache = request.bypassCache && this.deps.authorizer.isAuthorizedForBypass(caller.credential);

    return {
      ok: true,
      batch: {
        region: region.value,
        searchType,
        queries: request.queries,
        bypassCache,
        clientId: caller.clientId,
      },
    };
  }

  async processBatch(batch: AcceptedBatch, context: LogContext = {}): Promise<BatchResponse> {
    const log = createOperationLogger('processBatch', {
      ...context,
      clientId: batch.clientId,
      region: batch.region,
      searchType: batch.searchType,
    });

    const results: ItemOutcome[] = [];
    const stats = createEmptyStats();

    // One item at a time, in input order
    for (const raw of batch.queries) {
      const outcome = await this.classifyItem(raw, batch);
      results.push(outcome);
      stats[outcome.status]++;
      metrics.incrementCounter(GatewayMetrics.batchItemsTotal, { status: outcome.status });
    }

    metrics.incrementCounter(GatewayMetrics.batchRequestsTotal, { region: batch.region });
    metrics.observeHistogram(GatewayMetrics.batchSize, batch.queries.length);
    log.info('Batch search processed', { batchSize: batch.queries.length, bypassCache: batch.bypassCache, stats });

    return {
      region: batch.region,
      searchType: SEARCH_TYPE_LABELS[batch.searchType],
      results,
      stats,
    };
  }

  /**
   * Run one query through the stage pipeline. A stage that throws turns
   * into an `error` outcome for this item only.
   */
  async classifyItem(raw: string, batch: AcceptedBatch): Promise<ItemOutcome> {
    let item: PendingItem = { raw, query: raw };

    for (const stage of this.stages) {
      let result: StageResult;
      try {
        result = await stage(item, batch);
      } catch (error) {
        createOperationLogger('classifyItem').warn('Search stage failed', {
          clientId: batch.clientId,
          region: batch.region,
          query: item.query,
          errorMessage: errorMessage(error),
        });
        return { query: item.query, status: 'error', httpStatus: 500, error: errorMessage(error) };
      }

      if (result.done) {
        return result.outcome;
      }
      item = result.item;
    }

    // The admission stage is always terminal
    throw new Error(`No terminal outcome for query "${raw}"`);
  }

  /**
   * Single-key search: the region gate plus one pass through the pipeline.
   * Cache bypass is a batch-only feature.
   */
  async searchOne(
    params: { region?: string; query?: string; searchType?: string },
    caller: CallerContext
  ): Promise<SingleSearchResult> {
    const region = this.validators.validateRegion([params.region ?? '']);
    if (!region.ok) {
      return { ok: false, rejection: { kind: 'bad-request', message: region.message } };
    }

    const searchType = this.validators.validateSearchType([params.searchType ?? '']);

    const maintenance = this.checkMaintenance(region.value);
    if (maintenance) {
      return { ok: false, rejection: maintenance };
    }

    const outcome = await this.classifyItem(params.query ?? '', {
      region: region.value,
      searchType,
      queries: [params.query ?? ''],
      bypassCache: false,
      clientId: caller.clientId,
    });

    return { ok: true, region: region.value, searchType, outcome };
  }

  async validateStage(item: PendingItem, batch: AcceptedBatch): Promise<StageResult> {
    const result = this.validators.validateAdventurerName([item.raw], batch.region, batch.searchType);
    if (!result.ok) {
      return {
        done: true,
        outcome: { query: item.raw, status: 'invalid', httpStatus: 400, error: result.message },
      };
    }
    return { done: false, item: { raw: item.raw, query: result.value } };
  }

  async cacheStage(item: PendingItem, batch: AcceptedBatch): Promise<StageResult> {
    if (batch.bypassCache) {
      return { done: false, item };
    }

    const record = await this.deps.cache.get(batch.region, item.query, batch.searchType);
    metrics.incrementCounter(GatewayMetrics.cacheLookupsTotal, { result: record ? 'hit' : 'miss' });
    if (!record) {
      return { done: false, item };
    }

    if (record.status === CACHED_OK_STATUS) {
      return {
        done: true,
        outcome: { query: item.query, status: 'cached', httpStatus: record.status, data: record.profiles },
      };
    }

    // Cached failures keep their original status but are never replayed as data
    return {
      done: true,
      outcome: { query: item.query, status: 'error', httpStatus: record.status, error: CACHED_FAILURE_MESSAGE },
    };
  }

  async admissionStage(item: PendingItem, batch: AcceptedBatch): Promise<StageResult> {
    const admission = await this.deps.admission.tryAdmit(batch.clientId, {
      region: batch.region,
      query: item.query,
      searchType: batch.searchType,
    });

    switch (admission.kind) {
      case 'ceiling-exceeded':
        return {
          done: true,
          outcome: { query: item.query, status: 'rejected', httpStatus: 429, error: CEILING_EXCEEDED_MESSAGE },
        };
      case 'started':
        return { done: true, outcome: { query: item.query, status: 'started', httpStatus: 202 } };
      case 'pending':
        return { done: true, outcome: { query: item.query, status: 'pending', httpStatus: 202 } };
    }
  }

  private checkMaintenance(region: Region): Extract<GateRejection, { kind: 'maintenance' }> | null {
    if (!this.deps.maintenance.isUnderMaintenance(region)) {
      return null;
    }
    return { kind: 'maintenance', region, message: MaintenanceService.message(region) };
  }
}
