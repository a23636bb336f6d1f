import type { ProfileCache } from '../storage/index.js';
import type { AdmissionResult, SearchKey } from '../types/index.js';
import { searchKeyId } from '../types/index.js';
import type { ProfileSearcher } from './ProfileSearcher.js';
import { logger } from '../utils/logger.js';
import { metrics, GatewayMetrics } from '../utils/metrics.js';

/**
 * Admits background search tasks
 * Implementations must decide started / pending / ceiling-exceeded atomically per key
 */
export interface AdmissionController {
  tryAdmit(clientId: string, key: SearchKey): Promise<AdmissionResult>;
}

export interface AdmissionLimits {
  maxPerClient: number;
  maxGlobal: number;
  failureTtlSeconds: number;
}

export interface AdmissionStatus {
  inFlight: number;
  clients: Record<string, number>;
  limits: AdmissionLimits;
}

interface InFlightTask {
  clientId: string;
  key: SearchKey;
  startedAt: Date;
  done: Promise<void>;
}

/**
 * In-process admission controller backed by an in-flight registry.
 * Everything between the registry check and the registration runs without
 * yielding to the event loop, so two callers can never both start the same key.
 */
export class TaskAdmissionService implements AdmissionController {
  private inFlight = new Map<string, InFlightTask>();
  private clientCounts = new Map<string, number>();

  constructor(
    private readonly searcher: ProfileSearcher,
    private readonly cache: ProfileCache,
    private readonly limits: AdmissionLimits
  ) {}

  async tryAdmit(clientId: string, key: SearchKey): Promise<AdmissionResult> {
    const id = searchKeyId(key);

    // Deduplicate before the ceilings: joining an existing task costs nothing
    if (this.inFlight.has(id)) {
      return { kind: 'pending' };
    }

    const clientCount = this.clientCounts.get(clientId) ?? 0;
    if (clientCount >= this.limits.maxPerClient) {
      logger.debug('Client task ceiling reached', { clientId, limit: this.limits.maxPerClient });
      return { kind: 'ceiling-exceeded', scope: 'client' };
    }

    if (this.inFlight.size >= this.limits.maxGlobal) {
      logger.warn('Global task ceiling reached', { limit: this.limits.maxGlobal });
      return { kind: 'ceiling-exceeded', scope: 'global' };
    }

    this.clientCounts.set(clientId, clientCount + 1);
    const task: InFlightTask = { clientId, key, startedAt: new Date(), done: Promise.resolve() };
    this.inFlight.set(id, task);
    task.done = this.run(task, id);
    metrics.setGauge(GatewayMetrics.tasksInFlight, this.inFlight.size);

    logger.debug('Search task started', { clientId, ...key });
    return { kind: 'started' };
  }

  isInFlight(key: SearchKey): boolean {
    return this.inFlight.has(searchKeyId(key));
  }

  getStatus(): AdmissionStatus {
    return {
      inFlight: this.inFlight.size,
      clients: Object.fromEntries(this.clientCounts),
      limits: { ...this.limits },
    };
  }

  /**
   * Wait for every task running right now to settle
   */
  async drain(): Promise<void> {
    await Promise.all(Array.from(this.inFlight.values(), task => task.done));
  }

  private async run(task: InFlightTask, id: string): Promise<void> {
    const { region, query, searchType } = task.key;

    try {
      const result = await this.searcher.search(region, query, searchType);
      await this.cache.set(region, query, searchType, result);
      metrics.incrementCounter(GatewayMetrics.tasksCompletedTotal, { outcome: 'completed' });
      logger.debug('Search task completed', {
        ...task.key,
        status: result.status,
        profiles: result.profiles.length,
        duration: Date.now() - task.startedAt.getTime()
      });
    } catch (error) {
      metrics.incrementCounter(GatewayMetrics.tasksCompletedTotal, { outcome: 'failed' });
      logger.error('Search task failed', { ...task.key }, error instanceof Error ? error : new Error(String(error)));
      await this.cacheFailure(task.key);
    } finally {
      this.release(task.clientId, id);
    }
  }

  private async cacheFailure(key: SearchKey): Promise<void> {
    try {
      await this.cache.set(key.region, key.query, key.searchType, { profiles: [], status: 500 }, this.limits.failureTtlSeconds);
    } catch (error) {
      logger.error('Failed to cache search task failure', { ...key }, error instanceof Error ? error : new Error(String(error)));
    }
  }

  private release(clientId: string, id: string): void {
    this.inFlight.delete(id);

    const remaining = (this.clientCounts.get(clientId) ?? 1) - 1;
    if (remaining > 0) {
      this.clientCounts.set(clientId, remaining);
    } else {
      this.clientCounts.delete(clientId);
    }

    metrics.setGauge(GatewayMetrics.tasksInFlight, this.inFlight.size);
  }
}
