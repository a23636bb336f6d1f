import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  BatchSearchService,
  CACHED_FAILURE_MESSAGE,
  CEILING_EXCEEDED_MESSAGE,
  EMPTY_QUERIES_MESSAGE,
  INVALID_BODY_MESSAGE,
  MaintenanceService,
  type CallerContext,
} from '../../src/services/index.js';
import { MemoryProfileCache } from '../../src/storage/index.js';
import type { AcceptedBatch, GateResult } from '../../src/types/index.js';
import {
  FakeAdmissionController,
  allowBypass,
  createMockProfile,
  denyBypass,
} from '../fixtures/index.js';

const caller: CallerContext = { clientId: '203.0.113.7' };

function acceptedBatch(result: GateResult): AcceptedBatch {
  if (!result.ok) {
    throw new Error(`Expected batch to pass the gate, got: ${result.rejection.message}`);
  }
  return result.batch;
}

describe('BatchSearchService', () => {
  let cache: MemoryProfileCache;
  let admission: FakeAdmissionController;
  let service: BatchSearchService;

  beforeEach(async () => {
    cache = new MemoryProfileCache(3600);
    await cache.initialize();
    admission = new FakeAdmissionController();
    service = new BatchSearchService({
      cache,
      admission,
      authorizer: denyBypass,
      maintenance: new MaintenanceService(),
    });
  });

  describe('admitBatch', () => {
    it('should reject a body that is not an object', () => {
      expect(service.admitBatch(null, caller)).toEqual({
        ok: false,
        rejection: { kind: 'bad-request', message: INVALID_BODY_MESSAGE },
      });
    });

    it('should reject queries that are not a list of strings', () => {
      const result = service.admitBatch({ region: 'eu', queries: ['Alice', 42] }, caller);
      expect(result).toEqual({
        ok: false,
        rejection: { kind: 'bad-request', message: INVALID_BODY_MESSAGE },
      });
    });

    it('should surface the region validator message', () => {
      expect(service.admitBatch({ region: 'xx', queries: ['Alice'] }, caller)).toEqual({
        ok: false,
        rejection: { kind: 'bad-request', message: 'Region xx is not supported.' },
      });
    });

    it('should check the region before the queries list', () => {
      expect(service.admitBatch({ queries: [] }, caller)).toEqual({
        ok: false,
        rejection: { kind: 'bad-request', message: 'Region is required.' },
      });
    });

    it('should reject an empty queries list', () => {
      expect(service.admitBatch({ region: 'eu', queries: [] }, caller)).toEqual({
        ok: false,
        rejection: { kind: 'bad-request', message: EMPTY_QUERIES_MESSAGE },
      });
    });

    it('should treat a missing queries list as empty', () => {
      expect(service.admitBatch({ region: 'eu' }, caller)).toEqual({
        ok: false,
        rejection: { kind: 'bad-request', message: EMPTY_QUERIES_MESSAGE },
      });
    });

    it('should read null fields as their empty defaults', () => {
      expect(service.admitBatch({ region: 'eu', queries: null }, caller)).toEqual({
        ok: false,
        rejection: { kind: 'bad-request', message: EMPTY_QUERIES_MESSAGE },
      });
      expect(service.admitBatch({ region: null, queries: ['Alice'] }, caller)).toEqual({
        ok: false,
        rejection: { kind: 'bad-request', message: 'Region is required.' },
      });

      const batch = acceptedBatch(service.admitBatch(
        { region: 'eu', searchType: null, queries: ['Alice'], bypassCache: null },
        caller
      ));
      expect(batch.searchType).toBe('2');
      expect(batch.bypassCache).toBe(false);
    });

    it('should reject more than 200 queries', () => {
      const queries = Array.from({ length: 201 }, (_, i) => `Name${i}`);
      expect(service.admitBatch({ region: 'eu', queries }, caller)).toEqual({
        ok: false,
        rejection: { kind: 'bad-request', message: 'queries list exceeds max size of 200.' },
      });
    });

    it('should accept exactly 200 queries', () => {
      const queries = Array.from({ length: 200 }, (_, i) => `Name${i}`);
      const batch = acceptedBatch(service.admitBatch({ region: 'eu', queries }, caller));
      expect(batch.queries).toHaveLength(200);
    });

    it('should reject a region under maintenance after the other checks pass', () => {
      const maintained = new BatchSearchService({
        cache,
        admission,
        authorizer: denyBypass,
        maintenance: new MaintenanceService(['eu']),
      });

      expect(maintained.admitBatch({ region: 'EU', queries: ['Alice'] }, caller)).toEqual({
        ok: false,
        rejection: { kind: 'maintenance', region: 'eu', message: 'EU website is currently under maintenance.' },
      });
      expect(maintained.admitBatch({ region: 'eu', queries: [] }, caller)).toEqual({
        ok: false,
        rejection: { kind: 'bad-request', message: EMPTY_QUERIES_MESSAGE },
      });
    });

    it('should normalize region and search type', () => {
      const batch = acceptedBatch(service.admitBatch(
        { region: ' NA ', searchType: 'characterName', queries: ['Alice'] },
        caller
      ));

      expect(batch).toEqual({
        region: 'na',
        searchType: '1',
        queries: ['Alice'],
        bypassCache: false,
        clientId: '203.0.113.7',
      });
    });

    it('should fall back to family name search for unknown search types', () => {
      const batch = acceptedBatch(service.admitBatch(
        { region: 'eu', searchType: 'guild', queries: ['Alice'] },
        caller
      ));
      expect(batch.searchType).toBe('2');
    });

    it('should downgrade bypassCache for unauthorized callers', () => {
      const batch = acceptedBatch(service.admitBatch(
        { region: 'eu', queries: ['Alice'], bypassCache: true },
        { clientId: '203.0.113.7', credential: 'Bearer wrong-token' }
      ));
      expect(batch.bypassCache).toBe(false);
    });

    it('should honour bypassCache for authorized callers', () => {
      const authorizer = { isAuthorizedForBypass: vi.fn().mockReturnValue(true) };
      const authorized = new BatchSearchService({
        cache,
        admission,
        authorizer,
        maintenance: new MaintenanceService(),
      });

      const batch = acceptedBatch(authorized.admitBatch(
        { region: 'eu', queries: ['Alice'], bypassCache: true },
        { clientId: '203.0.113.7', credential: 'Bearer test-admin-token' }
      ));

      expect(batch.bypassCache).toBe(true);
      expect(authorizer.isAuthorizedForBypass).toHaveBeenCalledWith('Bearer test-admin-token');
    });

    it('should not consult the authorizer when no bypass was requested', () => {
      const authorizer = { isAuthorizedForBypass: vi.fn().mockReturnValue(true) };
      const authorized = new BatchSearchService({
        cache,
        admission,
        authorizer,
        maintenance: new MaintenanceService(),
      });

      const batch = acceptedBatch(authorized.admitBatch({ region: 'eu', queries: ['Alice'] }, caller));

      expect(batch.bypassCache).toBe(false);
      expect(authorizer.isAuthorizedForBypass).not.toHaveBeenCalled();
    });
  });

  describe('processBatch', () => {
    it('should serve cached entries and admit the rest', async () => {
      const alice = createMockProfile();
      await cache.set('eu', 'Alice', '1', { profiles: [alice], status: 200 });

      const batch = acceptedBatch(service.admitBatch(
        { region: 'eu', searchType: 'characterName', queries: ['Alice', 'Bob'], bypassCache: false },
        caller
      ));
      const response = await service.processBatch(batch);

      expect(response.region).toBe('eu');
      expect(response.searchType).toBe('characterName');
      expect(response.results).toEqual([
        { query: 'Alice', status: 'cached', httpStatus: 200, data: [alice] },
        { query: 'Bob', status: 'started', httpStatus: 202 },
      ]);
      expect(response.stats).toEqual({
        cached: 1,
        started: 1,
        pending: 0,
        rejected: 0,
        invalid: 0,
        error: 0,
      });
    });

    it('should report invalid queries with the validator message', async () => {
      const batch = acceptedBatch(service.admitBatch({ region: 'eu', queries: ['Al', 'Al!ce'] }, caller));
      const response = await service.processBatch(batch);

      expect(response.results).toEqual([
        { query: 'Al', status: 'invalid', httpStatus: 400, error: 'Adventurer name should be at least 3 symbols long.' },
        { query: 'Al!ce', status: 'invalid', httpStatus: 400, error: 'Adventurer name contains illegal characters.' },
      ]);
      expect(response.stats.invalid).toBe(2);
      expect(admission.calls).toHaveLength(0);
    });

    it('should echo the normalized query once validation passes', async () => {
      const batch = acceptedBatch(service.admitBatch({ region: 'eu', queries: ['  Bob  '] }, caller));
      const response = await service.processBatch(batch);

      expect(response.results[0]).toEqual({ query: 'Bob', status: 'started', httpStatus: 202 });
      expect(admission.calls[0]).toEqual({
        clientId: '203.0.113.7',
        key: { region: 'eu', query: 'Bob', searchType: '2' },
      });
    });

    it('should surface cached failures as errors with their original status', async () => {
      await cache.set('eu', 'Ghost', '2', { profiles: [], status: 404 });

      const batch = acceptedBatch(service.admitBatch({ region: 'eu', queries: ['Ghost'] }, caller));
      const response = await service.processBatch(batch);

      expect(response.results).toEqual([
        { query: 'Ghost', status: 'error', httpStatus: 404, error: CACHED_FAILURE_MESSAGE },
      ]);
      expect(response.results[0]?.data).toBeUndefined();
      expect(response.stats.error).toBe(1);
      expect(admission.calls).toHaveLength(0);
    });

    it('should only serve cached entries stored with status 200', async () => {
      await cache.set('eu', 'Alice', '2', { profiles: [createMockProfile()], status: 204 });

      const batch = acceptedBatch(service.admitBatch({ region: 'eu', queries: ['Alice'] }, caller));
      const response = await service.processBatch(batch);

      expect(response.results).toEqual([
        { query: 'Alice', status: 'error', httpStatus: 204, error: CACHED_FAILURE_MESSAGE },
      ]);
      expect(response.stats.cached).toBe(0);
    });

    it('should map admission results to started, pending and rejected', async () => {
      admission
        .respondWith('Carol', { kind: 'pending' })
        .respondWith('Dave', { kind: 'ceiling-exceeded', scope: 'client' });

      const batch = acceptedBatch(service.admitBatch({ region: 'eu', queries: ['Bob', 'Carol', 'Dave'] }, caller));
      const response = await service.processBatch(batch);

      expect(response.results).toEqual([
        { query: 'Bob', status: 'started', httpStatus: 202 },
        { query: 'Carol', status: 'pending', httpStatus: 202 },
        { query: 'Dave', status: 'rejected', httpStatus: 429, error: CEILING_EXCEEDED_MESSAGE },
      ]);
      expect(response.stats).toEqual({
        cached: 0,
        started: 1,
        pending: 1,
        rejected: 1,
        invalid: 0,
        error: 0,
      });
    });

    it('should keep input order and count every item exactly once', async () => {
      await cache.set('eu', 'Alice', '2', { profiles: [createMockProfile()], status: 200 });
      await cache.set('eu', 'Ghost', '2', { profiles: [], status: 500 });
      admission.respondWith('Carol', { kind: 'pending' }).respondWith('Dave', { kind: 'ceiling-exceeded', scope: 'global' });

      const queries = ['Dave', 'x', 'Alice', 'Carol', 'Ghost', 'Bob'];
      const batch = acceptedBatch(service.admitBatch({ region: 'eu', queries }, caller));
      const response = await service.processBatch(batch);

      expect(response.results.map(result => result.query)).toEqual(queries);
      expect(response.results.map(result => result.status)).toEqual([
        'rejected', 'invalid', 'cached', 'pending', 'error', 'started',
      ]);
      const total = Object.values(response.stats).reduce((sum, count) => sum + count, 0);
      expect(total).toBe(queries.length);
    });

    it('should consult the cache when an unauthorized caller asks for a bypass', async () => {
      await cache.set('eu', 'Alice', '2', { profiles: [createMockProfile()], status: 200 });

      const batch = acceptedBatch(service.admitBatch(
        { region: 'eu', queries: ['Alice'], bypassCache: true },
        caller
      ));
      const response = await service.processBatch(batch);

      expect(response.results[0]?.status).toBe('cached');
    });

    it('should skip the cache entirely for an authorized bypass', async () => {
      await cache.set('eu', 'Alice', '2', { profiles: [createMockProfile()], status: 200 });
      const getSpy = vi.spyOn(cache, 'get');
      const authorized = new BatchSearchService({
        cache,
        admission,
        authorizer: allowBypass,
        maintenance: new MaintenanceService(),
      });

      const batch = acceptedBatch(authorized.admitBatch(
        { region: 'eu', queries: ['Alice', 'Bob'], bypassCache: true },
        caller
      ));
      const response = await authorized.processBatch(batch);

      expect(response.results.map(result => result.status)).toEqual(['started', 'started']);
      expect(getSpy).not.toHaveBeenCalled();
    });

    it('should turn a failing cache lookup into an error for that item only', async () => {
      const flakyCache = {
        get: vi.fn()
          .mockRejectedValueOnce(new Error('cache unavailable'))
          .mockResolvedValue(null),
      };
      const flaky = new BatchSearchService({
        cache: flakyCache,
        admission,
        authorizer: denyBypass,
        maintenance: new MaintenanceService(),
      });

      const batch = acceptedBatch(flaky.admitBatch({ region: 'eu', queries: ['Alice', 'Bob'] }, caller));
      const response = await flaky.processBatch(batch);

      expect(response.results).toEqual([
        { query: 'Alice', status: 'error', httpStatus: 500, error: 'cache unavailable' },
        { query: 'Bob', status: 'started', httpStatus: 202 },
      ]);
      expect(response.stats.error).toBe(1);
      expect(response.stats.started).toBe(1);
    });

    it('should turn a failing admission into an error for that item only', async () => {
      const tryAdmit = vi.fn()
        .mockResolvedValueOnce({ kind: 'started' })
        .mockRejectedValueOnce(new Error('registry offline'));
      const failing = new BatchSearchService({
        cache,
        admission: { tryAdmit },
        authorizer: denyBypass,
        maintenance: new MaintenanceService(),
      });

      const batch = acceptedBatch(failing.admitBatch({ region: 'eu', queries: ['Alice', 'Bob'] }, caller));
      const response = await failing.processBatch(batch);

      expect(response.results).toEqual([
        { query: 'Alice', status: 'started', httpStatus: 202 },
        { query: 'Bob', status: 'error', httpStatus: 500, error: 'registry offline' },
      ]);
    });

    it('should always include all six stats buckets', async () => {
      const batch = acceptedBatch(service.admitBatch({ region: 'eu', queries: ['Bob'] }, caller));
      const response = await service.processBatch(batch);

      expect(Object.keys(response.stats).sort()).toEqual(
        ['cached', 'error', 'invalid', 'pending', 'rejected', 'started']
      );
    });
  });

  describe('stages', () => {
    const batch: AcceptedBatch = {
      region: 'eu',
      searchType: '2',
      queries: ['Alice'],
      bypassCache: false,
      clientId: '203.0.113.7',
    };

    it('should pass a valid name on with its normalized form', async () => {
      const result = await service.validateStage({ raw: ' Alice ', query: ' Alice ' }, batch);
      expect(result).toEqual({ done: false, item: { raw: ' Alice ', query: 'Alice' } });
    });

    it('should pass through the cache stage on a miss', async () => {
      const result = await service.cacheStage({ raw: 'Alice', query: 'Alice' }, batch);
      expect(result).toEqual({ done: false, item: { raw: 'Alice', query: 'Alice' } });
    });

    it('should not look at the cache when bypassing', async () => {
      const getSpy = vi.spyOn(cache, 'get');
      const result = await service.cacheStage({ raw: 'Alice', query: 'Alice' }, { ...batch, bypassCache: true });

      expect(result.done).toBe(false);
      expect(getSpy).not.toHaveBeenCalled();
    });

    it('should always be terminal at the admission stage', async () => {
      const result = await service.admissionStage({ raw: 'Alice', query: 'Alice' }, batch);
      expect(result).toEqual({
        done: true,
        outcome: { query: 'Alice', status: 'started', httpStatus: 202 },
      });
    });
  });

  describe('searchOne', () => {
    it('should classify a single query through the same pipeline', async () => {
      await cache.set('kr', '가나', '2', { profiles: [createMockProfile({ region: 'kr' })], status: 200 });

      const result = await service.searchOne({ region: 'kr', query: '가나' }, caller);

      expect(result).toEqual({
        ok: true,
        region: 'kr',
        searchType: '2',
        outcome: { query: '가나', status: 'cached', httpStatus: 200, data: [createMockProfile({ region: 'kr' })] },
      });
    });

    it('should reject an unknown region', async () => {
      const result = await service.searchOne({ region: 'moon', query: 'Alice' }, caller);
      expect(result).toEqual({
        ok: false,
        rejection: { kind: 'bad-request', message: 'Region moon is not supported.' },
      });
    });
  });
});
