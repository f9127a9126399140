import { RetentionScheduler, artifactCacheKey } from '../governor/services/RetentionScheduler.js';
import { InMemoryRegistryAdapter } from '../governor/services/RegistryService.js';
import { QuotaLedger } from '../governor/services/QuotaLedger.js';
import { CacheStore } from '../governor/services/CacheStore.js';
import { MemoryCycleLock, PRUNE_LOCK_KEY } from '../governor/utils/lock.js';
import { GovernanceEventBus } from '../governor/utils/events.js';
import { ConfigurationError } from '../governor/utils/errorHandler.js';
import type { JobRecord, PruneConfig, PruneStats } from '../governor/types/index.js';

const DAY = 24 * 60 * 60 * 1000;
const NOW = Date.UTC(2024, 5, 30, 12, 0, 0);

const baseConfig: PruneConfig = {
  enabled: true,
  intervalSeconds: 3600,
  cron: null,
  maxJobAgeDays: 30,
  maxArtifactAgeDays: 30,
  maxArtifactsPerTenant: 1000,
  batchSize: 100,
  dryRun: false,
  historySize: 50,
  shutdownGraceMs: 1000,
};

const daysAgo = (days: number) => new Date(NOW - days * DAY);

describe('RetentionScheduler', () => {
  let registry: InMemoryRegistryAdapter;
  let ledger: QuotaLedger;
  let store: CacheStore<string>;
  let events: GovernanceEventBus;
  const clock = () => NOW;

  const createScheduler = (overrides: Partial<PruneConfig> = {}, lock = new MemoryCycleLock({ clock })) =>
    new RetentionScheduler({ ...baseConfig, ...overrides }, { registry, ledger, cache: store, lock, events, clock });

  const addStaleArtifacts = (count: number, sizeBytes = 100) => {
    for (let i = 1; i <= count; i++) {
      registry.addArtifact({ id: `stale-${i}`, tenantId: 't1', createdAt: daysAgo(40 + i), sizeBytes });
      ledger.reserve('t1', 'artifacts', sizeBytes);
    }
  };

  beforeEach(() => {
    registry = new InMemoryRegistryAdapter();
    ledger = new QuotaLedger({ tiers: {}, defaultTier: null }, { clock });
    store = new CacheStore<string>({ maxEntries: 100, maxBytes: 10_000, defaultTtlSeconds: 0 }, { clock });
    events = new GovernanceEventBus();
  });

  it('reports candidates without deleting in dry run', async () => {
    addStaleArtifacts(3);
    registry.addArtifact({ id: 'fresh', tenantId: 't1', createdAt: daysAgo(1), sizeBytes: 100 });
    ledger.reserve('t1', 'artifacts', 100);
    const scheduler = createScheduler({ dryRun: true });

    const stats = await scheduler.runOnce();

    expect(stats).toEqual({
      jobsDeleted: 0,
      artifactsDeleted: 0,
      bytesFreed: 0,
      durationMs: 0,
      errors: [],
      timestamp: new Date(NOW).toISOString(),
      dryRun: true,
      candidates: { jobs: 0, artifacts: 3 },
      aborted: false,
    });
    expect(registry.artifactCount).toBe(4);
    expect(ledger.usage('t1').artifacts).toBe(400);
  });

  it('deletes stale artifacts, releases their bytes and finds nothing on a second pass', async () => {
    addStaleArtifacts(3);
    registry.addArtifact({ id: 'fresh', tenantId: 't1', createdAt: daysAgo(1), sizeBytes: 100 });
    ledger.reserve('t1', 'artifacts', 100);
    const scheduler = createScheduler();

    const first = await scheduler.runOnce();
    expect(first).toMatchObject({ artifactsDeleted: 3, bytesFreed: 300, errors: [], candidates: { jobs: 0, artifacts: 3 } });
    expect(registry.artifactCount).toBe(1);
    expect(ledger.usage('t1').artifacts).toBe(100);

    const second = await scheduler.runOnce();
    expect(second).toMatchObject({ jobsDeleted: 0, artifactsDeleted: 0, bytesFreed: 0, candidates: { jobs: 0, artifacts: 0 } });
    expect(scheduler.history()).toHaveLength(2);
  });

  it('deletes old jobs together with their artifacts', async () => {
    registry.addJob({ id: 'job-old', tenantId: 't1', createdAt: daysAgo(45) });
    registry.addJob({ id: 'job-new', tenantId: 't1', createdAt: daysAgo(2) });
    registry.addArtifact({ id: 'out-1', tenantId: 't1', jobId: 'job-old', createdAt: daysAgo(5), sizeBytes: 250 });
    ledger.reserve('t1', 'jobs', 2);
    ledger.reserve('t1', 'artifacts', 250);

    const stats = await createScheduler().runOnce();

    expect(stats).toMatchObject({ jobsDeleted: 1, artifactsDeleted: 1, bytesFreed: 250, candidates: { jobs: 1, artifacts: 1 } });
    expect(registry.hasJob('job-old')).toBe(false);
    expect(registry.hasJob('job-new')).toBe(true);
    expect(registry.hasArtifact('out-1')).toBe(false);
    expect(ledger.usage('t1')).toEqual({ jobs: 1, artifacts: 0, cache_bytes: 0, api_requests: 0 });
  });

  it('invalidates cached results derived from deleted artifacts', async () => {
    addStaleArtifacts(1);
    const key = artifactCacheKey('stale-1');
    store.put(key, 'summary', { sizeBytes: 1 });
    store.put(`${key}:preview`, 'thumb', { sizeBytes: 1 });
    store.put('artifact:stale-10', 'other', { sizeBytes: 1 });

    await createScheduler().runOnce();

    expect(key).toBe('artifact:stale-1');
    expect(store.keys()).toEqual(['artifact:stale-10']);
  });

  it('trims the oldest artifacts beyond the per-tenant cap', async () => {
    registry.addArtifact({ id: 'old', tenantId: 't1', createdAt: daysAgo(60), sizeBytes: 10 });
    registry.addArtifact({ id: 'f1', tenantId: 't1', createdAt: daysAgo(4), sizeBytes: 10 });
    registry.addArtifact({ id: 'f2', tenantId: 't1', createdAt: daysAgo(3), sizeBytes: 10 });
    registry.addArtifact({ id: 'f3', tenantId: 't1', createdAt: daysAgo(2), sizeBytes: 10 });
    registry.addArtifact({ id: 'other', tenantId: 't2', createdAt: daysAgo(2), sizeBytes: 10 });

    const stats = await createScheduler({ maxArtifactsPerTenant: 2 }).runOnce();

    expect(stats).toMatchObject({ artifactsDeleted: 2, candidates: { jobs: 0, artifacts: 2 } });
    expect(registry.hasArtifact('old')).toBe(false);
    expect(registry.hasArtifact('f1')).toBe(false);
    expect(registry.hasArtifact('f2')).toBe(true);
    expect(registry.hasArtifact('f3')).toBe(true);
    expect(registry.hasArtifact('other')).toBe(true);
  });

  it('records a failed deletion and carries on', async () => {
    addStaleArtifacts(3);
    registry.failDeletion('stale-2', 'disk busy');

    const stats = await createScheduler().runOnce();

    expect(stats).toMatchObject({ artifactsDeleted: 2, bytesFreed: 200, errors: ['Failed to delete artifact stale-2: disk busy'] });
    expect(registry.hasArtifact('stale-2')).toBe(true);
    expect(ledger.usage('t1').artifacts).toBe(100);
  });

  it('keeps a job whose artifacts could not be deleted and retries it next cycle', async () => {
    registry.addJob({ id: 'job-old', tenantId: 't1', createdAt: daysAgo(45) });
    registry.addArtifact({ id: 'out-1', tenantId: 't1', jobId: 'job-old', createdAt: daysAgo(45), sizeBytes: 50 });
    registry.failDeletion('out-1', 'disk busy');
    const scheduler = createScheduler();

    const first = await scheduler.runOnce();

    expect(first).toMatchObject({
      jobsDeleted: 0,
      artifactsDeleted: 0,
      errors: ['Failed to delete artifact out-1: disk busy', 'Skipped job job-old: 1 artifact(s) could not be deleted'],
    });
    expect(registry.hasJob('job-old')).toBe(true);
    expect(registry.hasArtifact('out-1')).toBe(true);

    const second = await scheduler.runOnce();

    expect(second).toMatchObject({ jobsDeleted: 1, artifactsDeleted: 1, errors: [], candidates: { jobs: 1, artifacts: 1 } });
    expect(registry.hasJob('job-old')).toBe(false);
  });

  it('does not refund jobs from an earlier daily window', async () => {
    let now = NOW - 40 * DAY;
    ledger = new QuotaLedger(
      { tiers: { free: { name: 'Free', limits: { jobs: { limit: 10, windowSeconds: 86400 } } } }, defaultTier: 'free' },
      { clock: () => now }
    );
    for (let i = 0; i < 10; i++) {
      registry.addJob({ id: `old-${i}`, tenantId: 't1', createdAt: new Date(now) });
      ledger.reserve('t1', 'jobs', 1);
    }

    now = NOW;
    for (let i = 0; i < 10; i++) {
      expect(ledger.reserve('t1', 'jobs', 1).allowed).toBe(true);
    }

    const stats = await createScheduler().runOnce();

    expect(stats).toMatchObject({ jobsDeleted: 10 });
    expect(ledger.usage('t1').jobs).toBe(10);
    expect(ledger.reserve('t1', 'jobs', 1).allowed).toBe(false);
  });

  it('records a fault and recovers on the next cycle', async () => {
    addStaleArtifacts(1);
    const listJobs = jest
      .spyOn(registry, 'listJobsOlderThan')
      .mockRejectedValueOnce(new Error('connection reset'));
    const scheduler = createScheduler();

    const failed = await scheduler.runOnce();
    expect(failed).toMatchObject({ artifactsDeleted: 0, errors: ['Prune cycle failed: connection reset'] });

    const recovered = await scheduler.runOnce();
    expect(recovered).toMatchObject({ artifactsDeleted: 1, errors: [] });
    expect(listJobs).toHaveBeenCalledTimes(2);
  });

  it('stops between batches when asked to shut down', async () => {
    addStaleArtifacts(3);
    const scheduler = createScheduler({ batchSize: 1 });
    let stopping: Promise<void> | null = null;
    const deleteArtifact = registry.deleteArtifact.bind(registry);
    jest.spyOn(registry, 'deleteArtifact').mockImplementation(async (id) => {
      await deleteArtifact(id);
      if (!stopping) {
        stopping = scheduler.stop();
      }
    });

    const stats = await scheduler.runOnce();
    await stopping;

    expect(stats).toMatchObject({ artifactsDeleted: 1, aborted: true });
    expect(registry.artifactCount).toBe(2);
    expect(scheduler.status().state).toBe('stopped');
    await expect(scheduler.runOnce()).resolves.toBeNull();
  });

  it('does not start a second cycle while one is running', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    jest.spyOn(registry, 'listJobsOlderThan').mockImplementation(async (): Promise<JobRecord[]> => {
      await gate;
      return [];
    });
    const scheduler = createScheduler();

    const first = scheduler.runOnce();
    expect(scheduler.status().state).toBe('running');
    await expect(scheduler.runOnce()).resolves.toBeNull();

    release();
    await expect(first).resolves.toMatchObject({ candidates: { jobs: 0, artifacts: 0 } });
    expect(scheduler.status().state).toBe('idle');
  });

  it('skips the cycle when another instance holds the lock', async () => {
    const lock = new MemoryCycleLock({ clock });
    await lock.tryAcquire(PRUNE_LOCK_KEY, 600);
    addStaleArtifacts(1);

    await expect(createScheduler({}, lock).runOnce()).resolves.toBeNull();
    expect(registry.artifactCount).toBe(1);

    await lock.release(PRUNE_LOCK_KEY);
    await expect(createScheduler({}, lock).runOnce()).resolves.toMatchObject({ artifactsDeleted: 1 });
  });

  it('keeps a bounded history and reports the last run', async () => {
    const scheduler = createScheduler({ historySize: 2 });

    await scheduler.runOnce();
    await scheduler.runOnce();
    const last = await scheduler.runOnce();

    expect(scheduler.history()).toHaveLength(2);
    expect(scheduler.status()).toEqual({
      state: 'idle',
      enabled: true,
      intervalSeconds: 3600,
      cron: null,
      dryRun: false,
      lastRunAt: new Date(NOW).toISOString(),
      lastStats: last,
    });
  });

  it('returns frozen stats and publishes them', async () => {
    const completed: PruneStats[] = [];
    events.on('prune.completed', (stats) => completed.push(stats));

    const stats = await createScheduler().runOnce();

    expect(Object.isFrozen(stats)).toBe(true);
    expect(completed).toEqual([stats]);
  });

  it('rejects invalid configuration at construction', () => {
    expect(() => createScheduler({ batchSize: 0 })).toThrow(ConfigurationError);
    expect(() => createScheduler({ intervalSeconds: -5, historySize: 0 })).toThrow(
      'Invalid prune configuration: intervalSeconds must be a positive integer; historySize must be a positive integer'
    );
  });

  describe('scheduling', () => {
    afterEach(() => {
      jest.useRealTimers();
    });

    it('stays idle without a timer when disabled', () => {
      jest.useFakeTimers();
      const scheduler = createScheduler({ enabled: false });
      const tick = jest.spyOn(scheduler, 'tick');

      scheduler.start();
      jest.advanceTimersByTime(7200 * 1000);

      expect(tick).not.toHaveBeenCalled();
      expect(scheduler.status().state).toBe('idle');
    });

    it('ticks on the configured interval until stopped', async () => {
      jest.useFakeTimers();
      const scheduler = createScheduler();
      const tick = jest.spyOn(scheduler, 'tick').mockImplementation(() => undefined);

      scheduler.start();
      jest.advanceTimersByTime(3600 * 1000 * 2);
      expect(tick).toHaveBeenCalledTimes(2);

      await scheduler.stop();
      jest.advanceTimersByTime(3600 * 1000);
      expect(tick).toHaveBeenCalledTimes(2);
    });

    it('schedules by cron expression', async () => {
      const scheduler = createScheduler({ cron: '0 3 * * *' });

      scheduler.start();
      expect(scheduler.status()).toMatchObject({ state: 'idle', cron: '0 3 * * *' });

      await scheduler.stop();
      expect(scheduler.status().state).toBe('stopped');
    });
  });
});
