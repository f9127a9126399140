import { QuotaLedger, isQuotaResource } from '../governor/services/QuotaLedger.js';
import { GovernanceEventBus } from '../governor/utils/events.js';
import { APIError } from '../governor/utils/errorHandler.js';
import type { QuotaLedgerConfig } from '../governor/types/index.js';

const tiers: QuotaLedgerConfig['tiers'] = {
  free: { name: 'Free', limits: { jobs: { limit: 5 }, cache_bytes: { limit: 1000 } } },
  metered: { name: 'Metered', limits: { api_requests: { limit: 3, windowSeconds: 60 } } },
};

describe('QuotaLedger', () => {
  let now: number;
  const clock = () => now;

  beforeEach(() => {
    now = 1_700_000_000_000;
  });

  it('enforces a jobs limit of 5 and frees capacity on release', () => {
    const ledger = new QuotaLedger({ tiers, defaultTier: null }, { clock });
    ledger.setPolicy({ tenantId: 't1', resource: 'jobs', limit: 5 });

    for (let i = 1; i <= 5; i++) {
      expect(ledger.reserve('t1', 'jobs', 1)).toEqual({ allowed: true, current: i, limit: 5 });
    }

    expect(ledger.reserve('t1', 'jobs', 1)).toEqual({
      allowed: false,
      reason: 'Quota exceeded for jobs (5/5, requested 1)',
      current: 5,
      limit: 5,
    });

    ledger.release('t1', 'jobs', 2);
    expect(ledger.usage('t1').jobs).toBe(3);
    expect(ledger.reserve('t1', 'jobs', 1)).toEqual({ allowed: true, current: 4, limit: 5 });
  });

  it('treats resources without a policy as unlimited', () => {
    const ledger = new QuotaLedger({ tiers, defaultTier: null }, { clock });

    expect(ledger.reserve('t1', 'artifacts', 1_000_000)).toEqual({ allowed: true, current: 1_000_000, limit: null });
    expect(ledger.getPolicy('t1', 'artifacts')).toBeNull();
  });

  it('checks without committing', () => {
    const ledger = new QuotaLedger({ tiers, defaultTier: null }, { clock });
    ledger.setPolicy({ tenantId: 't1', resource: 'jobs', limit: 2 });

    expect(ledger.check('t1', 'jobs', 2)).toEqual({ allowed: true, current: 0, limit: 2 });
    expect(ledger.check('t1', 'jobs', 3).allowed).toBe(false);
    expect(ledger.usage('t1').jobs).toBe(0);
  });

  it('floors release at zero', () => {
    const ledger = new QuotaLedger({ tiers, defaultTier: null }, { clock });
    ledger.reserve('t1', 'cache_bytes', 10);

    ledger.release('t1', 'cache_bytes', 50);
    ledger.release('t2', 'cache_bytes', 50);

    expect(ledger.usage('t1')).toEqual({ jobs: 0, artifacts: 0, cache_bytes: 0, api_requests: 0 });
    expect(ledger.usage('t2').cache_bytes).toBe(0);
  });

  it('never lets concurrent reservations overshoot the limit', async () => {
    const ledger = new QuotaLedger({ tiers, defaultTier: null }, { clock });
    ledger.setPolicy({ tenantId: 't1', resource: 'jobs', limit: 10 });

    const decisions = await Promise.all(
      Array.from({ length: 25 }, async () => {
        await Promise.resolve();
        return ledger.reserve('t1', 'jobs', 1);
      })
    );

    expect(decisions.filter((decision) => decision.allowed)).toHaveLength(10);
    expect(ledger.usage('t1').jobs).toBe(10);
  });

  it('rejects negative or non-finite amounts', () => {
    const ledger = new QuotaLedger({ tiers, defaultTier: null }, { clock });

    expect(() => ledger.reserve('t1', 'jobs', -1)).toThrow(APIError);
    expect(() => ledger.release('t1', 'jobs', Number.NaN)).toThrow('Quota amount must be a non-negative number (got NaN)');
  });

  describe('tiers', () => {
    it('applies an assigned tier and lets an explicit policy override it', () => {
      const ledger = new QuotaLedger({ tiers, defaultTier: null }, { clock });
      ledger.assignTier('t1', 'free');

      expect(ledger.getTier('t1')).toBe('free');
      expect(ledger.getPolicy('t1', 'jobs')).toEqual({ tenantId: 't1', resource: 'jobs', limit: 5 });

      ledger.setPolicy({ tenantId: 't1', resource: 'jobs', limit: 8 });
      expect(ledger.check('t1', 'jobs', 8)).toEqual({ allowed: true, current: 0, limit: 8 });

      expect(ledger.removePolicy('t1', 'jobs')).toBe(true);
      expect(ledger.check('t1', 'jobs', 6).allowed).toBe(false);
    });

    it('falls back to the default tier', () => {
      const ledger = new QuotaLedger({ tiers, defaultTier: 'free' }, { clock });

      expect(ledger.getTier('anyone')).toBe('free');
      expect(ledger.check('anyone', 'cache_bytes', 1001).allowed).toBe(false);
    });

    it('rejects unknown tiers', () => {
      const ledger = new QuotaLedger({ tiers, defaultTier: null }, { clock });

      expect(() => ledger.assignTier('t1', 'gold')).toThrow('Unknown tier: gold. Valid tiers: free, metered');
      expect(() => new QuotaLedger({ tiers, defaultTier: 'gold' })).toThrow('Unknown default tier: gold');
    });

    it('lists the configured tiers', () => {
      const ledger = new QuotaLedger({ tiers, defaultTier: null }, { clock });
      expect(Object.keys(ledger.listTiers())).toEqual(['free', 'metered']);
    });
  });

  describe('windowed limits', () => {
    it('resets the counter once the window has passed', () => {
      const ledger = new QuotaLedger({ tiers, defaultTier: null }, { clock });
      ledger.assignTier('t1', 'metered');

      for (let i = 0; i < 3; i++) {
        expect(ledger.reserve('t1', 'api_requests', 1).allowed).toBe(true);
      }
      expect(ledger.reserve('t1', 'api_requests', 1).allowed).toBe(false);

      now += 59_999;
      expect(ledger.check('t1', 'api_requests', 1).allowed).toBe(false);

      now += 1;
      expect(ledger.check('t1', 'api_requests', 1)).toEqual({ allowed: true, current: 0, limit: 3 });
      expect(ledger.reserve('t1', 'api_requests', 1)).toEqual({ allowed: true, current: 1, limit: 3 });
      expect(ledger.usage('t1').api_requests).toBe(1);
    });

    it('ignores releases of usage charged in an earlier window', () => {
      const ledger = new QuotaLedger({ tiers, defaultTier: null }, { clock });
      ledger.assignTier('t1', 'metered');
      const firstWindow = now;
      ledger.reserve('t1', 'api_requests', 1);

      now += 60_000;
      ledger.reserve('t1', 'api_requests', 2);

      ledger.release('t1', 'api_requests', 1, firstWindow);
      expect(ledger.usage('t1').api_requests).toBe(2);

      ledger.release('t1', 'api_requests', 1, now);
      expect(ledger.usage('t1').api_requests).toBe(1);
    });

    it('credits old usage back when the limit has no window', () => {
      const ledger = new QuotaLedger({ tiers, defaultTier: null }, { clock });
      ledger.assignTier('t1', 'free');
      ledger.reserve('t1', 'jobs', 2);

      now += 40 * 86_400_000;
      ledger.release('t1', 'jobs', 1, now - 40 * 86_400_000);

      expect(ledger.usage('t1').jobs).toBe(1);
    });
  });

  describe('policies', () => {
    it('freezes issued policies', () => {
      const ledger = new QuotaLedger({ tiers, defaultTier: null }, { clock });
      const policy = ledger.setPolicy({ tenantId: 't1', resource: 'jobs', limit: 3 });

      expect(Object.isFrozen(policy)).toBe(true);
    });

    it('rejects invalid limits and windows', () => {
      const ledger = new QuotaLedger({ tiers, defaultTier: null }, { clock });

      expect(() => ledger.setPolicy({ tenantId: 't1', resource: 'jobs', limit: -1 })).toThrow(
        'Quota limit must be a non-negative integer (got -1)'
      );
      expect(() => ledger.setPolicy({ tenantId: 't1', resource: 'jobs', limit: 1, windowSeconds: 0 })).toThrow(
        'Quota window must be a positive number of seconds (got 0)'
      );
    });
  });

  it('summarizes usage against limits', () => {
    const ledger = new QuotaLedger({ tiers, defaultTier: null }, { clock });
    ledger.assignTier('t1', 'free');
    ledger.reserve('t1', 'jobs', 2);

    const summary = ledger.summary('t1');

    expect(summary.tenantId).toBe('t1');
    expect(summary.tier).toBe('free');
    expect(summary.resources.find((entry) => entry.resource === 'jobs')).toEqual({
      resource: 'jobs',
      consumed: 2,
      limit: 5,
      remaining: 3,
      utilizationPercent: 40,
      windowSeconds: null,
      source: 'tier',
    });
    expect(summary.resources.find((entry) => entry.resource === 'artifacts')).toEqual({
      resource: 'artifacts',
      consumed: 0,
      limit: null,
      remaining: null,
      utilizationPercent: null,
      windowSeconds: null,
      source: 'none',
    });
  });

  it('lists known tenants', () => {
    const ledger = new QuotaLedger({ tiers, defaultTier: null }, { clock });
    ledger.reserve('zeta', 'jobs', 1);
    ledger.assignTier('alpha', 'free');
    ledger.setPolicy({ tenantId: 'mid', resource: 'jobs', limit: 1 });

    expect(ledger.tenants()).toEqual(['alpha', 'mid', 'zeta']);
  });

  it('emits an event for every denial', () => {
    const events = new GovernanceEventBus();
    const denied = jest.fn();
    events.on('quota.denied', denied);
    const ledger = new QuotaLedger({ tiers, defaultTier: null }, { clock, events });
    ledger.setPolicy({ tenantId: 't1', resource: 'jobs', limit: 1 });

    ledger.reserve('t1', 'jobs', 1);
    ledger.reserve('t1', 'jobs', 1);

    expect(denied).toHaveBeenCalledTimes(1);
    expect(denied).toHaveBeenCalledWith({ tenantId: 't1', resource: 'jobs', requested: 1, current: 1, limit: 1 });
  });

  it('recognizes quota resource names', () => {
    expect(isQuotaResource('cache_bytes')).toBe(true);
    expect(isQuotaResource('widgets')).toBe(false);
  });
});
