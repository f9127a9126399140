import type { Logger } from 'pino';
import { componentLogger } from '../utils/logger.js';
import { APIError } from '../utils/errorHandler.js';
import type { GovernanceEventBus } from '../utils/events.js';
import { QUOTA_RESOURCES } from '../types/quota.js';
import type {
  QuotaDecision,
  QuotaLedgerConfig,
  QuotaPolicy,
  QuotaResource,
  QuotaTierDefinition,
  ResourceUsageSummary,
  TenantUsageSummary,
  UsageCounter,
} from '../types/index.js';
import type { Clock } from './CacheStore.js';

interface ResolvedLimit {
  limit: number;
  windowSeconds: number | null;
  source: 'policy' | 'tier';
}

const counterKey = (tenantId: string, resource: QuotaResource) => `${tenantId}:${resource}`;

export function isQuotaResource(value: unknown): value is QuotaResource {
  return typeof value === 'string' && (QUOTA_RESOURCES as readonly string[]).includes(value);
}

/**
 * QuotaLedger - per-tenant usage counters with check-before-commit enforcement
 *
 * Limits come from an explicitly issued policy, else from the tenant's tier
 * (assigned, or the configured default tier), else the resource is unlimited.
 *
 * `reserve` checks and commits in one synchronous step, so interleaved
 * reservations from concurrent requests can never jointly overshoot a limit.
 * A denial is a returned decision, never an exception.
 */
export class QuotaLedger {
  private counters: Map<string, UsageCounter> = new Map();
  private policies: Map<string, QuotaPolicy> = new Map();
  private tenantTiers: Map<string, string> = new Map();
  private readonly tiers: Record<string, QuotaTierDefinition>;
  private readonly defaultTier: string | null;
  private readonly now: Clock;
  private readonly events: GovernanceEventBus | null;
  private readonly logger: Logger;

  constructor(
    config: QuotaLedgerConfig,
    options: { clock?: Clock; events?: GovernanceEventBus; logger?: Logger } = {}
  ) {
    this.tiers = config.tiers;
    this.defaultTier = config.defaultTier;
    this.now = options.clock ?? Date.now;
    this.events = options.events ?? null;
    this.logger = options.logger ?? componentLogger('QuotaLedger');

    if (this.defaultTier && !this.tiers[this.defaultTier]) {
      throw new APIError(`Unknown default tier: ${this.defaultTier}`, 500);
    }
  }

  /**
   * Would `amount` more fit under the active limit? Never mutates.
   */
  check(tenantId: string, resource: QuotaResource, amount: number): QuotaDecision {
    this.assertAmount(amount);
    const resolved = this.resolveLimit(tenantId, resource);
    const current = this.currentConsumption(tenantId, resource, resolved);

    if (!resolved) {
      return { allowed: true, current, limit: null };
    }

    if (current + amount > resolved.limit) {
      return {
        allowed: false,
        reason: `Quota exceeded for ${resource} (${current}/${resolved.limit}, requested ${amount})`,
        current,
        limit: resolved.limit,
      };
    }

    return { allowed: true, current, limit: resolved.limit };
  }

  /**
   * Check and, if allowed, commit the increment
   */
  reserve(tenantId: string, resource: QuotaResource, amount: number): QuotaDecision {
    const decision = this.check(tenantId, resource, amount);

    if (!decision.allowed) {
      this.logger.debug({ tenantId, resource, amount, current: decision.current, limit: decision.limit }, 'Reservation denied');
      this.events?.emit('quota.denied', {
        tenantId,
        resource,
        requested: amount,
        current: decision.current,
        limit: decision.limit,
      });
      return decision;
    }

    const counter = this.counterFor(tenantId, resource);
    counter.consumed += amount;
    counter.updatedAt = this.now();

    return { ...decision, current: counter.consumed };
  }

  /**
   * Give back `amount`, floored at zero.
   *
   * `reservedAt` is when the usage was originally charged. Under a windowed
   * limit, usage charged before the current window began was already dropped
   * when the window rolled over, so releasing it credits nothing.
   */
  release(tenantId: string, resource: QuotaResource, amount: number, reservedAt?: number): void {
    this.assertAmount(amount);
    const counter = this.counters.get(counterKey(tenantId, resource));
    if (!counter) {
      return;
    }
    const resolved = this.resolveLimit(tenantId, resource);
    this.rollWindow(counter, resolved);
    const windowed = resolved !== null && resolved.windowSeconds !== null;
    if (windowed && reservedAt !== undefined && reservedAt < counter.windowStartedAt) {
      this.logger.debug({ tenantId, resource, amount, reservedAt }, 'Release from an earlier window ignored');
      return;
    }
    counter.consumed = Math.max(0, counter.consumed - amount);
    counter.updatedAt = this.now();
  }

  usage(tenantId: string): Record<QuotaResource, number> {
    const read = (resource: QuotaResource) =>
      this.currentConsumption(tenantId, resource, this.resolveLimit(tenantId, resource));
    return {
      jobs: read('jobs'),
      artifacts: read('artifacts'),
      cache_bytes: read('cache_bytes'),
      api_requests: read('api_requests'),
    };
  }

  summary(tenantId: string): TenantUsageSummary {
    const resources: ResourceUsageSummary[] = QUOTA_RESOURCES.map((resource) => {
      const resolved = this.resolveLimit(tenantId, resource);
      const consumed = this.currentConsumption(tenantId, resource, resolved);

      if (!resolved) {
        return {
          resource,
          consumed,
          limit: null,
          remaining: null,
          utilizationPercent: null,
          windowSeconds: null,
          source: 'none',
        };
      }

      return {
        resource,
        consumed,
        limit: resolved.limit,
        remaining: Math.max(0, resolved.limit - consumed),
        utilizationPercent: resolved.limit === 0 ? 100 : Math.round((consumed / resolved.limit) * 1000) / 10,
        windowSeconds: resolved.windowSeconds,
        source: resolved.source,
      };
    });

    return { tenantId, tier: this.getTier(tenantId), resources };
  }

  /**
   * Issue (or replace) the policy for one tenant/resource pair
   */
  setPolicy(policy: QuotaPolicy): QuotaPolicy {
    if (!Number.isInteger(policy.limit) || policy.limit < 0) {
      throw new APIError(`Quota limit must be a non-negative integer (got ${policy.limit})`, 400);
    }
    if (policy.windowSeconds !== undefined && (!Number.isFinite(policy.windowSeconds) || policy.windowSeconds <= 0)) {
      throw new APIError(`Quota window must be a positive number of seconds (got ${policy.windowSeconds})`, 400);
    }

    const issued = Object.freeze({ ...policy });
    this.policies.set(counterKey(policy.tenantId, policy.resource), issued);
    this.logger.info({ ...issued }, 'Quota policy issued');
    return issued;
  }

  removePolicy(tenantId: string, resource: QuotaResource): boolean {
    return this.policies.delete(counterKey(tenantId, resource));
  }

  getPolicy(tenantId: string, resource: QuotaResource): QuotaPolicy | null {
    const explicit = this.policies.get(counterKey(tenantId, resource));
    if (explicit) {
      return explicit;
    }
    const resolved = this.resolveLimit(tenantId, resource);
    if (!resolved) {
      return null;
    }
    return Object.freeze({
      tenantId,
      resource,
      limit: resolved.limit,
      ...(resolved.windowSeconds !== null ? { windowSeconds: resolved.windowSeconds } : {}),
    });
  }

  assignTier(tenantId: string, tier: string): void {
    if (!this.tiers[tier]) {
      throw new APIError(`Unknown tier: ${tier}. Valid tiers: ${Object.keys(this.tiers).join(', ')}`, 400);
    }
    this.tenantTiers.set(tenantId, tier);
    this.logger.info({ tenantId, tier }, 'Tenant tier assigned');
  }

  getTier(tenantId: string): string | null {
    return this.tenantTiers.get(tenantId) ?? this.defaultTier;
  }

  listTiers(): Record<string, QuotaTierDefinition> {
    return this.tiers;
  }

  /**
   * Tenants with any recorded usage, policy or tier assignment
   */
  tenants(): string[] {
    const ids = new Set<string>();
    for (const counter of this.counters.values()) ids.add(counter.tenantId);
    for (const policy of this.policies.values()) ids.add(policy.tenantId);
    for (const tenantId of this.tenantTiers.keys()) ids.add(tenantId);
    return [...ids].sort();
  }

  private resolveLimit(tenantId: string, resource: QuotaResource): ResolvedLimit | null {
    const policy = this.policies.get(counterKey(tenantId, resource));
    if (policy) {
      return { limit: policy.limit, windowSeconds: policy.windowSeconds ?? null, source: 'policy' };
    }

    const tierName = this.getTier(tenantId);
    const tierLimit = tierName ? this.tiers[tierName]?.limits[resource] : undefined;
    if (tierLimit) {
      return { limit: tierLimit.limit, windowSeconds: tierLimit.windowSeconds ?? null, source: 'tier' };
    }

    return null;
  }

  private currentConsumption(tenantId: string, resource: QuotaResource, resolved: ResolvedLimit | null): number {
    const counter = this.counters.get(counterKey(tenantId, resource));
    if (!counter) {
      return 0;
    }
    return this.windowElapsed(counter, resolved) ? 0 : counter.consumed;
  }

  private counterFor(tenantId: string, resource: QuotaResource): UsageCounter {
    const key = counterKey(tenantId, resource);
    let counter = this.counters.get(key);
    if (!counter) {
      const now = this.now();
      counter = { tenantId, resource, consumed: 0, updatedAt: now, windowStartedAt: now };
      this.counters.set(key, counter);
      return counter;
    }
    this.rollWindow(counter, this.resolveLimit(tenantId, resource));
    return counter;
  }

  private windowElapsed(counter: UsageCounter, resolved: ResolvedLimit | null): boolean {
    if (!resolved || resolved.windowSeconds === null) {
      return false;
    }
    return this.now() >= counter.windowStartedAt + resolved.windowSeconds * 1000;
  }

  private rollWindow(counter: UsageCounter, resolved: ResolvedLimit | null): void {
    if (this.windowElapsed(counter, resolved)) {
      counter.consumed = 0;
      counter.windowStartedAt = this.now();
    }
  }

  private assertAmount(amount: number): void {
    if (!Number.isFinite(amount) || amount < 0) {
      throw new APIError(`Quota amount must be a non-negative number (got ${amount})`, 400);
    }
  }
}

export default QuotaLedger;
