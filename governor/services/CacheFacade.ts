/**
 * CacheFacade - read-through cache in front of the query engine
 *
 * Every miss is charged against the tenant's `cache_bytes` quota before the
 * compute starts and reconciled to the real size afterwards. Concurrent
 * misses on one key share a single compute. Whenever an entry leaves the
 * store, for any reason, its bytes go back to the owning tenant.
 */

import { createHash } from 'node:crypto';
import type { Logger } from 'pino';
import { componentLogger, toError } from '../utils/logger.js';
import { ComputeFailureError, QuotaExceededError } from '../utils/errorHandler.js';
import type { GovernanceEventBus } from '../utils/events.js';
import { CacheStore, estimateSize } from './CacheStore.js';
import type { QuotaLedger } from './QuotaLedger.js';
import type { CacheStats, ComputeFn, ComputeResult, GetOrComputeOptions, QuotaDecision } from '../types/index.js';

export interface CacheFacadeOptions {
  estimatedEntryBytes: number;
  events?: GovernanceEventBus;
  logger?: Logger;
}

export type FacadeStats = CacheStats & { inFlight: number };

type QuotaDenial = Extract<QuotaDecision, { allowed: false }>;

interface ComputeTicket {
  // set when the key is invalidated while the compute runs
  invalidated: boolean;
}

interface InFlightCompute<V> {
  promise: Promise<V>;
  ticket: ComputeTicket;
}

/**
 * Stable key for a query and its parameters (sha256, first 32 hex chars)
 */
export function cacheKey(sql: string, params?: readonly unknown[] | null): string {
  const keyData = params && params.length > 0 ? sql + JSON.stringify(params) : sql;
  return createHash('sha256').update(keyData).digest('hex').slice(0, 32);
}

export class CacheFacade<V = unknown> {
  private inFlight: Map<string, InFlightCompute<V>> = new Map();
  private readonly estimatedEntryBytes: number;
  private readonly events: GovernanceEventBus | null;
  private readonly logger: Logger;
  private readonly detach: () => void;

  constructor(
    private readonly store: CacheStore<V>,
    private readonly ledger: QuotaLedger,
    options: CacheFacadeOptions
  ) {
    this.estimatedEntryBytes = options.estimatedEntryBytes;
    this.events = options.events ?? null;
    this.logger = options.logger ?? componentLogger('CacheFacade');

    this.detach = store.onRemove((entry, reason) => {
      if (entry.tenantId !== null) {
        this.ledger.release(entry.tenantId, 'cache_bytes', entry.sizeBytes, entry.createdAt);
      }
      this.events?.emit('cache.eviction', {
        key: entry.key,
        reason,
        sizeBytes: entry.sizeBytes,
        tenantId: entry.tenantId,
      });
    });
  }

  async getOrCompute(key: string, compute: ComputeFn<V>, options: GetOrComputeOptions): Promise<V> {
    const lookup = this.store.get(key);
    if (lookup.found) {
      this.events?.emit('cache.hit', { key });
      return lookup.value;
    }

    const running = this.inFlight.get(key);
    if (running) {
      return this.awaitFor(running.promise, options.signal);
    }

    if (options.signal?.aborted) {
      throw toError(options.signal.reason);
    }

    this.events?.emit('cache.miss', { key, tenantId: options.tenantId });

    const estimate = options.estimatedBytes ?? this.estimatedEntryBytes;
    const decision = this.ledger.reserve(options.tenantId, 'cache_bytes', estimate);
    if (!decision.allowed) {
      throw this.quotaError(options.tenantId, estimate, decision);
    }

    const ticket: ComputeTicket = { invalidated: false };
    const run: InFlightCompute<V> = {
      promise: this.computeAndStore(key, compute, options, estimate, ticket),
      ticket,
    };
    this.inFlight.set(key, run);
    const settle = () => {
      if (this.inFlight.get(key) === run) {
        this.inFlight.delete(key);
      }
    };
    run.promise.then(settle, settle);

    return this.awaitFor(run.promise, options.signal);
  }

  /**
   * Wrap a query function so each call goes through getOrCompute
   */
  wrap<A extends unknown[]>(
    fn: (...args: A) => Promise<V>,
    keyFn: (...args: A) => string,
    options: GetOrComputeOptions | ((...args: A) => GetOrComputeOptions)
  ): (...args: A) => Promise<V> {
    return (...args: A) => {
      const callOptions = typeof options === 'function' ? options(...args) : options;
      return this.getOrCompute(keyFn(...args), async () => ({ value: await fn(...args) }), callOptions);
    };
  }

  /**
   * Drop a cached entry. A compute already running for the key still answers
   * its waiters but its result is not stored.
   */
  invalidate(key: string): boolean {
    this.abandon(key);
    return this.store.invalidate(key);
  }

  invalidatePrefix(prefix: string): number {
    for (const key of [...this.inFlight.keys()]) {
      if (key.startsWith(prefix)) {
        this.abandon(key);
      }
    }
    return this.store.invalidatePrefix(prefix);
  }

  stats(): FacadeStats {
    return { ...this.store.stats(), inFlight: this.inFlight.size };
  }

  /**
   * Stop releasing quota for entries leaving the store
   */
  close(): void {
    this.detach();
  }

  private async computeAndStore(
    key: string,
    compute: ComputeFn<V>,
    options: GetOrComputeOptions,
    estimate: number,
    ticket: ComputeTicket
  ): Promise<V> {
    const { tenantId } = options;

    let result: ComputeResult<V>;
    try {
      result = await compute(key);
    } catch (error) {
      this.ledger.release(tenantId, 'cache_bytes', estimate);
      this.logger.warn({ key, tenantId, err: toError(error) }, 'Compute failed');
      throw new ComputeFailureError(key, error);
    }

    if (ticket.invalidated) {
      this.ledger.release(tenantId, 'cache_bytes', estimate);
      this.logger.debug({ key, tenantId }, 'Key invalidated during compute, result returned uncached');
      return result.value;
    }

    const actual = this.measure(key, result, estimate);

    if (actual > estimate) {
      const extra = this.ledger.reserve(tenantId, 'cache_bytes', actual - estimate);
      if (!extra.allowed) {
        this.ledger.release(tenantId, 'cache_bytes', estimate);
        throw this.quotaError(tenantId, actual - estimate, extra);
      }
    } else if (actual < estimate) {
      this.ledger.release(tenantId, 'cache_bytes', estimate - actual);
    }

    const outcome = this.store.put(key, result.value, { ttlSeconds: options.ttlSeconds, sizeBytes: actual, tenantId });
    if (!outcome.stored) {
      this.ledger.release(tenantId, 'cache_bytes', actual);
      this.logger.info({ key, tenantId, reason: outcome.reason, sizeBytes: actual }, 'Result returned uncached');
    }

    return result.value;
  }

  private abandon(key: string): void {
    const running = this.inFlight.get(key);
    if (running) {
      running.ticket.invalidated = true;
      this.inFlight.delete(key);
    }
  }

  /**
   * Reported size, else the measured one. Falls back to the estimate when the
   * reported size is not a byte count or the value cannot be serialized.
   */
  private measure(key: string, result: ComputeResult<V>, estimate: number): number {
    if (result.sizeBytes !== undefined) {
      if (Number.isFinite(result.sizeBytes) && result.sizeBytes >= 0) {
        return result.sizeBytes;
      }
      this.logger.warn({ key, sizeBytes: result.sizeBytes }, 'Invalid reported result size, using estimate');
      return estimate;
    }
    try {
      return estimateSize(result.value);
    } catch (error) {
      this.logger.warn({ key, err: toError(error) }, 'Could not measure result size, using estimate');
      return estimate;
    }
  }

  /**
   * Await a shared compute; aborting `signal` rejects this caller only
   */
  private awaitFor(pending: Promise<V>, signal: AbortSignal | undefined): Promise<V> {
    if (!signal) {
      return pending;
    }
    if (signal.aborted) {
      return Promise.reject(toError(signal.reason));
    }

    return new Promise<V>((resolve, reject) => {
      const onAbort = () => reject(toError(signal.reason));
      signal.addEventListener('abort', onAbort, { once: true });
      pending.then(
        (value) => {
          signal.removeEventListener('abort', onAbort);
          resolve(value);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        }
      );
    });
  }

  private quotaError(tenantId: string, requested: number, denial: QuotaDenial): QuotaExceededError {
    return new QuotaExceededError({
      tenantId,
      resource: 'cache_bytes',
      current: denial.current,
      limit: denial.limit,
      requested,
      reason: denial.reason,
    });
  }
}

export default CacheFacade;
