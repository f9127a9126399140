/**
 * CacheStore - bounded in-memory result cache with LRU ordering and per-entry TTL
 *
 * Features:
 * - Count (maxEntries) and byte (maxBytes) bounds, never exceeded after a call returns
 * - Least-recently-used eviction, pinned entries are never evicted
 * - Expired entries read as misses even before they are physically removed
 * - Prefix invalidation for bulk drops (e.g. everything derived from one table)
 * - Removal listeners, so owners can release whatever the entry accounted for
 *
 * Every method is synchronous: a call runs to completion before any other
 * caller can touch the store, so no reader sees a half-applied put or evict.
 */

import type { Logger } from 'pino';
import { componentLogger } from '../utils/logger.js';
import type {
  CacheEntry,
  CacheLookup,
  CacheStats,
  CacheStoreConfig,
  PutOptions,
  PutOutcome,
  RemovalListener,
  RemovalReason,
} from '../types/index.js';

export type { CacheEntry, CacheLookup, CacheStats, CacheStoreConfig, PutOptions, PutOutcome };

export type Clock = () => number;

/**
 * Rough byte size of a value for accounting when the producer does not report one
 */
export function estimateSize(value: unknown): number {
  if (value === null || value === undefined) {
    return 0;
  }
  if (typeof value === 'string') {
    return Buffer.byteLength(value, 'utf8');
  }
  if (value instanceof Uint8Array || value instanceof ArrayBuffer) {
    return value.byteLength;
  }
  const json = JSON.stringify(value);
  return json === undefined ? 0 : Buffer.byteLength(json, 'utf8');
}

export class CacheStore<V = unknown> {
  // Map iteration order doubles as recency order: first = least recently used
  private entries: Map<string, CacheEntry<V>> = new Map();
  private totalBytes = 0;
  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private expirations = 0;
  private listeners: RemovalListener<V>[] = [];
  private sweepInterval: NodeJS.Timeout | null = null;
  private readonly config: Readonly<CacheStoreConfig>;
  private readonly now: Clock;
  private readonly logger: Logger;

  constructor(config: CacheStoreConfig, options: { clock?: Clock; logger?: Logger } = {}) {
    this.config = Object.freeze({ ...config });
    this.now = options.clock ?? Date.now;
    this.logger = options.logger ?? componentLogger('CacheStore');
  }

  get(key: string): CacheLookup<V> {
    const entry = this.entries.get(key);

    if (!entry) {
      this.misses++;
      return { found: false };
    }

    if (this.isExpired(entry)) {
      this.remove(entry, 'expired');
      this.misses++;
      return { found: false };
    }

    entry.hitCount++;
    entry.lastAccessedAt = this.now();
    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hits++;

    return { found: true, value: entry.value };
  }

  /**
   * Read without touching recency, hit count or counters
   */
  peek(key: string): Readonly<CacheEntry<V>> | undefined {
    const entry = this.entries.get(key);
    if (!entry || this.isExpired(entry)) {
      return undefined;
    }
    return entry;
  }

  has(key: string): boolean {
    return this.peek(key) !== undefined;
  }

  put(key: string, value: V, options: PutOptions = {}): PutOutcome {
    const sizeBytes = options.sizeBytes ?? estimateSize(value);

    if (sizeBytes > this.config.maxBytes) {
      this.logger.warn({ key, sizeBytes, maxBytes: this.config.maxBytes }, 'Value too large to cache');
      return { stored: false, reason: 'entry_too_large', sizeBytes };
    }

    this.purgeExpired();

    // The old value stays in place until the new one is known to fit
    const previous = this.entries.get(key);
    const victims = this.planEviction(sizeBytes, previous);
    if (victims === null) {
      this.logger.warn({ key, sizeBytes }, 'No evictable capacity left, only pinned entries remain');
      return { stored: false, reason: 'no_evictable_capacity', sizeBytes };
    }

    if (previous) {
      this.remove(previous, 'replaced');
    }
    for (const victim of victims) {
      this.remove(victim, 'evicted');
    }
    const evicted = victims.map((victim) => victim.key);

    const now = this.now();
    const entry: CacheEntry<V> = {
      key,
      value,
      createdAt: now,
      expiresAt: this.resolveExpiry(options.ttlSeconds, now),
      lastAccessedAt: now,
      sizeBytes,
      hitCount: 0,
      pinned: options.pinned ?? false,
      tenantId: options.tenantId ?? null,
    };

    this.entries.set(key, entry);
    this.totalBytes += sizeBytes;

    return { stored: true, evicted };
  }

  invalidate(key: string): boolean {
    const entry = this.entries.get(key);
    if (!entry) {
      return false;
    }
    this.remove(entry, 'invalidated');
    return true;
  }

  invalidatePrefix(prefix: string): number {
    const matches = [...this.entries.values()].filter((entry) => entry.key.startsWith(prefix));
    for (const entry of matches) {
      this.remove(entry, 'invalidated');
    }
    return matches.length;
  }

  clear(): void {
    for (const entry of [...this.entries.values()]) {
      this.remove(entry, 'cleared');
    }
    this.logger.info('Cache cleared');
  }

  /**
   * Physically drop expired entries. Reads already treat them as absent.
   */
  purgeExpired(): number {
    const expired = [...this.entries.values()].filter((entry) => this.isExpired(entry));
    for (const entry of expired) {
      this.remove(entry, 'expired');
    }
    return expired.length;
  }

  stats(): CacheStats {
    const lookups = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      expirations: this.expirations,
      currentSize: this.entries.size,
      currentBytes: this.totalBytes,
      maxEntries: this.config.maxEntries,
      maxBytes: this.config.maxBytes,
      hitRate: lookups === 0 ? 0 : Math.round((this.hits / lookups) * 10000) / 100,
    };
  }

  /**
   * Keys from least to most recently used
   */
  keys(): string[] {
    return [...this.entries.keys()];
  }

  onRemove(listener: RemovalListener<V>): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((candidate) => candidate !== listener);
    };
  }

  /**
   * Periodic background sweep of expired entries
   */
  startSweep(intervalSeconds: number): void {
    if (this.sweepInterval || intervalSeconds <= 0) {
      return;
    }
    this.sweepInterval = setInterval(() => {
      const removed = this.purgeExpired();
      if (removed > 0) {
        this.logger.debug({ removed }, 'Cleaned up expired entries');
      }
    }, intervalSeconds * 1000);
    this.sweepInterval.unref();
  }

  stopSweep(): void {
    if (this.sweepInterval) {
      clearInterval(this.sweepInterval);
      this.sweepInterval = null;
    }
  }

  private isExpired(entry: CacheEntry<V>): boolean {
    return entry.expiresAt !== null && entry.expiresAt <= this.now();
  }

  private resolveExpiry(ttlSeconds: number | null | undefined, now: number): number | null {
    const ttl = ttlSeconds === undefined ? this.config.defaultTtlSeconds : ttlSeconds;
    if (ttl === null || ttl <= 0) {
      return null;
    }
    return now + ttl * 1000;
  }

  /**
   * LRU non-pinned entries to evict so one more entry of `sizeBytes` fits,
   * counting the space of the entry it replaces as free. Null when pinned
   * entries leave no room.
   */
  private planEviction(sizeBytes: number, replacing: CacheEntry<V> | undefined): CacheEntry<V>[] | null {
    let projectedSize = this.entries.size - (replacing ? 1 : 0);
    let projectedBytes = this.totalBytes - (replacing ? replacing.sizeBytes : 0);
    const fits = () => projectedSize + 1 <= this.config.maxEntries && projectedBytes + sizeBytes <= this.config.maxBytes;

    // Recency order already breaks ties: among equal access times the older insert comes first
    const victims: CacheEntry<V>[] = [];
    for (const entry of this.entries.values()) {
      if (fits()) {
        break;
      }
      if (entry.pinned || entry === replacing) {
        continue;
      }
      victims.push(entry);
      projectedSize--;
      projectedBytes -= entry.sizeBytes;
    }

    return fits() ? victims : null;
  }

  private remove(entry: CacheEntry<V>, reason: RemovalReason): void {
    if (this.entries.get(entry.key) !== entry) {
      return;
    }

    this.entries.delete(entry.key);
    this.totalBytes -= entry.sizeBytes;

    if (reason === 'evicted') {
      this.evictions++;
    } else if (reason === 'expired') {
      this.expirations++;
    }

    for (const listener of this.listeners) {
      try {
        listener(entry, reason);
      } catch (error) {
        this.logger.warn({ err: error, key: entry.key, reason }, 'Cache removal listener failed');
      }
    }
  }
}

export default CacheStore;
