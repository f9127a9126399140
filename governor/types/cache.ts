/**
 * Cache Types
 * Centralized cache-related type definitions
 */

/**
 * Cache store limits and defaults
 */
export interface CacheStoreConfig {
  maxEntries: number;
  maxBytes: number;
  defaultTtlSeconds: number; // 0 = entries never expire unless a TTL is passed
}

/**
 * Cache entry structure
 */
export interface CacheEntry<V = unknown> {
  key: string;
  value: V;
  createdAt: number;
  expiresAt: number | null;
  lastAccessedAt: number;
  sizeBytes: number;
  hitCount: number;
  pinned: boolean;
  tenantId: string | null;
}

export interface PutOptions {
  /** undefined = store default, null or 0 = never expires */
  ttlSeconds?: number | null;
  sizeBytes?: number;
  pinned?: boolean;
  /** Owner for quota accounting */
  tenantId?: string | null;
}

export type CacheLookup<V> = { found: true; value: V } | { found: false };

export type PutRejection = 'entry_too_large' | 'no_evictable_capacity';

export type PutOutcome =
  | { stored: true; evicted: string[] }
  | { stored: false; reason: PutRejection; sizeBytes: number };

export type RemovalReason = 'evicted' | 'expired' | 'invalidated' | 'replaced' | 'cleared';

export type RemovalListener<V = unknown> = (entry: Readonly<CacheEntry<V>>, reason: RemovalReason) => void;

export interface CacheStats {
  hits: number;
  misses: number;
  evictions: number;
  expirations: number;
  currentSize: number;
  currentBytes: number;
  maxEntries: number;
  maxBytes: number;
  hitRate: number; // percent, two decimals
}

/**
 * What the external query engine hands back for a key
 */
export interface ComputeResult<V> {
  value: V;
  sizeBytes?: number;
}

export type ComputeFn<V> = (key: string) => Promise<ComputeResult<V>>;

export interface GetOrComputeOptions {
  tenantId: string;
  ttlSeconds?: number | null;
  /** Provisional reservation made before the compute runs */
  estimatedBytes?: number;
  /** Abandons this caller's wait only; the shared compute keeps running */
  signal?: AbortSignal;
}
