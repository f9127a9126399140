/**
 * Configuration Types
 */

import type { CacheStoreConfig } from './cache.js';
import type { QuotaLedgerConfig } from './quota.js';
import type { PruneConfig, LockAdapterType } from './retention.js';
import type { RegistryAdapterType } from './registry.js';

export interface FacadeConfig {
  estimatedEntryBytes: number;
  sweepIntervalSeconds: number;
}

export interface LockConfig {
  adapter: LockAdapterType;
  redisUrl: string | null;
  ttlSeconds: number;
}

export interface RegistryConfig {
  adapter: RegistryAdapterType;
  databaseUrl: string | null;
}

export interface GovernorConfig {
  port: number;
  cache: CacheStoreConfig & FacadeConfig;
  quota: QuotaLedgerConfig;
  prune: PruneConfig;
  lock: LockConfig;
  registry: RegistryConfig;
}
