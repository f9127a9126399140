/**
 * Governance Event Types
 * Emitted for external audit / metrics collectors
 */

import type { RemovalReason } from './cache.js';
import type { QuotaResource } from './quota.js';
import type { PruneStats } from './retention.js';

export interface GovernanceEventMap {
  'cache.hit': { key: string };
  'cache.miss': { key: string; tenantId: string | null };
  'cache.eviction': { key: string; reason: RemovalReason; sizeBytes: number; tenantId: string | null };
  'quota.denied': { tenantId: string; resource: QuotaResource; requested: number; current: number; limit: number };
  'prune.completed': PruneStats;
}

export type GovernanceEventName = keyof GovernanceEventMap;
