/**
 * Quota Types
 */

export const QUOTA_RESOURCES = ['jobs', 'artifacts', 'cache_bytes', 'api_requests'] as const;

export type QuotaResource = typeof QUOTA_RESOURCES[number];

/**
 * Issued limit for one tenant and resource. Replaced wholesale, never edited.
 */
export interface QuotaPolicy {
  readonly tenantId: string;
  readonly resource: QuotaResource;
  readonly limit: number;
  /** Counter resets after this many seconds; absent = cumulative */
  readonly windowSeconds?: number;
}

export interface UsageCounter {
  tenantId: string;
  resource: QuotaResource;
  consumed: number;
  updatedAt: number;
  windowStartedAt: number;
}

export type QuotaDecision =
  | { allowed: true; current: number; limit: number | null }
  | { allowed: false; reason: string; current: number; limit: number };

export interface TierLimit {
  limit: number;
  windowSeconds?: number;
}

export type TierLimits = Partial<Record<QuotaResource, TierLimit>>;

export interface QuotaTierDefinition {
  name: string;
  description?: string;
  limits: TierLimits;
}

export interface QuotaLedgerConfig {
  tiers: Record<string, QuotaTierDefinition>;
  defaultTier: string | null;
}

export interface ResourceUsageSummary {
  resource: QuotaResource;
  consumed: number;
  limit: number | null;
  remaining: number | null;
  utilizationPercent: number | null;
  windowSeconds: number | null;
  source: 'policy' | 'tier' | 'none';
}

export interface TenantUsageSummary {
  tenantId: string;
  tier: string | null;
  resources: ResourceUsageSummary[];
}
