/**
 * Governor configuration
 *
 * Read once from the environment at startup and validated with zod. Any
 * invalid value is fatal: `loadConfig` throws a ConfigurationError listing
 * every offending variable instead of starting with a partial config.
 */

import { z } from 'zod';
import env, { EnvironmentManager } from './env.js';
import { ConfigurationError } from './errorHandler.js';
import tierFile from '../config/quota-tiers.json';
import { QUOTA_RESOURCES } from '../types/quota.js';
import type { QuotaResource, QuotaTierDefinition, TierLimits } from '../types/quota.js';
import type { GovernorConfig } from '../types/config.js';

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().min(0);
const flag = z
  .enum(['true', 'false', '1', '0', 'TRUE', 'FALSE'])
  .transform((value) => value.toLowerCase() === 'true' || value === '1');

const TierLimitSchema = z.object({
  limit: nonNegativeInt,
  windowSeconds: positiveInt.optional(),
});

const TierFileSchema = z.record(
  z.object({
    name: z.string(),
    description: z.string().optional(),
    limits: z
      .object({
        jobs: TierLimitSchema.optional(),
        artifacts: TierLimitSchema.optional(),
        cache_bytes: TierLimitSchema.optional(),
        api_requests: TierLimitSchema.optional(),
      })
      .strict(),
  })
);

// Keys are the environment variable names so issues point straight at the culprit
const EnvSchema = z.object({
  PORT: positiveInt.default(8060),

  CACHE_MAX_ENTRIES: positiveInt.default(1000),
  CACHE_MAX_BYTES: positiveInt.default(100 * 1024 * 1024),
  CACHE_DEFAULT_TTL: nonNegativeInt.default(300),
  CACHE_ESTIMATED_ENTRY_BYTES: nonNegativeInt.default(1024),
  CACHE_SWEEP_INTERVAL: nonNegativeInt.default(300),

  QUOTA_DEFAULT_TIER: z.string().optional(),

  PRUNE_ENABLED: flag.default('true'),
  PRUNE_INTERVAL: positiveInt.default(3600),
  PRUNE_CRON: z.string().optional(),
  PRUNE_MAX_JOB_AGE_DAYS: nonNegativeInt.default(30),
  PRUNE_MAX_ARTIFACT_AGE_DAYS: nonNegativeInt.default(30),
  PRUNE_MAX_ARTIFACTS_PER_TENANT: nonNegativeInt.default(1000),
  PRUNE_BATCH_SIZE: positiveInt.default(100),
  PRUNE_DRY_RUN: flag.default('false'),
  PRUNE_HISTORY_SIZE: positiveInt.default(50),
  PRUNE_SHUTDOWN_GRACE: nonNegativeInt.default(30000),

  PRUNE_LOCK_ADAPTER: z.enum(['memory', 'redis']).default('memory'),
  PRUNE_LOCK_REDIS_URL: z.string().optional(),
  PRUNE_LOCK_TTL: positiveInt.default(600),

  REGISTRY_ADAPTER: z.enum(['memory', 'postgres']).default('memory'),
  DATABASE_URL: z.string().optional(),
});

/**
 * Environment variable overriding one tier limit, e.g. QUOTA_FREE_CACHE_BYTES_LIMIT
 */
export function tierOverrideKey(tier: string, resource: QuotaResource): string {
  return `QUOTA_${tier.toUpperCase()}_${resource.toUpperCase()}_LIMIT`;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join('.') : 'config';
    return `${where}: ${issue.message}`;
  });
}

function loadTiers(source: EnvironmentManager, issues: string[]): Record<string, QuotaTierDefinition> {
  const parsed = TierFileSchema.safeParse(tierFile);
  if (!parsed.success) {
    issues.push(...formatIssues(parsed.error).map((issue) => `quota-tiers.json ${issue}`));
    return {};
  }

  const tiers: Record<string, QuotaTierDefinition> = {};
  for (const [tierName, definition] of Object.entries(parsed.data)) {
    const limits: TierLimits = { ...definition.limits };

    for (const resource of QUOTA_RESOURCES) {
      const key = tierOverrideKey(tierName, resource);
      const raw = source.get(key);
      if (raw === undefined) continue;

      const override = nonNegativeInt.safeParse(raw);
      if (!override.success) {
        issues.push(`${key}: limit must be a non-negative integer (got "${raw}")`);
        continue;
      }
      limits[resource] = { ...limits[resource], limit: override.data };
    }

    tiers[tierName] = { name: definition.name, description: definition.description, limits };
  }
  return tiers;
}

/**
 * Build the validated governor configuration from the environment
 */
export function loadConfig(source: EnvironmentManager = env): GovernorConfig {
  const issues: string[] = [];
  const raw: Record<string, string | undefined> = {};
  for (const key of Object.keys(EnvSchema.shape)) {
    raw[key] = source.get(key);
  }

  const parsed = EnvSchema.safeParse(raw);
  const tiers = loadTiers(source, issues);

  if (!parsed.success) {
    issues.unshift(...formatIssues(parsed.error));
  }

  if (parsed.success) {
    const vars = parsed.data;
    if (vars.QUOTA_DEFAULT_TIER && !tiers[vars.QUOTA_DEFAULT_TIER]) {
      issues.push(`QUOTA_DEFAULT_TIER: unknown tier "${vars.QUOTA_DEFAULT_TIER}"`);
    }
    if (vars.PRUNE_LOCK_ADAPTER === 'redis' && !vars.PRUNE_LOCK_REDIS_URL) {
      issues.push('PRUNE_LOCK_REDIS_URL: required when PRUNE_LOCK_ADAPTER=redis');
    }
    if (vars.REGISTRY_ADAPTER === 'postgres' && !vars.DATABASE_URL) {
      issues.push('DATABASE_URL: required when REGISTRY_ADAPTER=postgres');
    }
  }

  if (!parsed.success || issues.length > 0) {
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    cache: {
      maxEntries: vars.CACHE_MAX_ENTRIES,
      maxBytes: vars.CACHE_MAX_BYTES,
      defaultTtlSeconds: vars.CACHE_DEFAULT_TTL,
      estimatedEntryBytes: vars.CACHE_ESTIMATED_ENTRY_BYTES,
      sweepIntervalSeconds: vars.CACHE_SWEEP_INTERVAL,
    },
    quota: {
      tiers,
      defaultTier: vars.QUOTA_DEFAULT_TIER ?? null,
    },
    prune: Object.freeze({
      enabled: vars.PRUNE_ENABLED,
      intervalSeconds: vars.PRUNE_INTERVAL,
      cron: vars.PRUNE_CRON ?? null,
      maxJobAgeDays: vars.PRUNE_MAX_JOB_AGE_DAYS,
      maxArtifactAgeDays: vars.PRUNE_MAX_ARTIFACT_AGE_DAYS,
      maxArtifactsPerTenant: vars.PRUNE_MAX_ARTIFACTS_PER_TENANT,
      batchSize: vars.PRUNE_BATCH_SIZE,
      dryRun: vars.PRUNE_DRY_RUN,
      historySize: vars.PRUNE_HISTORY_SIZE,
      shutdownGraceMs: vars.PRUNE_SHUTDOWN_GRACE,
    }),
    lock: {
      adapter: vars.PRUNE_LOCK_ADAPTER,
      redisUrl: vars.PRUNE_LOCK_REDIS_URL ?? null,
      ttlSeconds: vars.PRUNE_LOCK_TTL,
    },
    registry: {
      adapter: vars.REGISTRY_ADAPTER,
      databaseUrl: vars.DATABASE_URL ?? null,
    },
  };
}
