/**
 * Retention Types
 */

export interface PruneConfig {
  readonly enabled: boolean;
  readonly intervalSeconds: number;
  /** node-schedule cron expression; replaces the interval when set */
  readonly cron: string | null;
  readonly maxJobAgeDays: number;
  readonly maxArtifactAgeDays: number;
  readonly maxArtifactsPerTenant: number;
  readonly batchSize: number;
  readonly dryRun: boolean;
  readonly historySize: number;
  readonly shutdownGraceMs: number;
}

export interface PruneStats {
  readonly jobsDeleted: number;
  readonly artifactsDeleted: number;
  readonly bytesFreed: number;
  readonly durationMs: number;
  readonly errors: readonly string[];
  readonly timestamp: string;
  readonly dryRun: boolean;
  readonly candidates: Readonly<{ jobs: number; artifacts: number }>;
  readonly aborted: boolean;
}

export type SchedulerState = 'idle' | 'running' | 'stopped';

export interface SchedulerStatus {
  state: SchedulerState;
  enabled: boolean;
  intervalSeconds: number;
  cron: string | null;
  dryRun: boolean;
  lastRunAt: string | null;
  lastStats: PruneStats | null;
}

/**
 * Mutual exclusion for prune cycles across instances
 */
export interface CycleLock {
  tryAcquire(key: string, ttlSeconds: number): Promise<boolean>;
  release(key: string): Promise<void>;
  close(): Promise<void>;
}

export type LockAdapterType = 'memory' | 'redis';
