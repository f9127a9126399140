import schedule from "node-schedule";
import type { Logger } from "pino";
import { componentLogger, toError } from "../utils/logger.js";
import { ConfigurationError } from "../utils/errorHandler.js";
import { MemoryCycleLock, PRUNE_LOCK_KEY } from "../utils/lock.js";
import type { GovernanceEventBus } from "../utils/events.js";
import type { QuotaLedger } from "./QuotaLedger.js";
import type { Clock } from "./CacheStore.js";
import type {
  ArtifactRecord,
  ArtifactRegistry,
  CycleLock,
  JobRecord,
  PruneConfig,
  PruneStats,
  SchedulerState,
  SchedulerStatus,
} from "../types/index.js";

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Anything cached results can be dropped from: the raw store or the facade
 */
export interface CacheInvalidator {
  invalidate(key: string): unknown;
  invalidatePrefix(prefix: string): number;
}

export interface RetentionDependencies {
  registry: ArtifactRegistry;
  ledger: QuotaLedger;
  cache?: CacheInvalidator;
  lock?: CycleLock;
  lockTtlSeconds?: number;
  events?: GovernanceEventBus;
  clock?: Clock;
  logger?: Logger;
}

type PruneItem = { kind: "artifact"; record: ArtifactRecord } | { kind: "job"; record: JobRecord };

interface CycleTally {
  jobsDeleted: number;
  artifactsDeleted: number;
  bytesFreed: number;
  errors: string[];
  // job id -> artifacts of that job that could not be deleted this cycle
  undeletedArtifacts: Map<string, number>;
}

/**
 * Cache keys derived from an artifact: `artifact:<id>` and anything under `artifact:<id>:`
 */
export function artifactCacheKey(artifactId: string): string {
  return `artifact:${artifactId}`;
}

export function validatePruneConfig(config: PruneConfig): string[] {
  const issues: string[] = [];
  const check = (ok: boolean, message: string) => {
    if (!ok) issues.push(message);
  };

  check(Number.isInteger(config.intervalSeconds) && config.intervalSeconds > 0, "intervalSeconds must be a positive integer");
  check(Number.isInteger(config.batchSize) && config.batchSize > 0, "batchSize must be a positive integer");
  check(Number.isFinite(config.maxJobAgeDays) && config.maxJobAgeDays >= 0, "maxJobAgeDays must be zero or more");
  check(Number.isFinite(config.maxArtifactAgeDays) && config.maxArtifactAgeDays >= 0, "maxArtifactAgeDays must be zero or more");
  check(
    Number.isInteger(config.maxArtifactsPerTenant) && config.maxArtifactsPerTenant >= 0,
    "maxArtifactsPerTenant must be a non-negative integer"
  );
  check(Number.isInteger(config.historySize) && config.historySize > 0, "historySize must be a positive integer");
  check(Number.isFinite(config.shutdownGraceMs) && config.shutdownGraceMs >= 0, "shutdownGraceMs must be zero or more");
  check(config.cron === null || config.cron.trim().length > 0, "cron must not be blank");

  return issues;
}

/**
 * Retention Scheduler
 *
 * Periodically deletes jobs and artifacts past their retention limits, gives
 * their quota back to the ledger and drops any cached results derived from
 * deleted artifacts. Only one cycle runs at a time: a tick that lands while a
 * cycle is in progress (here or on another instance holding the lock) is
 * skipped, not queued.
 */
export class RetentionScheduler {
  private state: SchedulerState = "idle";
  private intervalTimer: NodeJS.Timeout | null = null;
  private cronJob: schedule.Job | null = null;
  private activeCycle: Promise<PruneStats | null> | null = null;
  private abortController: AbortController = new AbortController();
  private recent: PruneStats[] = [];
  private readonly config: PruneConfig;
  private readonly registry: ArtifactRegistry;
  private readonly ledger: QuotaLedger;
  private readonly cache: CacheInvalidator | null;
  private readonly lock: CycleLock;
  private readonly lockTtlSeconds: number;
  private readonly events: GovernanceEventBus | null;
  private readonly now: Clock;
  private readonly logger: Logger;

  constructor(config: PruneConfig, deps: RetentionDependencies) {
    const issues = validatePruneConfig(config);
    if (issues.length > 0) {
      throw new ConfigurationError(`Invalid prune configuration: ${issues.join("; ")}`, issues);
    }

    this.config = Object.freeze({ ...config });
    this.registry = deps.registry;
    this.ledger = deps.ledger;
    this.cache = deps.cache ?? null;
    this.lock = deps.lock ?? new MemoryCycleLock({ clock: deps.clock });
    this.lockTtlSeconds = deps.lockTtlSeconds ?? 600;
    this.events = deps.events ?? null;
    this.now = deps.clock ?? Date.now;
    this.logger = deps.logger ?? componentLogger("RetentionScheduler");
  }

  start(): void {
    if (this.state === "stopped") {
      this.logger.warn("Retention scheduler was stopped and cannot be restarted");
      return;
    }
    if (!this.config.enabled) {
      this.logger.info("Retention scheduler disabled");
      return;
    }
    if (this.intervalTimer || this.cronJob) {
      return;
    }

    if (this.config.cron) {
      const job = schedule.scheduleJob(this.config.cron, () => {
        this.tick();
      });
      if (!job) {
        throw new ConfigurationError(`Invalid prune cron expression: ${this.config.cron}`, [
          `cron: "${this.config.cron}" is not a valid cron expression`,
        ]);
      }
      this.cronJob = job;
      this.logger.info({ cron: this.config.cron, dryRun: this.config.dryRun }, "Retention scheduler started");
      return;
    }

    this.intervalTimer = setInterval(() => {
      this.tick();
    }, this.config.intervalSeconds * 1000);
    this.intervalTimer.unref();
    this.logger.info(
      { intervalSeconds: this.config.intervalSeconds, dryRun: this.config.dryRun },
      "Retention scheduler started"
    );
  }

  /**
   * Timer callback: skipped while a cycle is running
   */
  tick(): void {
    if (this.state !== "idle") {
      this.logger.debug({ state: this.state }, "Prune tick skipped");
      return;
    }
    this.guardedCycle().catch((error) => {
      this.logger.error({ err: toError(error) }, "Prune tick failed");
    });
  }

  /**
   * Run one cycle now. Resolves to null when a cycle is already running,
   * another instance holds the lock, or the scheduler is stopped.
   */
  async runOnce(): Promise<PruneStats | null> {
    return this.guardedCycle();
  }

  /**
   * Stop scheduling and ask a running cycle to finish its current batch.
   * Waits at most `graceMs` for it.
   */
  async stop(graceMs: number = this.config.shutdownGraceMs): Promise<void> {
    if (this.state === "stopped" && !this.activeCycle) {
      return;
    }

    this.state = "stopped";
    if (this.intervalTimer) {
      clearInterval(this.intervalTimer);
      this.intervalTimer = null;
    }
    if (this.cronJob) {
      this.cronJob.cancel();
      this.cronJob = null;
    }
    this.abortController.abort();

    const running = this.activeCycle;
    if (running) {
      let graceTimer: NodeJS.Timeout | undefined;
      const expired = new Promise<"timeout">((resolve) => {
        graceTimer = setTimeout(() => resolve("timeout"), graceMs);
      });
      const outcome = await Promise.race([running.then(() => "finished" as const), expired]);
      clearTimeout(graceTimer);
      if (outcome === "timeout") {
        this.logger.warn({ graceMs }, "Prune cycle still running after shutdown grace period");
      }
    }

    this.logger.info("Retention scheduler stopped");
  }

  status(): SchedulerStatus {
    const lastStats = this.recent.length > 0 ? this.recent[this.recent.length - 1] : null;
    return {
      state: this.state,
      enabled: this.config.enabled,
      intervalSeconds: this.config.intervalSeconds,
      cron: this.config.cron,
      dryRun: this.config.dryRun,
      lastRunAt: lastStats ? lastStats.timestamp : null,
      lastStats,
    };
  }

  /**
   * Completed cycles, oldest first, bounded by historySize
   */
  history(): PruneStats[] {
    return [...this.recent];
  }

  private async guardedCycle(): Promise<PruneStats | null> {
    if (this.state !== "idle") {
      return null;
    }

    this.state = "running";
    const cycle = this.lockedCycle();
    this.activeCycle = cycle;
    try {
      return await cycle;
    } finally {
      this.activeCycle = null;
      if (this.state === "running") {
        this.state = "idle";
      }
    }
  }

  private async lockedCycle(): Promise<PruneStats | null> {
    let acquired: boolean;
    try {
      acquired = await this.lock.tryAcquire(PRUNE_LOCK_KEY, this.lockTtlSeconds);
    } catch (error) {
      this.logger.error({ err: toError(error) }, "Could not acquire prune lock");
      return null;
    }

    if (!acquired) {
      this.logger.info("Prune cycle skipped, lock held by another instance");
      return null;
    }

    try {
      return await this.runCycle();
    } finally {
      try {
        await this.lock.release(PRUNE_LOCK_KEY);
      } catch (error) {
        this.logger.warn({ err: toError(error) }, "Could not release prune lock");
      }
    }
  }

  private async runCycle(): Promise<PruneStats> {
    const startedAt = this.now();
    const signal = this.abortController.signal;
    const tally: CycleTally = {
      jobsDeleted: 0,
      artifactsDeleted: 0,
      bytesFreed: 0,
      errors: [],
      undeletedArtifacts: new Map(),
    };
    let candidates = { jobs: 0, artifacts: 0 };
    let aborted = false;

    this.logger.info({ dryRun: this.config.dryRun }, "Prune cycle started");

    try {
      const plan = await this.collectCandidates(startedAt);
      candidates = { jobs: plan.jobs.length, artifacts: plan.artifacts.length };

      if (this.config.dryRun) {
        for (const job of plan.jobs) {
          this.logger.info({ jobId: job.id, tenantId: job.tenantId }, "[dry run] would delete job");
        }
        for (const artifact of plan.artifacts) {
          this.logger.info(
            { artifactId: artifact.id, tenantId: artifact.tenantId, sizeBytes: artifact.sizeBytes },
            "[dry run] would delete artifact"
          );
        }
      } else {
        // Artifacts go before the jobs that own them
        const items: PruneItem[] = [
          ...plan.artifacts.map((record): PruneItem => ({ kind: "artifact", record })),
          ...plan.jobs.map((record): PruneItem => ({ kind: "job", record })),
        ];

        for (let offset = 0; offset < items.length; offset += this.config.batchSize) {
          if (signal.aborted) {
            aborted = true;
            this.logger.warn({ remaining: items.length - offset }, "Prune cycle aborted between batches");
            break;
          }
          for (const item of items.slice(offset, offset + this.config.batchSize)) {
            await this.deleteItem(item, tally);
          }
        }
      }
    } catch (error) {
      const fault = toError(error);
      this.logger.error({ err: fault }, "Prune cycle failed");
      tally.errors.push(`Prune cycle failed: ${fault.message}`);
    }

    const stats: PruneStats = Object.freeze({
      jobsDeleted: tally.jobsDeleted,
      artifactsDeleted: tally.artifactsDeleted,
      bytesFreed: tally.bytesFreed,
      durationMs: this.now() - startedAt,
      errors: Object.freeze([...tally.errors]),
      timestamp: new Date(startedAt).toISOString(),
      dryRun: this.config.dryRun,
      candidates: Object.freeze(candidates),
      aborted,
    });

    this.recent.push(stats);
    if (this.recent.length > this.config.historySize) {
      this.recent.splice(0, this.recent.length - this.config.historySize);
    }

    this.events?.emit("prune.completed", stats);
    return stats;
  }

  private async collectCandidates(now: number): Promise<{ jobs: JobRecord[]; artifacts: ArtifactRecord[] }> {
    const jobCutoff = new Date(now - this.config.maxJobAgeDays * DAY_MS);
    const artifactCutoff = new Date(now - this.config.maxArtifactAgeDays * DAY_MS);

    const jobs = await this.registry.listJobsOlderThan(jobCutoff);
    const selected: Map<string, ArtifactRecord> = new Map();

    for (const artifact of await this.registry.listArtifactsOlderThan(artifactCutoff)) {
      selected.set(artifact.id, artifact);
    }
    for (const artifact of await this.registry.listArtifactsForJobs(jobs.map((job) => job.id))) {
      selected.set(artifact.id, artifact);
    }

    // 0 disables the per-tenant cap
    if (this.config.maxArtifactsPerTenant > 0) {
      for (const tenantId of await this.registry.listTenants()) {
        const kept = (await this.registry.listArtifactsByTenant(tenantId)).filter((artifact) => !selected.has(artifact.id));
        const excess = kept.length - this.config.maxArtifactsPerTenant;
        for (const artifact of kept.slice(0, Math.max(0, excess))) {
          selected.set(artifact.id, artifact);
        }
      }
    }

    return { jobs, artifacts: [...selected.values()] };
  }

  private async deleteItem(item: PruneItem, tally: CycleTally): Promise<void> {
    if (item.kind === "job") {
      const remaining = tally.undeletedArtifacts.get(item.record.id);
      if (remaining !== undefined) {
        this.logger.warn({ jobId: item.record.id, remaining }, "Job kept until its artifacts are deleted");
        tally.errors.push(`Skipped job ${item.record.id}: ${remaining} artifact(s) could not be deleted`);
        return;
      }
    }

    try {
      if (item.kind === "job") {
        await this.registry.deleteJob(item.record.id);
        tally.jobsDeleted++;
        this.ledger.release(item.record.tenantId, "jobs", 1, item.record.createdAt.getTime());
        return;
      }

      const artifact = item.record;
      await this.registry.deleteArtifact(artifact.id);
      tally.artifactsDeleted++;
      tally.bytesFreed += artifact.sizeBytes;
      this.ledger.release(artifact.tenantId, "artifacts", artifact.sizeBytes, artifact.createdAt.getTime());

      if (this.cache) {
        const key = artifactCacheKey(artifact.id);
        this.cache.invalidate(key);
        this.cache.invalidatePrefix(`${key}:`);
      }
    } catch (error) {
      const message = toError(error).message;
      this.logger.warn({ kind: item.kind, id: item.record.id, error: message }, "Prune deletion failed");
      tally.errors.push(`Failed to delete ${item.kind} ${item.record.id}: ${message}`);
      if (item.kind === "artifact" && item.record.jobId !== null) {
        const jobId = item.record.jobId;
        tally.undeletedArtifacts.set(jobId, (tally.undeletedArtifacts.get(jobId) ?? 0) + 1);
      }
    }
  }
}

export default RetentionScheduler;
