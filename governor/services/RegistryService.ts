import { asc, eq, inArray, lt } from "drizzle-orm";
import { drizzle, PostgresJsDatabase } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import type { Logger } from "pino";
import { componentLogger } from "../utils/logger.js";
import { jobsTable, artifactsTable } from "../utils/schema.js";
import type { ArtifactRecord, ArtifactRegistry, JobRecord, RegistryConfig } from "../types/index.js";

const byCreatedAt = <T extends { createdAt: Date }>(a: T, b: T) => a.createdAt.getTime() - b.createdAt.getTime();

/**
 * In-process registry. Backs single-node deployments without a database and
 * every test; `failDeletion` injects per-item delete failures.
 */
export class InMemoryRegistryAdapter implements ArtifactRegistry {
  private jobs: Map<string, Omit<JobRecord, "artifactIds">> = new Map();
  private artifacts: Map<string, ArtifactRecord> = new Map();
  private failures: Map<string, string> = new Map();

  addJob(job: { id: string; tenantId: string; createdAt: Date; status?: string }): void {
    this.jobs.set(job.id, { status: "completed", ...job });
  }

  addArtifact(artifact: { id: string; tenantId: string; createdAt: Date; sizeBytes: number; jobId?: string | null }): void {
    this.artifacts.set(artifact.id, { jobId: null, ...artifact });
  }

  /**
   * Make the next deletion of `id` (job or artifact) throw `message`
   */
  failDeletion(id: string, message: string): void {
    this.failures.set(id, message);
  }

  hasJob(id: string): boolean {
    return this.jobs.has(id);
  }

  hasArtifact(id: string): boolean {
    return this.artifacts.has(id);
  }

  get jobCount(): number {
    return this.jobs.size;
  }

  get artifactCount(): number {
    return this.artifacts.size;
  }

  async listJobsOlderThan(cutoff: Date): Promise<JobRecord[]> {
    return [...this.jobs.values()]
      .filter((job) => job.createdAt < cutoff)
      .sort(byCreatedAt)
      .map((job) => ({ ...job, artifactIds: this.artifactIdsFor(job.id) }));
  }

  async listArtifactsOlderThan(cutoff: Date): Promise<ArtifactRecord[]> {
    return [...this.artifacts.values()].filter((artifact) => artifact.createdAt < cutoff).sort(byCreatedAt);
  }

  async listArtifactsForJobs(jobIds: string[]): Promise<ArtifactRecord[]> {
    const wanted = new Set(jobIds);
    return [...this.artifacts.values()]
      .filter((artifact) => artifact.jobId !== null && wanted.has(artifact.jobId))
      .sort(byCreatedAt);
  }

  async listTenants(): Promise<string[]> {
    const tenants = new Set<string>();
    for (const job of this.jobs.values()) tenants.add(job.tenantId);
    for (const artifact of this.artifacts.values()) tenants.add(artifact.tenantId);
    return [...tenants].sort();
  }

  async listArtifactsByTenant(tenantId: string): Promise<ArtifactRecord[]> {
    return [...this.artifacts.values()].filter((artifact) => artifact.tenantId === tenantId).sort(byCreatedAt);
  }

  async deleteJob(id: string): Promise<void> {
    this.throwIfFailing(id);
    this.jobs.delete(id);
  }

  async deleteArtifact(id: string): Promise<void> {
    this.throwIfFailing(id);
    this.artifacts.delete(id);
  }

  async close(): Promise<void> {
    this.jobs.clear();
    this.artifacts.clear();
  }

  private artifactIdsFor(jobId: string): string[] {
    return [...this.artifacts.values()].filter((artifact) => artifact.jobId === jobId).map((artifact) => artifact.id);
  }

  private throwIfFailing(id: string): void {
    const message = this.failures.get(id);
    if (message !== undefined) {
      this.failures.delete(id);
      throw new Error(message);
    }
  }
}

/**
 * Registry backed by the governor_jobs / governor_artifacts tables
 */
export class PostgresRegistryAdapter implements ArtifactRegistry {
  private db: PostgresJsDatabase;

  constructor(private sql: postgres.Sql, private logger: Logger = componentLogger("Registry")) {
    this.db = drizzle(sql);
  }

  async listJobsOlderThan(cutoff: Date): Promise<JobRecord[]> {
    const jobs = await this.db
      .select()
      .from(jobsTable)
      .where(lt(jobsTable.createdAt, cutoff))
      .orderBy(asc(jobsTable.createdAt));

    if (jobs.length === 0) {
      return [];
    }

    const artifacts = await this.listArtifactsForJobs(jobs.map((job) => job.id));
    return jobs.map((job) => ({
      ...job,
      artifactIds: artifacts.filter((artifact) => artifact.jobId === job.id).map((artifact) => artifact.id),
    }));
  }

  async listArtifactsOlderThan(cutoff: Date): Promise<ArtifactRecord[]> {
    return this.db
      .select()
      .from(artifactsTable)
      .where(lt(artifactsTable.createdAt, cutoff))
      .orderBy(asc(artifactsTable.createdAt));
  }

  async listArtifactsForJobs(jobIds: string[]): Promise<ArtifactRecord[]> {
    if (jobIds.length === 0) {
      return [];
    }
    return this.db
      .select()
      .from(artifactsTable)
      .where(inArray(artifactsTable.jobId, jobIds))
      .orderBy(asc(artifactsTable.createdAt));
  }

  async listTenants(): Promise<string[]> {
    const [jobTenants, artifactTenants] = await Promise.all([
      this.db.selectDistinct({ tenantId: jobsTable.tenantId }).from(jobsTable),
      this.db.selectDistinct({ tenantId: artifactsTable.tenantId }).from(artifactsTable),
    ]);
    const tenants = new Set([...jobTenants, ...artifactTenants].map((row) => row.tenantId));
    return [...tenants].sort();
  }

  async listArtifactsByTenant(tenantId: string): Promise<ArtifactRecord[]> {
    return this.db
      .select()
      .from(artifactsTable)
      .where(eq(artifactsTable.tenantId, tenantId))
      .orderBy(asc(artifactsTable.createdAt), asc(artifactsTable.id));
  }

  async deleteJob(id: string): Promise<void> {
    await this.db.delete(jobsTable).where(eq(jobsTable.id, id));
  }

  async deleteArtifact(id: string): Promise<void> {
    await this.db.delete(artifactsTable).where(eq(artifactsTable.id, id));
  }

  async close(): Promise<void> {
    await this.sql.end({ timeout: 5 });
    this.logger.info("Registry database connection closed");
  }
}

/**
 * Select the registry adapter from configuration
 */
export function initializeRegistry(config: RegistryConfig, logger: Logger = componentLogger("Registry")): ArtifactRegistry {
  if (config.adapter === "postgres") {
    if (!config.databaseUrl) {
      throw new Error("DATABASE_URL is required when the postgres registry adapter is enabled");
    }
    logger.info("Using postgres registry adapter");
    return new PostgresRegistryAdapter(postgres(config.databaseUrl, { max: 5 }), logger);
  }

  logger.info("Using in-memory registry adapter");
  return new InMemoryRegistryAdapter();
}
