/**
 * Job / Artifact Registry Types
 * The registry is owned elsewhere; the retention scheduler only lists and deletes.
 */

export interface JobRecord {
  id: string;
  tenantId: string;
  createdAt: Date;
  status: string;
  artifactIds: string[];
}

export interface ArtifactRecord {
  id: string;
  tenantId: string;
  jobId: string | null;
  createdAt: Date;
  sizeBytes: number;
}

export interface ArtifactRegistry {
  listJobsOlderThan(cutoff: Date): Promise<JobRecord[]>;
  listArtifactsOlderThan(cutoff: Date): Promise<ArtifactRecord[]>;
  listArtifactsForJobs(jobIds: string[]): Promise<ArtifactRecord[]>;
  listTenants(): Promise<string[]>;
  /** Oldest first */
  listArtifactsByTenant(tenantId: string): Promise<ArtifactRecord[]>;
  deleteJob(id: string): Promise<void>;
  deleteArtifact(id: string): Promise<void>;
  close(): Promise<void>;
}

export type RegistryAdapterType = 'memory' | 'postgres';
