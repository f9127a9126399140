/**
 * Registry tables read and pruned by the postgres registry adapter.
 *
 * The governor does not create or migrate these; the service that records
 * jobs and artifacts owns them.
 */

import { pgTable, varchar, bigint, timestamp, index } from "drizzle-orm/pg-core";

export const jobsTable = pgTable(
  "governor_jobs",
  {
    id: varchar("id", { length: 255 }).primaryKey().notNull(),
    tenantId: varchar("tenantId", { length: 255 }).notNull(),
    status: varchar("status", { length: 64 }).notNull().default("completed"),
    createdAt: timestamp("createdAt", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    createdAtIdx: index("governor_jobs_created_at_idx").on(table.createdAt),
  })
);

export const artifactsTable = pgTable(
  "governor_artifacts",
  {
    id: varchar("id", { length: 255 }).primaryKey().notNull(),
    tenantId: varchar("tenantId", { length: 255 }).notNull(),
    jobId: varchar("jobId", { length: 255 }),
    sizeBytes: bigint("sizeBytes", { mode: "number" }).notNull().default(0),
    createdAt: timestamp("createdAt", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    tenantCreatedIdx: index("governor_artifacts_tenant_created_idx").on(table.tenantId, table.createdAt),
    jobIdx: index("governor_artifacts_job_idx").on(table.jobId),
  })
);
