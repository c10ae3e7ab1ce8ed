import { and, desc, eq, isNull, lte, ne, or, sql } from "drizzle-orm";
import type { PostgresJsDatabase } from "drizzle-orm/postgres-js";
import {
  TERMINAL_STAGE,
  isAssessmentStage,
  type AnalysisJob,
  type AssessmentBundle,
  type StageFailureRecord,
} from "../../core/entities/assessment";
import type {
  AdvanceCommit,
  AssessmentSinkPort,
  CheckpointStorePort,
  LeaseRequest,
} from "../../core/ports/outboundPorts";
import { bundlesTable, checkpointsTable } from "./schema";

type CheckpointRow = typeof checkpointsTable.$inferSelect;

const toJob = (row: CheckpointRow): AnalysisJob => {
  if (!isAssessmentStage(row.stage)) {
    throw new Error(`Checkpoint ${row.key} has unknown stage '${row.stage}'.`);
  }

  return {
    key: row.key,
    companyCode: row.companyCode,
    companyName: row.companyName,
    industry: row.industry ?? undefined,
    companyDomains: row.companyDomains,
    period: row.period,
    stage: row.stage,
    artifacts: row.artifacts,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
    stageEnteredAt: row.stageEnteredAt,
    lastFailure: row.lastFailure ?? undefined,
    leaseOwner: row.leaseOwner ?? undefined,
    leaseExpiresAt: row.leaseExpiresAt ?? undefined,
    archivedAt: row.archivedAt ?? undefined,
  };
};

/**
 * Durable checkpoint store. Lease and advance are single conditional UPDATEs, so two workers
 * racing on the same row see exactly one winner.
 */
export class PostgresCheckpointStore implements CheckpointStorePort {
  constructor(private readonly db: PostgresJsDatabase<Record<string, never>>) {}

  async load(key: string): Promise<AnalysisJob | null> {
    const [row] = await this.db
      .select()
      .from(checkpointsTable)
      .where(eq(checkpointsTable.key, key))
      .limit(1);

    return row ? toJob(row) : null;
  }

  async createIfAbsent(job: AnalysisJob): Promise<AnalysisJob> {
    await this.db
      .insert(checkpointsTable)
      .values({
        key: job.key,
        companyCode: job.companyCode,
        companyName: job.companyName,
        industry: job.industry ?? null,
        companyDomains: job.companyDomains,
        period: job.period,
        stage: job.stage,
        artifacts: job.artifacts,
        lastFailure: job.lastFailure ?? null,
        stageEnteredAt: job.stageEnteredAt,
        createdAt: job.createdAt,
        updatedAt: job.updatedAt,
      })
      .onConflictDoNothing({ target: checkpointsTable.key });

    const stored = await this.load(job.key);
    if (!stored) {
      throw new Error(`Checkpoint ${job.key} missing after insert.`);
    }
    return stored;
  }

  async acquireLease(request: LeaseRequest): Promise<AnalysisJob | null> {
    const [row] = await this.db
      .update(checkpointsTable)
      .set({
        leaseOwner: request.owner,
        leaseExpiresAt: request.expiresAt,
        updatedAt: request.now,
      })
      .where(
        and(
          eq(checkpointsTable.key, request.key),
          eq(checkpointsTable.stage, request.expectedStage),
          isNull(checkpointsTable.archivedAt),
          or(
            isNull(checkpointsTable.leaseOwner),
            isNull(checkpointsTable.leaseExpiresAt),
            lte(checkpointsTable.leaseExpiresAt, request.now),
          ),
        ),
      )
      .returning();

    return row ? toJob(row) : null;
  }

  async renewLease(request: LeaseRequest): Promise<boolean> {
    const rows = await this.db
      .update(checkpointsTable)
      .set({ leaseExpiresAt: request.expiresAt, updatedAt: request.now })
      .where(
        and(
          eq(checkpointsTable.key, request.key),
          eq(checkpointsTable.stage, request.expectedStage),
          eq(checkpointsTable.leaseOwner, request.owner),
        ),
      )
      .returning({ key: checkpointsTable.key });

    return rows.length > 0;
  }

  async commitAdvance(commit: AdvanceCommit): Promise<AnalysisJob | null> {
    const [row] = await this.db
      .update(checkpointsTable)
      .set({
        stage: commit.nextStage,
        artifacts: commit.artifacts,
        stageEnteredAt: commit.now,
        updatedAt: commit.now,
        lastFailure: null,
        leaseOwner: null,
        leaseExpiresAt: null,
      })
      .where(
        and(
          eq(checkpointsTable.key, commit.key),
          eq(checkpointsTable.stage, commit.expectedStage),
          eq(checkpointsTable.leaseOwner, commit.owner),
        ),
      )
      .returning();

    return row ? toJob(row) : null;
  }

  async releaseLease(
    key: string,
    owner: string,
    now: Date,
    failure?: StageFailureRecord,
  ): Promise<void> {
    await this.db
      .update(checkpointsTable)
      .set({
        leaseOwner: null,
        leaseExpiresAt: null,
        updatedAt: now,
        ...(failure ? { lastFailure: failure } : {}),
      })
      .where(
        and(
          eq(checkpointsTable.key, key),
          eq(checkpointsTable.leaseOwner, owner),
        ),
      );
  }

  async listActive(limit: number): Promise<AnalysisJob[]> {
    const rows = await this.db
      .select()
      .from(checkpointsTable)
      .where(
        and(
          isNull(checkpointsTable.archivedAt),
          ne(checkpointsTable.stage, TERMINAL_STAGE),
        ),
      )
      .orderBy(desc(checkpointsTable.updatedAt))
      .limit(limit);

    return rows.map(toJob);
  }

  async archive(key: string, now: Date): Promise<void> {
    await this.db
      .update(checkpointsTable)
      .set({ archivedAt: now, updatedAt: now })
      .where(
        and(
          eq(checkpointsTable.key, key),
          eq(checkpointsTable.stage, TERMINAL_STAGE),
        ),
      );
  }
}

/**
 * Writes finalized bundles with upsert semantics so a re-run handoff replaces rather than duplicates.
 */
export class PostgresAssessmentSink implements AssessmentSinkPort {
  constructor(private readonly db: PostgresJsDatabase<Record<string, never>>) {}

  async commit(bundle: AssessmentBundle): Promise<void> {
    await this.db
      .insert(bundlesTable)
      .values({
        jobKey: bundle.jobKey,
        companyCode: bundle.companyCode,
        companyName: bundle.companyName,
        industry: bundle.industry ?? null,
        period: bundle.period,
        claims: bundle.claims,
        evidence: bundle.evidence,
        sideArtifactUri: bundle.sideArtifactUri ?? null,
        topicSummary: bundle.topicSummary,
        committedAt: bundle.committedAt,
      })
      .onConflictDoUpdate({
        target: bundlesTable.jobKey,
        set: {
          claims: sql`excluded.claims`,
          evidence: sql`excluded.evidence`,
          sideArtifactUri: sql`excluded.side_artifact_uri`,
          topicSummary: sql`excluded.topic_summary`,
          committedAt: sql`excluded.committed_at`,
        },
      });
  }
}
