import {
  index,
  jsonb,
  pgTable,
  text,
  timestamp,
} from "drizzle-orm/pg-core";
import type {
  AssessmentArtifacts,
  ClaimEntity,
  EvidenceEntity,
  StageFailureRecord,
} from "../../core/entities/assessment";

export const checkpointsTable = pgTable(
  "assessment_checkpoints",
  {
    key: text("key").primaryKey(),
    companyCode: text("company_code").notNull(),
    companyName: text("company_name").notNull(),
    industry: text("industry"),
    companyDomains: jsonb("company_domains").$type<string[]>().notNull(),
    period: text("period").notNull(),
    stage: text("stage").notNull(),
    artifacts: jsonb("artifacts").$type<AssessmentArtifacts>().notNull(),
    lastFailure: jsonb("last_failure").$type<StageFailureRecord>(),
    leaseOwner: text("lease_owner"),
    leaseExpiresAt: timestamp("lease_expires_at", { withTimezone: true }),
    stageEnteredAt: timestamp("stage_entered_at", {
      withTimezone: true,
    }).notNull(),
    archivedAt: timestamp("archived_at", { withTimezone: true }),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull(),
  },
  (table) => ({
    stageIdx: index("assessment_checkpoints_stage_idx").on(table.stage),
  }),
);

export const bundlesTable = pgTable(
  "assessment_bundles",
  {
    jobKey: text("job_key").primaryKey(),
    companyCode: text("company_code").notNull(),
    companyName: text("company_name").notNull(),
    industry: text("industry"),
    period: text("period").notNull(),
    claims: jsonb("claims").$type<ClaimEntity[]>().notNull(),
    evidence: jsonb("evidence").$type<EvidenceEntity[]>().notNull(),
    sideArtifactUri: text("side_artifact_uri"),
    topicSummary: jsonb("topic_summary")
      .$type<{ resolved: number; noEvidence: number; fetchErrors: number }>()
      .notNull(),
    committedAt: timestamp("committed_at", { withTimezone: true }).notNull(),
  },
  (table) => ({
    companyPeriodIdx: index("assessment_bundles_company_period_idx").on(
      table.companyCode,
      table.period,
    ),
  }),
);
