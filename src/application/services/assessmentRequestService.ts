import {
  buildJobKey,
  isTerminalStage,
  type AnalysisJob,
  type AssessmentRequest,
  type AssessmentStage,
} from "../../core/entities/assessment";
import type {
  CheckpointStorePort,
  ClockPort,
  QueuePort,
} from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";

export type RequestStatus = "created" | "resumed" | "in_progress" | "completed";

export type RequestOutcome = {
  status: RequestStatus;
  job: AnalysisJob;
};

export type JobStatusView =
  | { state: "not_found"; key: string; message: string }
  | {
      state:
        | "in_progress"
        | "temporarily_unavailable"
        | "needs_attention"
        | "completed";
      key: string;
      stage: AssessmentStage;
      stageLabel: string;
      message: string;
      updatedAt: Date;
    };

export const stageLabels: Record<AssessmentStage, string> = {
  fetching: "Fetching report",
  claim_extraction: "Claim extraction",
  news_cross_check: "News cross-check",
  external_verification: "External verification",
  source_validation: "Source validation",
  persisted: "Persisted",
};

const transientFailureCodes = new Set(["oracle_unavailable", "rate_limited"]);
const manualFailureCodes = new Set(["malformed_output", "report_not_found"]);

/**
 * Maps a stored job to what a user should see. Nothing in progress is ever reported as gone.
 */
export const describeJob = (job: AnalysisJob, now: Date): JobStatusView => {
  const base = {
    key: job.key,
    stage: job.stage,
    stageLabel: stageLabels[job.stage],
    updatedAt: job.updatedAt,
  };

  if (isTerminalStage(job.stage)) {
    return { ...base, state: "completed", message: "Assessment completed." };
  }

  const leaseActive =
    job.leaseExpiresAt !== undefined &&
    job.leaseExpiresAt.getTime() > now.getTime();
  const failure = job.lastFailure;

  if (!leaseActive && failure && transientFailureCodes.has(failure.code)) {
    return {
      ...base,
      state: "temporarily_unavailable",
      message: "Analysis service temporarily unavailable, retry later.",
    };
  }

  if (!leaseActive && failure && manualFailureCodes.has(failure.code)) {
    return {
      ...base,
      state: "needs_attention",
      message: `Stopped at ${stageLabels[job.stage]}: ${failure.message}`,
    };
  }

  return {
    ...base,
    state: "in_progress",
    message: `In progress: ${stageLabels[job.stage]}.`,
  };
};

/**
 * Entry point for callers such as a webhook: records or resumes the job and queues it,
 * returning before any pipeline work happens.
 */
export class AssessmentRequestService {
  constructor(
    private readonly store: CheckpointStorePort,
    private readonly queue: QueuePort,
    private readonly clock: ClockPort,
  ) {}

  async request(request: AssessmentRequest): Promise<RequestOutcome> {
    const key = buildJobKey(request.companyCode, request.period);
    const now = this.clock.now();
    const existing = await this.store.load(key);

    if (existing && isTerminalStage(existing.stage)) {
      return { status: "completed", job: existing };
    }

    if (
      existing?.leaseExpiresAt &&
      existing.leaseExpiresAt.getTime() > now.getTime()
    ) {
      return { status: "in_progress", job: existing };
    }

    if (existing) {
      await this.enqueue(key, now);
      logger.info(
        { jobKey: key, stage: existing.stage },
        "Resuming assessment from checkpoint",
      );
      return { status: "resumed", job: existing };
    }

    const stored = await this.store.createIfAbsent(
      this.newJob(key, request, now),
    );

    await this.enqueue(key, now);
    // A concurrent request may have created the row first.
    const status: RequestStatus =
      stored.createdAt.getTime() === now.getTime() ? "created" : "resumed";
    logger.info({ jobKey: key, status }, "Assessment requested");
    return { status, job: stored };
  }

  async describe(companyCode: string, period: string): Promise<JobStatusView> {
    const key = buildJobKey(companyCode, period);
    const job = await this.store.load(key);
    if (!job) {
      return { state: "not_found", key, message: "No assessment on record." };
    }

    return describeJob(job, this.clock.now());
  }

  private newJob(
    key: string,
    request: AssessmentRequest,
    now: Date,
  ): AnalysisJob {
    return {
      key,
      companyCode: request.companyCode.trim().toUpperCase(),
      companyName: request.companyName.trim(),
      industry: request.industry?.trim() || undefined,
      companyDomains: (request.companyDomains ?? [])
        .map((domain) => domain.trim().toLowerCase())
        .filter((domain) => domain.length > 0),
      period: request.period.trim(),
      stage: "fetching",
      artifacts: {},
      createdAt: now,
      updatedAt: now,
      stageEnteredAt: now,
    };
  }

  private async enqueue(jobKey: string, now: Date): Promise<void> {
    await this.queue.enqueue({ jobKey, requestedAt: now.toISOString() });
  }
}
