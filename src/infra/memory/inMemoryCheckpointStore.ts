import {
  isTerminalStage,
  type AnalysisJob,
  type StageFailureRecord,
} from "../../core/entities/assessment";
import type {
  AdvanceCommit,
  CheckpointStorePort,
  LeaseRequest,
} from "../../core/ports/outboundPorts";

/**
 * Process-local checkpoint store with the same compare-and-swap contract as the Postgres one.
 * Every read and write copies, so callers never share state with the store.
 */
export class InMemoryCheckpointStore implements CheckpointStorePort {
  private readonly jobs = new Map<string, AnalysisJob>();

  async load(key: string): Promise<AnalysisJob | null> {
    const job = this.jobs.get(key);
    return job ? structuredClone(job) : null;
  }

  async createIfAbsent(job: AnalysisJob): Promise<AnalysisJob> {
    const existing = this.jobs.get(job.key);
    if (existing) {
      return structuredClone(existing);
    }

    this.jobs.set(job.key, structuredClone(job));
    return structuredClone(job);
  }

  async acquireLease(request: LeaseRequest): Promise<AnalysisJob | null> {
    const job = this.jobs.get(request.key);
    if (
      !job ||
      job.stage !== request.expectedStage ||
      job.archivedAt !== undefined
    ) {
      return null;
    }

    const leaseHeld =
      job.leaseOwner !== undefined &&
      job.leaseExpiresAt !== undefined &&
      job.leaseExpiresAt.getTime() > request.now.getTime();
    if (leaseHeld) {
      return null;
    }

    const leased: AnalysisJob = {
      ...job,
      leaseOwner: request.owner,
      leaseExpiresAt: request.expiresAt,
      updatedAt: request.now,
    };
    this.jobs.set(request.key, leased);
    return structuredClone(leased);
  }

  async renewLease(request: LeaseRequest): Promise<boolean> {
    const job = this.jobs.get(request.key);
    if (
      !job ||
      job.stage !== request.expectedStage ||
      job.leaseOwner !== request.owner
    ) {
      return false;
    }

    this.jobs.set(request.key, {
      ...job,
      leaseExpiresAt: request.expiresAt,
      updatedAt: request.now,
    });
    return true;
  }

  async commitAdvance(commit: AdvanceCommit): Promise<AnalysisJob | null> {
    const job = this.jobs.get(commit.key);
    if (
      !job ||
      job.stage !== commit.expectedStage ||
      job.leaseOwner !== commit.owner
    ) {
      return null;
    }

    const advanced: AnalysisJob = {
      ...job,
      stage: commit.nextStage,
      artifacts: structuredClone(commit.artifacts),
      stageEnteredAt: commit.now,
      updatedAt: commit.now,
      lastFailure: undefined,
      leaseOwner: undefined,
      leaseExpiresAt: undefined,
    };
    this.jobs.set(commit.key, advanced);
    return structuredClone(advanced);
  }

  async releaseLease(
    key: string,
    owner: string,
    now: Date,
    failure?: StageFailureRecord,
  ): Promise<void> {
    const job = this.jobs.get(key);
    if (!job || job.leaseOwner !== owner) {
      return;
    }

    this.jobs.set(key, {
      ...job,
      leaseOwner: undefined,
      leaseExpiresAt: undefined,
      lastFailure: failure ?? job.lastFailure,
      updatedAt: now,
    });
  }

  async listActive(limit: number): Promise<AnalysisJob[]> {
    return [...this.jobs.values()]
      .filter((job) => job.archivedAt === undefined && !isTerminalStage(job.stage))
      .sort((a, b) => b.updatedAt.getTime() - a.updatedAt.getTime())
      .slice(0, limit)
      .map((job) => structuredClone(job));
  }

  async archive(key: string, now: Date): Promise<void> {
    const job = this.jobs.get(key);
    if (!job || !isTerminalStage(job.stage)) {
      return;
    }

    this.jobs.set(key, { ...job, archivedAt: now, updatedAt: now });
  }
}
