import type {
  AnalysisJob,
  AssessmentArtifacts,
  AssessmentBundle,
  AssessmentStage,
  StageFailureRecord,
} from "../entities/assessment";

export type RunPayload = {
  jobKey: string;
  requestedAt: string;
};

export interface QueuePort {
  enqueue(payload: RunPayload): Promise<void>;
}

export type LeaseRequest = {
  key: string;
  expectedStage: AssessmentStage;
  owner: string;
  now: Date;
  expiresAt: Date;
};

export type AdvanceCommit = {
  key: string;
  expectedStage: AssessmentStage;
  owner: string;
  nextStage: AssessmentStage;
  artifacts: AssessmentArtifacts;
  now: Date;
};

/**
 * Durable job progress. Lease and advance are compare-and-swap operations:
 * they return null when the stored row no longer matches the expectation.
 */
export interface CheckpointStorePort {
  load(key: string): Promise<AnalysisJob | null>;
  createIfAbsent(job: AnalysisJob): Promise<AnalysisJob>;
  acquireLease(request: LeaseRequest): Promise<AnalysisJob | null>;
  /** Extends a held lease. False when (key, stage, owner) no longer matches. */
  renewLease(request: LeaseRequest): Promise<boolean>;
  commitAdvance(commit: AdvanceCommit): Promise<AnalysisJob | null>;
  releaseLease(
    key: string,
    owner: string,
    now: Date,
    failure?: StageFailureRecord,
  ): Promise<void>;
  listActive(limit: number): Promise<AnalysisJob[]>;
  archive(key: string, now: Date): Promise<void>;
}

export interface ArtifactStorePort {
  put(
    jobKey: string,
    name: string,
    bytes: Uint8Array,
    contentType: string,
  ): Promise<string>;
  get(uri: string): Promise<Uint8Array>;
}

/**
 * Downstream writer for finalized assessments. Commits are upserts by job key.
 */
export interface AssessmentSinkPort {
  commit(bundle: AssessmentBundle): Promise<void>;
}

export interface ClockPort {
  now(): Date;
}

export interface IdGeneratorPort {
  next(): string;
}
