import { err, ok, type Result } from "neverthrow";
import {
  pipelineError,
  toErrorDetails,
  type PipelineError,
} from "../../core/entities/appError";
import {
  isTerminalStage,
  nextStage,
  stageIndex,
  type AnalysisJob,
  type AssessmentArtifacts,
  type StageFailureRecord,
} from "../../core/entities/assessment";
import type {
  CheckpointStorePort,
  ClockPort,
  IdGeneratorPort,
} from "../../core/ports/outboundPorts";
import { logger, type Logger } from "../../shared/logger/logger";
import type { AssessmentStageRunner } from "./assessmentStageRunner";

export type StageFailure = {
  job: AnalysisJob;
  error: PipelineError;
};

export type RunOutcome =
  | { status: "completed"; job: AnalysisJob }
  | { status: "failed"; job: AnalysisJob; error: PipelineError }
  | { status: "abandoned"; job: AnalysisJob }
  | { status: "not_found"; key: string };

export type StageOrchestratorOptions = {
  leaseTtlMs: number;
  /** Defaults to a third of the TTL. */
  leaseRenewIntervalMs?: number;
};

/**
 * Single entry point for job progression. A stage's work runs only under a checkpoint lease,
 * and the checkpoint moves forward only by compare-and-swap after the work succeeded.
 */
export class StageOrchestratorService {
  private readonly activeAdvances = new Set<string>();
  private readonly inFlightRuns = new Map<string, Promise<RunOutcome>>();
  private readonly abandoned = new Set<string>();

  constructor(
    private readonly store: CheckpointStorePort,
    private readonly runner: AssessmentStageRunner,
    private readonly clock: ClockPort,
    private readonly ids: IdGeneratorPort,
    private readonly options: StageOrchestratorOptions,
  ) {}

  /**
   * Executes the work of the job's current stage and returns the job at the next stage.
   * On failure the stored checkpoint keeps its stage and the caller gets the job back unchanged.
   */
  async advance(job: AnalysisJob): Promise<Result<AnalysisJob, StageFailure>> {
    if (this.activeAdvances.has(job.key)) {
      return err({
        job,
        error: {
          ...pipelineError(
            "checkpoint_conflict",
            `Job ${job.key} is already advancing in this process.`,
          ),
          stage: job.stage,
        },
      });
    }

    this.activeAdvances.add(job.key);
    try {
      return await this.advanceExclusively(job);
    } finally {
      this.activeAdvances.delete(job.key);
    }
  }

  /**
   * Drives a job to its terminal stage. Concurrent calls for the same key share one run.
   */
  run(key: string): Promise<RunOutcome> {
    const inFlight = this.inFlightRuns.get(key);
    if (inFlight) {
      return inFlight;
    }

    this.abandoned.delete(key);
    const run = this.drive(key).finally(() => {
      this.inFlightRuns.delete(key);
      this.abandoned.delete(key);
    });
    this.inFlightRuns.set(key, run);
    return run;
  }

  /**
   * Stops a running job after its current stage commits. In-flight external calls are left to
   * finish so quota already charged is not lost. Returns false when nothing is running.
   */
  abandon(key: string): boolean {
    if (!this.inFlightRuns.has(key)) {
      return false;
    }

    this.abandoned.add(key);
    return true;
  }

  isRunning(key: string): boolean {
    return this.inFlightRuns.has(key);
  }

  private async drive(key: string): Promise<RunOutcome> {
    let job = await this.store.load(key);
    if (!job) {
      return { status: "not_found", key };
    }

    const log = logger.child({ jobKey: key });
    log.info({ stage: job.stage }, "Assessment run started");

    while (!isTerminalStage(job.stage)) {
      const result = await this.advance(job);
      if (result.isErr()) {
        log.warn(
          {
            stage: result.error.job.stage,
            code: result.error.error.code,
            reason: result.error.error.message,
          },
          "Assessment run halted",
        );
        return {
          status: "failed",
          job: result.error.job,
          error: result.error.error,
        };
      }

      job = result.value;
      if (!isTerminalStage(job.stage) && this.abandoned.has(key)) {
        log.info({ stage: job.stage }, "Assessment run abandoned");
        return { status: "abandoned", job };
      }
    }

    log.info("Assessment run completed");
    return { status: "completed", job };
  }

  private async advanceExclusively(
    job: AnalysisJob,
  ): Promise<Result<AnalysisJob, StageFailure>> {
    const stored = await this.store.load(job.key);
    if (!stored) {
      return err({
        job,
        error: {
          ...pipelineError(
            "checkpoint_conflict",
            `No checkpoint exists for ${job.key}.`,
          ),
          stage: job.stage,
        },
      });
    }

    // A duplicate resume with a stale copy: the work was already done.
    if (
      isTerminalStage(stored.stage) ||
      stageIndex(stored.stage) > stageIndex(job.stage)
    ) {
      return ok(stored);
    }

    const target = nextStage(stored.stage);
    if (!target || stageIndex(stored.stage) < stageIndex(job.stage)) {
      return err(this.conflict(stored, "Checkpoint is behind the caller."));
    }

    const owner = this.ids.next();
    const leaseStart = this.clock.now();
    const leased = await this.store.acquireLease({
      key: stored.key,
      expectedStage: stored.stage,
      owner,
      now: leaseStart,
      expiresAt: new Date(leaseStart.getTime() + this.options.leaseTtlMs),
    });
    if (!leased) {
      return err(
        this.conflict(stored, "Another worker holds the checkpoint lease."),
      );
    }

    const log = logger.child({ jobKey: stored.key, stage: stored.stage });
    const startedAt = Date.now();
    log.info("Stage started");

    const stopRenewal = this.keepLeaseAlive(stored, owner, log);
    const work = await this.runner
      .run(leased)
      .catch((error: unknown) => {
        log.error({ error: toErrorDetails(error) }, "Stage threw");
        return err<AssessmentArtifacts, PipelineError>(
          pipelineError(
            "artifact_error",
            error instanceof Error ? error.message : String(error),
          ),
        );
      })
      .finally(stopRenewal);

    if (work.isErr()) {
      const failure: StageFailureRecord = {
        stage: stored.stage,
        code: work.error.code,
        message: work.error.message,
        retryable: work.error.retryable,
        at: this.clock.now().toISOString(),
      };
      await this.store.releaseLease(stored.key, owner, this.clock.now(), failure);
      log.warn(
        { code: failure.code, durationMs: Date.now() - startedAt },
        "Stage failed; checkpoint unchanged",
      );
      return err({
        job: { ...stored, lastFailure: failure },
        error: { ...work.error, stage: stored.stage },
      });
    }

    const now = this.clock.now();
    const committed = await this.store.commitAdvance({
      key: stored.key,
      expectedStage: stored.stage,
      owner,
      nextStage: target,
      artifacts: work.value,
      now,
    });
    if (!committed) {
      log.warn("Lease lost before commit; stage result discarded");
      return err(this.conflict(stored, "Checkpoint lease expired or was taken."));
    }

    log.info(
      { nextStage: committed.stage, durationMs: Date.now() - startedAt },
      "Stage committed",
    );

    if (isTerminalStage(committed.stage)) {
      await this.store.archive(committed.key, now);
      return ok({ ...committed, archivedAt: now });
    }

    return ok(committed);
  }

  /**
   * Pushes the lease expiry forward while the stage works, so a slow stage is never
   * taken over by another worker. Returns the function that stops the timer.
   */
  private keepLeaseAlive(
    job: AnalysisJob,
    owner: string,
    log: Logger,
  ): () => void {
    const intervalMs =
      this.options.leaseRenewIntervalMs ??
      Math.max(1, Math.floor(this.options.leaseTtlMs / 3));
    let renewing = false;

    const renew = async (): Promise<void> => {
      renewing = true;
      const now = this.clock.now();
      try {
        const renewed = await this.store.renewLease({
          key: job.key,
          expectedStage: job.stage,
          owner,
          now,
          expiresAt: new Date(now.getTime() + this.options.leaseTtlMs),
        });
        if (!renewed) {
          log.warn("Checkpoint lease could not be renewed");
          clearInterval(timer);
        }
      } catch (error) {
        log.warn({ error: toErrorDetails(error) }, "Lease renewal failed");
      } finally {
        renewing = false;
      }
    };

    const timer = setInterval(() => {
      if (!renewing) {
        void renew();
      }
    }, intervalMs);

    return () => clearInterval(timer);
  }

  private conflict(job: AnalysisJob, message: string): StageFailure {
    return {
      job,
      error: {
        ...pipelineError("checkpoint_conflict", `${job.key}: ${message}`),
        stage: job.stage,
      },
    };
  }
}
