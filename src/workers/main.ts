import { createRuntime } from "../application/bootstrap/runtimeFactory";
import { toErrorDetails } from "../core/entities/appError";
import { createRunWorker } from "../infra/queue/bullMqQueue";
import { redisConfigFromUrl } from "../infra/queue/redisConnection";
import {
  checkpointStore,
  env,
  oracleProvider,
  reportSource,
  searchProvider,
  sideArtifactProvider,
  verificationProvider,
} from "../shared/config/env";
import { logger } from "../shared/logger/logger";

const run = async (): Promise<void> => {
  const runtime = await createRuntime();
  const redis = redisConfigFromUrl(env.REDIS_URL);
  const startedAtByJobId = new Map<string, number>();
  const jobKeyByJobId = new Map<string, string>();

  logger.info(
    {
      reportSource: reportSource(),
      searchProvider: searchProvider(),
      oracleProvider: oracleProvider(),
      verificationProvider: verificationProvider(),
      sideArtifactProvider: sideArtifactProvider(),
      checkpointStore: checkpointStore(),
      perplexityApiKeyConfigured: env.PERPLEXITY_API_KEY.trim().length > 0,
      geminiApiKeyConfigured: env.GEMINI_API_KEY.trim().length > 0,
      redisUrl: env.REDIS_URL,
      postgresUrl: env.POSTGRES_URL,
    },
    "Worker runtime configuration",
  );

  if (checkpointStore() === "memory") {
    logger.warn(
      "CHECKPOINT_STORE=memory: jobs requested from another process are not visible here.",
    );
  }

  const worker = createRunWorker(
    redis,
    env.QUEUE_CONCURRENCY_RUN,
    async (payload) => {
      const outcome = await runtime.orchestrator.run(payload.jobKey);

      if (outcome.status === "failed") {
        if (outcome.error.retryable) {
          // Let BullMQ schedule the retry; the checkpoint resumes at the failed stage.
          throw new Error(
            `${outcome.error.code} at ${outcome.job.stage}: ${outcome.error.message}`,
          );
        }

        logger.error(
          {
            jobKey: payload.jobKey,
            stage: outcome.job.stage,
            code: outcome.error.code,
          },
          "Assessment needs attention",
        );
        return;
      }

      if (outcome.status === "abandoned") {
        throw new Error(
          `Assessment ${payload.jobKey} stopped at ${outcome.job.stage} during shutdown.`,
        );
      }

      if (outcome.status === "not_found") {
        logger.warn({ jobKey: payload.jobKey }, "Queued assessment has no checkpoint");
      }
    },
  );

  worker.on("active", (job) => {
    if (!job.id) {
      return;
    }

    startedAtByJobId.set(job.id, Date.now());
    jobKeyByJobId.set(job.id, job.data.jobKey);
    logger.info(
      { jobId: job.id, jobKey: job.data.jobKey, attempt: job.attemptsMade + 1 },
      "Worker job started",
    );
  });

  worker.on("failed", (job, error) => {
    const startedAt = job?.id ? startedAtByJobId.get(job.id) : undefined;
    const durationMs = startedAt ? Date.now() - startedAt : undefined;

    if (job?.id) {
      startedAtByJobId.delete(job.id);
      jobKeyByJobId.delete(job.id);
    }

    logger.error(
      {
        jobId: job?.id,
        jobKey: job?.data.jobKey,
        attemptsMade: job?.attemptsMade,
        durationMs,
        error: toErrorDetails(error),
      },
      "Worker job failed",
    );
  });

  worker.on("completed", (job) => {
    const startedAt = job.id ? startedAtByJobId.get(job.id) : undefined;
    const durationMs = startedAt ? Date.now() - startedAt : undefined;

    if (job.id) {
      startedAtByJobId.delete(job.id);
      jobKeyByJobId.delete(job.id);
    }

    logger.info(
      { jobId: job.id, jobKey: job.data.jobKey, durationMs },
      "Worker job completed",
    );
  });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Worker shutting down");
    // Running jobs stop after their current stage commits.
    jobKeyByJobId.forEach((jobKey) => {
      runtime.orchestrator.abandon(jobKey);
    });

    await worker.close();
    await runtime.close();
    process.exit(0);
  };

  ["SIGINT", "SIGTERM"].forEach((signal) => {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error({ error: toErrorDetails(error) }, "Worker shutdown failed");
        process.exit(1);
      });
    });
  });

  logger.info("Worker online");
};

run().catch((error: unknown) => {
  logger.error({ error: toErrorDetails(error) }, "Worker bootstrap failed");
  process.exit(1);
});
