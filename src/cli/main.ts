import { Command } from "commander";
import { createRuntime } from "../application/bootstrap/runtimeFactory";
import {
  AssessmentRequestService,
  describeJob,
  stageLabels,
} from "../application/services/assessmentRequestService";
import type { RunOutcome } from "../application/services/stageOrchestratorService";
import {
  buildJobKey,
  type AnalysisJob,
  type AssessmentRequest,
} from "../core/entities/assessment";
import { BullMqQueue } from "../infra/queue/bullMqQueue";
import { redisConfigFromUrl } from "../infra/queue/redisConnection";
import { InProcessQueue } from "../infra/memory/inProcessQueue";
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

type RequestOptions = {
  company: string;
  name: string;
  period: string;
  industry?: string;
  domain?: string[];
};

const collect = (value: string, previous: string[] = []): string[] => [
  ...previous,
  value,
];

const toRequest = (opts: RequestOptions): AssessmentRequest => ({
  companyCode: opts.company,
  companyName: opts.name,
  period: opts.period,
  industry: opts.industry,
  companyDomains: opts.domain ?? [],
});

/**
 * Formats a finished job into a compact terminal report.
 */
export const formatJobReport = (job: AnalysisJob): string => {
  const lines: string[] = [];
  const claims = job.artifacts.claims ?? [];
  const evidence = job.artifacts.evidence ?? [];

  lines.push(`Assessment ${job.key} (${job.companyName})`);
  lines.push(`Stage: ${stageLabels[job.stage]}`);
  if (job.lastFailure) {
    lines.push(
      `Last failure: ${job.lastFailure.code} at ${job.lastFailure.stage}: ${job.lastFailure.message}`,
    );
  }
  lines.push("");
  lines.push("Claims:");
  if (claims.length === 0) {
    lines.push("- none");
  }

  claims.forEach((claim) => {
    const score = claim.riskScore ?? claim.initialRisk;
    lines.push(
      `- [${claim.category}] ${claim.topic}: ${claim.verdict}${score === undefined ? "" : ` (risk ${score})`}`,
    );
    lines.push(`  ${claim.text}`);
    evidence
      .filter((item) => claim.evidenceIds.includes(item.id))
      .forEach((item) => {
        lines.push(`  ${item.stance} ${item.url}`);
      });
  });

  if (job.artifacts.sideArtifactUri) {
    lines.push("");
    lines.push(`Word cloud: ${job.artifacts.sideArtifactUri}`);
  }

  return lines.join("\n");
};

const logOutcome = (outcome: RunOutcome): void => {
  if (outcome.status === "not_found") {
    logger.warn({ jobKey: outcome.key }, "Assessment not found");
    return;
  }

  if (outcome.status === "failed") {
    logger.error(
      {
        jobKey: outcome.job.key,
        stage: outcome.job.stage,
        code: outcome.error.code,
        retryable: outcome.error.retryable,
      },
      outcome.error.message,
    );
  }

  console.log(formatJobReport(outcome.job));
};

/**
 * Defines a single command surface so operational tasks use the same orchestration policies.
 */
export const buildCli = () => {
  const cli = new Command();
  cli.name("greenscreen").description("Greenwashing risk assessment CLI");

  const withRequestOptions = (command: Command) =>
    command
      .requiredOption("--company <code>", "Company code, e.g. 1101")
      .requiredOption("--name <name>", "Company name")
      .requiredOption("--period <period>", "Reporting period, e.g. 2024")
      .option("--industry <industry>", "Industry used for fallback queries")
      .option(
        "--domain <domain>",
        "Company-owned domain excluded from evidence (repeatable)",
        collect,
      );

  withRequestOptions(
    cli
      .command("request")
      .description("Record the assessment and enqueue it for the worker"),
  ).action(async (opts: RequestOptions) => {
    const runtime = await createRuntime();
    if (checkpointStore() === "memory") {
      logger.warn(
        "CHECKPOINT_STORE=memory: the worker will not see this checkpoint. Use postgres.",
      );
    }

    const queue = new BullMqQueue(redisConfigFromUrl(env.REDIS_URL));
    try {
      const service = new AssessmentRequestService(
        runtime.store,
        queue,
        runtime.clock,
      );
      const outcome = await service.request(toRequest(opts));
      logger.info(
        {
          jobKey: outcome.job.key,
          status: outcome.status,
          stage: outcome.job.stage,
        },
        "Assessment request handled",
      );
    } finally {
      await queue.close();
      await runtime.close();
    }
  });

  withRequestOptions(
    cli
      .command("run")
      .description("Run the assessment to completion in this process"),
  ).action(async (opts: RequestOptions) => {
    const runtime = await createRuntime();
    const queue = new InProcessQueue(runtime.orchestrator);
    try {
      const service = new AssessmentRequestService(
        runtime.store,
        queue,
        runtime.clock,
      );
      const outcome = await service.request(toRequest(opts));
      if (outcome.status === "completed" || outcome.status === "in_progress") {
        console.log(describeJob(outcome.job, runtime.clock.now()).message);
        return;
      }

      const [runOutcome] = await queue.drain();
      if (runOutcome) {
        logOutcome(runOutcome);
        if (runOutcome.status === "failed") {
          process.exitCode = 1;
        }
      }
    } finally {
      await runtime.close();
    }
  });

  cli
    .command("status")
    .description("Show one assessment, or runtime configuration and queue counts")
    .option("--company <code>", "Company code")
    .option("--period <period>", "Reporting period")
    .action(async (opts: { company?: string; period?: string }) => {
      const runtime = await createRuntime();
      try {
        if (opts.company && opts.period) {
          const key = buildJobKey(opts.company, opts.period);
          const job = await runtime.store.load(key);
          if (!job) {
            logger.info({ jobKey: key }, "No assessment on record");
            return;
          }

          const view = describeJob(job, runtime.clock.now());
          logger.info({ ...view }, view.message);
          if (view.state === "completed" || view.state === "needs_attention") {
            console.log(formatJobReport(job));
          }
          return;
        }

        const queue = new BullMqQueue(redisConfigFromUrl(env.REDIS_URL));
        const queueCounts = await queue.getQueueCounts();
        await queue.close();

        logger.info(
          {
            reportSource: reportSource(),
            searchProvider: searchProvider(),
            oracleProvider: oracleProvider(),
            verificationProvider: verificationProvider(),
            sideArtifactProvider: sideArtifactProvider(),
            checkpointStore: checkpointStore(),
            framework: env.ESG_FRAMEWORK,
            redis: env.REDIS_URL,
            postgres: env.POSTGRES_URL,
            queueCounts,
          },
          "Runtime status",
        );
      } finally {
        await runtime.close();
      }
    });

  cli
    .command("list")
    .description("List assessments that have not reached the terminal stage")
    .option("--limit <n>", "Maximum rows", "20")
    .action(async (opts: { limit: string }) => {
      const runtime = await createRuntime();
      try {
        const limit = Math.max(1, Number.parseInt(opts.limit, 10) || 20);
        const jobs = await runtime.store.listActive(limit);
        const now = runtime.clock.now();
        if (jobs.length === 0) {
          console.log("No active assessments.");
          return;
        }

        jobs.forEach((job) => {
          const view = describeJob(job, now);
          console.log(`${job.key}\t${view.state}\t${view.message}`);
        });
      } finally {
        await runtime.close();
      }
    });

  return cli;
};

/**
 * Keeps process bootstrap thin by delegating argument parsing and command routing to one entry point.
 */
export const runCli = async (argv: string[]): Promise<void> => {
  const cli = buildCli();
  await cli.parseAsync(argv);
};
