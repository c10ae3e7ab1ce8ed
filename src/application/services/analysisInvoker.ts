import { err, ok, type Result } from "neverthrow";
import pLimit from "p-limit";
import type { z } from "zod";
import {
  pipelineError,
  toOracleFailure,
  type AppBoundaryError,
  type PipelineError,
} from "../../core/entities/appError";
import type {
  ClaimExtractionRequest,
  CrossCheckRequest,
  ExtractedClaim,
  ScoringOraclePort,
} from "../../core/ports/inboundPorts";
import { logger } from "../../shared/logger/logger";
import type { CallPolicy } from "../resilience/callPolicy";
import {
  crossCheckOutputSchema,
  extractionOutputSchema,
  parseOracleJson,
  summarizeIssues,
  type CrossCheckItem,
} from "./oracleOutput";

type Limit = ReturnType<typeof pLimit>;

export type AnalysisInvokerOptions = {
  globalConcurrency: number;
  abnormalRatio: number;
};

const noop = () => undefined;

/**
 * Wraps the scoring oracle behind retry, circuit breaking and strict output validation.
 * Calls for one job run one at a time; calls across jobs share a global concurrency budget.
 */
export class AnalysisInvoker {
  private readonly budget: Limit;
  private readonly jobChains = new Map<string, Promise<void>>();

  constructor(
    private readonly oracle: ScoringOraclePort,
    private readonly policy: CallPolicy,
    private readonly options: AnalysisInvokerOptions,
  ) {
    this.budget = pLimit(Math.max(1, Math.floor(options.globalConcurrency)));
  }

  async extractClaims(
    request: ClaimExtractionRequest,
  ): Promise<Result<ExtractedClaim[], PipelineError>> {
    const result = await this.analyze(
      request.jobKey,
      "claim_extraction",
      () => this.oracle.extractClaims(request),
      extractionOutputSchema,
    );

    if (result.isErr()) {
      return result;
    }

    if (result.value.length === 0) {
      return err(
        pipelineError(
          "malformed_output",
          "Oracle returned no claims for the report.",
        ),
      );
    }

    return ok(this.collapseAbnormal(request.jobKey, result.value));
  }

  async crossCheck(
    request: CrossCheckRequest,
  ): Promise<Result<CrossCheckItem[], PipelineError>> {
    return this.analyze(
      request.jobKey,
      "cross_check",
      () => this.oracle.crossCheck(request),
      crossCheckOutputSchema,
    );
  }

  private async analyze<T>(
    jobKey: string,
    operation: string,
    call: () => Promise<Result<string, AppBoundaryError>>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<Result<T, PipelineError>> {
    const response = await this.serialize(jobKey, () =>
      this.budget(() => this.policy.execute(call)),
    );

    if (response.isErr()) {
      logger.warn(
        {
          jobKey,
          operation,
          code: response.error.code,
          provider: response.error.provider,
          circuit: this.policy.circuitState(),
        },
        "Oracle call failed",
      );
      return err(toOracleFailure(response.error));
    }

    const parsed = parseOracleJson(response.value);
    if (parsed.isErr()) {
      return err(pipelineError("malformed_output", parsed.error));
    }

    const validated = schema.safeParse(parsed.value);
    if (!validated.success) {
      return err(
        pipelineError(
          "malformed_output",
          `Oracle ${operation} output failed validation: ${summarizeIssues(validated.error)}`,
        ),
      );
    }

    return ok(validated.data);
  }

  /**
   * Drops repeated (topic, text) pairs when the model loops over the same few topics.
   */
  private collapseAbnormal(
    jobKey: string,
    claims: ExtractedClaim[],
  ): ExtractedClaim[] {
    const uniqueTopics = new Set(
      claims.map((claim) => claim.topic.toLowerCase()),
    ).size;
    if (claims.length <= uniqueTopics * this.options.abnormalRatio) {
      return claims;
    }

    const seen = new Set<string>();
    const collapsed = claims.filter((claim) => {
      const key = `${claim.topic.toLowerCase()}|${claim.text.toLowerCase()}`;
      if (seen.has(key)) {
        return false;
      }
      seen.add(key);
      return true;
    });

    logger.warn(
      {
        jobKey,
        claimCount: claims.length,
        uniqueTopics,
        keptCount: collapsed.length,
      },
      "Abnormal extraction output collapsed",
    );

    return collapsed;
  }

  private serialize<T>(jobKey: string, task: () => Promise<T>): Promise<T> {
    const previous = this.jobChains.get(jobKey) ?? Promise.resolve();
    const run = previous.then(task);
    const tail = run.then(noop, noop);
    this.jobChains.set(jobKey, tail);

    return run.finally(() => {
      if (this.jobChains.get(jobKey) === tail) {
        this.jobChains.delete(jobKey);
      }
    });
  }
}
