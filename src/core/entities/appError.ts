import type { AssessmentStage } from "./assessment";

/**
 * Describes canonical error categories used at clean-architecture boundaries.
 */
export type AppBoundaryErrorCode =
  | "timeout"
  | "rate_limited"
  | "not_found"
  | "auth_invalid"
  | "config_invalid"
  | "provider_error"
  | "transport_error"
  | "malformed_response"
  | "invalid_json"
  | "validation_error"
  | "circuit_open";

export type AppBoundarySource =
  | "report"
  | "search"
  | "oracle"
  | "verification"
  | "side_artifact"
  | "artifact_store"
  | "checkpoint"
  | "sink";

/**
 * Describes a normalized boundary failure while preserving adapter/provider provenance.
 */
export type AppBoundaryError = {
  source: AppBoundarySource;
  code: AppBoundaryErrorCode;
  provider: string;
  message: string;
  retryable: boolean;
  httpStatus?: number;
  cause?: unknown;
};

/**
 * Pipeline-level taxonomy surfaced by stages and the orchestrator.
 */
export type PipelineErrorCode =
  | "fetch_error"
  | "rate_limited"
  | "oracle_unavailable"
  | "malformed_output"
  | "checkpoint_conflict"
  | "validation_repair_failed"
  | "report_not_found"
  | "artifact_error";

export type PipelineError = {
  code: PipelineErrorCode;
  message: string;
  retryable: boolean;
  stage?: AssessmentStage;
  cause?: AppBoundaryError;
};

export const pipelineError = (
  code: PipelineErrorCode,
  message: string,
  cause?: AppBoundaryError,
): PipelineError => ({
  code,
  message,
  retryable: code !== "malformed_output" && code !== "report_not_found",
  cause,
});

/**
 * Maps a boundary failure from an oracle-like dependency onto the pipeline taxonomy.
 */
export const toOracleFailure = (error: AppBoundaryError): PipelineError => {
  switch (error.code) {
    case "rate_limited":
      return pipelineError("rate_limited", error.message, error);
    case "malformed_response":
    case "invalid_json":
    case "validation_error":
      return pipelineError("malformed_output", error.message, error);
    case "circuit_open":
    case "timeout":
    case "transport_error":
    case "provider_error":
    case "auth_invalid":
    case "config_invalid":
    case "not_found":
    default:
      return pipelineError("oracle_unavailable", error.message, error);
  }
};

export const toErrorDetails = (error: unknown) => {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return { message: String(error) };
};
