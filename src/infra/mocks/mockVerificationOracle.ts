import { ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type {
  VerificationOraclePort,
  VerificationRequest,
  VerificationResponse,
} from "../../core/ports/inboundPorts";

/**
 * Every URL is live; repair requests get a stable third-party replacement.
 */
export class MockVerificationOracle implements VerificationOraclePort {
  async verify(
    request: VerificationRequest,
  ): Promise<Result<VerificationResponse, AppBoundaryError>> {
    if (request.kind === "liveness") {
      return ok({ liveness: "live", pageTitle: "Mock evidence page" });
    }

    return ok({
      liveness: "dead",
      replacementUrl: `https://archive.example.local/${encodeURIComponent(request.companyName)}/${request.period}`,
      pageTitle: "Archived coverage",
    });
  }
}
