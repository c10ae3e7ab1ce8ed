import { ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type {
  ClaimExtractionRequest,
  CrossCheckRequest,
  ScoringOraclePort,
} from "../../core/ports/inboundPorts";

const sampleClaims = [
  {
    category: "E",
    topic: "GHG Emissions",
    text: "Scope 1 and 2 emissions fell 12% against the 2020 baseline.",
    keyword: "emissions reduction",
    riskIndicator: 3,
  },
  {
    category: "E",
    topic: "Water & Wastewater Management",
    text: "All production sites recycle more than 85% of process water.",
    keyword: "water recycling",
    riskIndicator: 2,
  },
  {
    category: "S",
    topic: "Employee Health & Safety",
    text: "The lost-time injury rate was 0.12 per million hours worked.",
    keyword: "workplace safety",
    riskIndicator: 3,
  },
  {
    category: "G",
    topic: "Business Ethics",
    text: "We maintain zero tolerance for bribery across the supply chain.",
    keyword: "anti-corruption",
    riskIndicator: 1,
  },
];

/**
 * Deterministic oracle: four claims per report, every second claim contradicted.
 */
export class MockScoringOracle implements ScoringOraclePort {
  async extractClaims(
    request: ClaimExtractionRequest,
  ): Promise<Result<string, AppBoundaryError>> {
    return ok(
      JSON.stringify(
        sampleClaims.map((claim, index) => ({
          ...claim,
          keyword: `${request.companyName} ${claim.keyword}`,
          page: index + 10,
        })),
      ),
    );
  }

  async crossCheck(
    request: CrossCheckRequest,
  ): Promise<Result<string, AppBoundaryError>> {
    return ok(
      JSON.stringify(
        request.claims.map((claim, index) => {
          const contradicted = index % 2 === 1;
          return {
            claimId: claim.id,
            riskScore: contradicted ? 1 : 3,
            verdict: contradicted ? "contradicted" : "supported",
            rationale: contradicted
              ? "News coverage reports an incident that conflicts with the claim."
              : "News coverage is consistent with the claim.",
            evidence: request.evidence
              .filter((item) => item.claimId === claim.id)
              .map((item) => ({
                url: item.url,
                title: item.title,
                snippet: item.snippet,
                stance: contradicted ? "contradicts" : "supports",
              })),
          };
        }),
      ),
    );
  }
}
