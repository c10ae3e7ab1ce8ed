import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";
import type {
  ClaimEntity,
  EsgCategory,
  SearchHit,
} from "../entities/assessment";

export type ReportRequest = {
  companyCode: string;
  period: string;
};

export type ReportDocument = {
  bytes: Uint8Array;
  contentType: string;
  sourceUrl: string;
};

export type SearchRequest = {
  query: string;
  limit: number;
  signal?: AbortSignal;
};

export type ClaimExtractionRequest = {
  jobKey: string;
  companyCode: string;
  companyName: string;
  industry?: string;
  period: string;
  document: {
    bytes: Uint8Array;
    contentType: string;
  };
  framework: string;
};

export type CrossCheckRequest = {
  jobKey: string;
  companyName: string;
  period: string;
  framework: string;
  claims: Array<Pick<ClaimEntity, "id" | "text" | "category" | "topic">>;
  evidence: Array<{
    id: string;
    claimId: string;
    url: string;
    title?: string;
    snippet: string;
  }>;
};

export type VerificationRequest =
  | { kind: "liveness"; url: string }
  | {
      kind: "repair";
      claimText: string;
      companyName: string;
      period: string;
      excludeDomains: string[];
    };

export type VerificationResponse = {
  liveness: "live" | "dead";
  replacementUrl?: string;
  pageTitle?: string;
};

export type SideArtifactRequest = {
  jobKey: string;
  companyCode: string;
  period: string;
  documentUri: string;
};

/**
 * Downloads the sustainability report for one company and period.
 */
export interface ReportSourcePort {
  fetchReport(
    request: ReportRequest,
  ): Promise<Result<ReportDocument, AppBoundaryError>>;
}

export interface SearchProviderPort {
  search(request: SearchRequest): Promise<Result<SearchHit[], AppBoundaryError>>;
}

/**
 * Opaque scoring model. Returns raw model text; shape validation belongs to the caller.
 */
export interface ScoringOraclePort {
  extractClaims(
    request: ClaimExtractionRequest,
  ): Promise<Result<string, AppBoundaryError>>;
  crossCheck(
    request: CrossCheckRequest,
  ): Promise<Result<string, AppBoundaryError>>;
}

export interface VerificationOraclePort {
  verify(
    request: VerificationRequest,
  ): Promise<Result<VerificationResponse, AppBoundaryError>>;
}

export interface SideArtifactGeneratorPort {
  generate(
    request: SideArtifactRequest,
  ): Promise<Result<{ uri: string }, AppBoundaryError>>;
}

export type ExtractedClaim = {
  text: string;
  page?: number;
  category: EsgCategory;
  topic: string;
  keyword?: string;
  riskIndicator?: number;
};
