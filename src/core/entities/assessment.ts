/**
 * Ordered pipeline stages. Index order is the execution order; `persisted` is terminal.
 */
export const assessmentStages = [
  "fetching",
  "claim_extraction",
  "news_cross_check",
  "external_verification",
  "source_validation",
  "persisted",
] as const;

export type AssessmentStage = (typeof assessmentStages)[number];

export const isAssessmentStage = (value: string): value is AssessmentStage =>
  assessmentStages.some((stage) => stage === value);

export const TERMINAL_STAGE: AssessmentStage = "persisted";

export const stageIndex = (stage: AssessmentStage): number =>
  assessmentStages.indexOf(stage);

/**
 * Returns the successor stage, or null when the stage is terminal.
 */
export const nextStage = (stage: AssessmentStage): AssessmentStage | null =>
  assessmentStages[stageIndex(stage) + 1] ?? null;

export const isTerminalStage = (stage: AssessmentStage): boolean =>
  stage === TERMINAL_STAGE;

export type EsgCategory = "E" | "S" | "G";

export type ClaimVerdict =
  | "supported"
  | "contradicted"
  | "inconclusive"
  | "unverified";

export type ClaimEntity = {
  id: string;
  text: string;
  page?: number;
  category: EsgCategory;
  topic: string;
  keyword?: string;
  initialRisk?: number;
  riskScore?: number;
  verdict: ClaimVerdict;
  rationale?: string;
  evidenceIds: string[];
};

export type EvidenceLiveness = "live" | "dead" | "unchecked";

export type EvidenceStance = "supports" | "contradicts" | "neutral";

export type EvidenceEntity = {
  id: string;
  claimId: string;
  url: string;
  title?: string;
  snippet: string;
  origin: "news" | "oracle" | "repair";
  stance: EvidenceStance;
  liveness: EvidenceLiveness;
  publishedAt?: string;
  repairedFrom?: string;
};

export type SearchHit = {
  title: string;
  url: string;
  snippet: string;
  publishedAt?: string;
};

export type QueryTierKind = "exact_phrase" | "industry_keyword" | "company_name";

export type FallbackQueryTier = {
  tier: number;
  kind: QueryTierKind;
  query: string;
};

export type SearchTopic = {
  id: string;
  phrase: string;
  keyword?: string;
  industry?: string;
  companyName: string;
};

export type TopicOutcome =
  | {
      status: "resolved";
      topicId: string;
      tier: number;
      query: string;
      hits: SearchHit[];
    }
  | {
      status: "no_evidence";
      topicId: string;
      queriesTried: string[];
    }
  | {
      status: "fetch_error";
      topicId: string;
      reason: string;
      queriesTried: string[];
    };

export type DocumentRef = {
  uri: string;
  contentType: string;
  byteLength: number;
  sourceUrl: string;
};

export type StageFailureRecord = {
  stage: AssessmentStage;
  code: string;
  message: string;
  retryable: boolean;
  at: string;
};

export type AssessmentArtifacts = {
  document?: DocumentRef;
  claims?: ClaimEntity[];
  topicOutcomes?: TopicOutcome[];
  evidence?: EvidenceEntity[];
  sideArtifactUri?: string;
  bundleCommittedAt?: string;
};

/**
 * One (company, reporting period) unit of work and its durable progress.
 */
export type AnalysisJob = {
  key: string;
  companyCode: string;
  companyName: string;
  industry?: string;
  companyDomains: string[];
  period: string;
  stage: AssessmentStage;
  artifacts: AssessmentArtifacts;
  createdAt: Date;
  updatedAt: Date;
  stageEnteredAt: Date;
  lastFailure?: StageFailureRecord;
  leaseOwner?: string;
  leaseExpiresAt?: Date;
  archivedAt?: Date;
};

export type AssessmentRequest = {
  companyCode: string;
  companyName: string;
  period: string;
  industry?: string;
  companyDomains?: string[];
};

/**
 * Finalized handoff for the downstream writer once the job is persisted.
 */
export type AssessmentBundle = {
  jobKey: string;
  companyCode: string;
  companyName: string;
  industry?: string;
  period: string;
  claims: ClaimEntity[];
  evidence: EvidenceEntity[];
  sideArtifactUri?: string;
  topicSummary: {
    resolved: number;
    noEvidence: number;
    fetchErrors: number;
  };
  committedAt: Date;
};

/**
 * Job keys use hyphens because BullMQ custom job ids cannot contain colons.
 */
export const buildJobKey = (companyCode: string, period: string): string =>
  `${companyCode.trim().toUpperCase()}-${period.trim()}`;
