import { err, ok, type Result } from "neverthrow";
import {
  pipelineError,
  type PipelineError,
} from "../../core/entities/appError";
import type {
  AnalysisJob,
  AssessmentArtifacts,
  AssessmentBundle,
  ClaimEntity,
  DocumentRef,
  EvidenceEntity,
  SearchTopic,
  TopicOutcome,
} from "../../core/entities/assessment";
import type {
  ExtractedClaim,
  ReportSourcePort,
  SideArtifactGeneratorPort,
} from "../../core/ports/inboundPorts";
import type {
  ArtifactStorePort,
  AssessmentSinkPort,
  ClockPort,
} from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";
import type { CallPolicy } from "../resilience/callPolicy";
import type { AnalysisInvoker } from "./analysisInvoker";
import type { ConcurrentFetchCoordinator } from "./concurrentFetchCoordinator";
import type { EvidenceValidator } from "./evidenceValidator";

export type StageRunnerDependencies = {
  reportSource: ReportSourcePort;
  reportPolicy: CallPolicy;
  artifactStore: ArtifactStorePort;
  sideArtifacts: SideArtifactGeneratorPort;
  sideArtifactPolicy: CallPolicy;
  invoker: AnalysisInvoker;
  fetchCoordinator: ConcurrentFetchCoordinator;
  evidenceValidator: EvidenceValidator;
  sink: AssessmentSinkPort;
  clock: ClockPort;
};

export type StageRunnerOptions = {
  framework: string;
};

type StageResult = Result<AssessmentArtifacts, PipelineError>;

const normalizeUrl = (url: string): string =>
  url.trim().replace(/\/+$/, "").toLowerCase();

/**
 * Performs the work of exactly one stage and returns the artifacts the next checkpoint should hold.
 * Nothing here writes the checkpoint; ids are derived from the job key so a re-run of a stage
 * yields the same entities.
 */
export class AssessmentStageRunner {
  constructor(
    private readonly deps: StageRunnerDependencies,
    private readonly options: StageRunnerOptions,
  ) {}

  async run(job: AnalysisJob): Promise<StageResult> {
    switch (job.stage) {
      case "fetching":
        return this.fetchReport(job);
      case "claim_extraction":
        return this.extractClaims(job);
      case "news_cross_check":
        return this.crossCheckNews(job);
      case "external_verification":
        return this.verifyExternally(job);
      case "source_validation":
        return this.validateSources(job);
      case "persisted":
        return ok(job.artifacts);
    }
  }

  private async fetchReport(job: AnalysisJob): Promise<StageResult> {
    const report = await this.deps.reportPolicy.execute(() =>
      this.deps.reportSource.fetchReport({
        companyCode: job.companyCode,
        period: job.period,
      }),
    );

    if (report.isErr()) {
      return err(
        report.error.code === "not_found"
          ? pipelineError(
              "report_not_found",
              `No sustainability report for ${job.companyCode} ${job.period}.`,
              report.error,
            )
          : pipelineError("fetch_error", report.error.message, report.error),
      );
    }

    const uri = await this.deps.artifactStore.put(
      job.key,
      "report",
      report.value.bytes,
      report.value.contentType,
    );

    const document: DocumentRef = {
      uri,
      contentType: report.value.contentType,
      byteLength: report.value.bytes.byteLength,
      sourceUrl: report.value.sourceUrl,
    };

    return ok({ ...job.artifacts, document });
  }

  /**
   * Claim extraction and the side artifact are siblings joined by a barrier. Only the
   * extraction branch can fail the stage.
   */
  private async extractClaims(job: AnalysisJob): Promise<StageResult> {
    const document = job.artifacts.document;
    if (!document) {
      return err(
        pipelineError("artifact_error", "Report document reference missing."),
      );
    }

    const bytes = await this.deps.artifactStore.get(document.uri);

    const [extraction, sideArtifactUri] = await Promise.all([
      this.deps.invoker.extractClaims({
        jobKey: job.key,
        companyCode: job.companyCode,
        companyName: job.companyName,
        industry: job.industry,
        period: job.period,
        document: { bytes, contentType: document.contentType },
        framework: this.options.framework,
      }),
      this.generateSideArtifact(job, document),
    ]);

    if (extraction.isErr()) {
      return err(extraction.error);
    }

    return ok({
      ...job.artifacts,
      claims: extraction.value.map((claim, index) =>
        this.toClaimEntity(job, claim, index),
      ),
      sideArtifactUri: sideArtifactUri ?? job.artifacts.sideArtifactUri,
    });
  }

  private async crossCheckNews(job: AnalysisJob): Promise<StageResult> {
    const claims = job.artifacts.claims ?? [];
    const topics: SearchTopic[] = claims.map((claim) => ({
      id: claim.id,
      phrase: claim.text,
      keyword: claim.keyword ?? claim.topic,
      industry: job.industry,
      companyName: job.companyName,
    }));

    const outcomes = await this.deps.fetchCoordinator.fetchAll(topics);

    const evidence: EvidenceEntity[] = [];
    const updatedClaims = claims.map((claim) => {
      const outcome = outcomes.get(claim.id);
      const topHit = outcome?.status === "resolved" ? outcome.hits[0] : undefined;
      if (!topHit) {
        return { ...claim, evidenceIds: [] };
      }

      const item: EvidenceEntity = {
        id: `${claim.id}-e1`,
        claimId: claim.id,
        url: topHit.url,
        title: topHit.title,
        snippet: topHit.snippet,
        origin: "news",
        stance: "neutral",
        liveness: "unchecked",
        publishedAt: topHit.publishedAt,
      };
      evidence.push(item);
      return { ...claim, evidenceIds: [item.id] };
    });

    const topicOutcomes = claims
      .map((claim) => outcomes.get(claim.id))
      .filter((outcome): outcome is TopicOutcome => outcome !== undefined);

    logger.info(
      {
        jobKey: job.key,
        topics: topics.length,
        resolved: topicOutcomes.filter((o) => o.status === "resolved").length,
        noEvidence: topicOutcomes.filter((o) => o.status === "no_evidence")
          .length,
        fetchErrors: topicOutcomes.filter((o) => o.status === "fetch_error")
          .length,
      },
      "News cross-check collected",
    );

    return ok({
      ...job.artifacts,
      claims: updatedClaims,
      topicOutcomes,
      evidence,
    });
  }

  /**
   * Sends only claims that have evidence; topics without evidence are not cross-checked.
   */
  private async verifyExternally(job: AnalysisJob): Promise<StageResult> {
    const claims = job.artifacts.claims ?? [];
    const evidence = job.artifacts.evidence ?? [];
    const checkable = claims.filter((claim) => claim.evidenceIds.length > 0);

    if (checkable.length === 0) {
      return ok(job.artifacts);
    }

    const verdicts = await this.deps.invoker.crossCheck({
      jobKey: job.key,
      companyName: job.companyName,
      period: job.period,
      framework: this.options.framework,
      claims: checkable.map(({ id, text, category, topic }) => ({
        id,
        text,
        category,
        topic,
      })),
      evidence: evidence.map(({ id, claimId, url, title, snippet }) => ({
        id,
        claimId,
        url,
        title,
        snippet,
      })),
    });

    if (verdicts.isErr()) {
      return err(verdicts.error);
    }

    const nextEvidence = [...evidence];
    const nextClaims: ClaimEntity[] = claims.map((claim) => {
      const verdict = verdicts.value.find((item) => item.claimId === claim.id);
      if (!verdict) {
        return claim;
      }

      const evidenceIds = [...claim.evidenceIds];
      verdict.evidence.forEach((reference) => {
        const existingIndex = nextEvidence.findIndex(
          (item) =>
            item.claimId === claim.id &&
            normalizeUrl(item.url) === normalizeUrl(reference.url),
        );
        const existing = nextEvidence[existingIndex];

        if (existing) {
          nextEvidence[existingIndex] = {
            ...existing,
            stance: reference.stance,
            title: existing.title ?? reference.title,
            snippet: existing.snippet || reference.snippet,
          };
          return;
        }

        const id = `${claim.id}-e${evidenceIds.length + 1}`;
        evidenceIds.push(id);
        nextEvidence.push({
          id,
          claimId: claim.id,
          url: reference.url,
          title: reference.title,
          snippet: reference.snippet,
          origin: "oracle",
          stance: reference.stance,
          liveness: "unchecked",
        });
      });

      return {
        ...claim,
        riskScore: verdict.riskScore,
        verdict: verdict.verdict,
        rationale: verdict.rationale,
        evidenceIds,
      };
    });

    const contradictions = nextClaims.filter(
      (claim) => claim.verdict === "contradicted",
    ).length;
    logger.info(
      { jobKey: job.key, checked: checkable.length, contradictions },
      "External verification applied",
    );

    return ok({
      ...job.artifacts,
      claims: nextClaims,
      evidence: nextEvidence,
    });
  }

  /**
   * Validates evidence, retries a missing side artifact once, and hands the bundle downstream.
   * The handoff is an upsert by job key, so re-running this stage after a crash is harmless.
   */
  private async validateSources(job: AnalysisJob): Promise<StageResult> {
    const { evidence } = await this.deps.evidenceValidator.validate(
      job.artifacts.evidence ?? [],
      {
        companyName: job.companyName,
        period: job.period,
        domains: job.companyDomains,
      },
    );

    const keptIds = new Set(evidence.map((item) => item.id));
    const claims = (job.artifacts.claims ?? []).map((claim) => ({
      ...claim,
      evidenceIds: claim.evidenceIds.filter((id) => keptIds.has(id)),
    }));

    let sideArtifactUri = job.artifacts.sideArtifactUri;
    if (!sideArtifactUri && job.artifacts.document) {
      sideArtifactUri = await this.generateSideArtifact(
        job,
        job.artifacts.document,
      );
    }

    const committedAt = this.deps.clock.now();
    const outcomes = job.artifacts.topicOutcomes ?? [];
    const bundle: AssessmentBundle = {
      jobKey: job.key,
      companyCode: job.companyCode,
      companyName: job.companyName,
      industry: job.industry,
      period: job.period,
      claims,
      evidence,
      sideArtifactUri,
      topicSummary: {
        resolved: outcomes.filter((o) => o.status === "resolved").length,
        noEvidence: outcomes.filter((o) => o.status === "no_evidence").length,
        fetchErrors: outcomes.filter((o) => o.status === "fetch_error").length,
      },
      committedAt,
    };

    await this.deps.sink.commit(bundle);

    return ok({
      ...job.artifacts,
      claims,
      evidence,
      sideArtifactUri,
      bundleCommittedAt: committedAt.toISOString(),
    });
  }

  /**
   * Side artifact failures never fail a stage; the artifact is retried at source validation.
   */
  private async generateSideArtifact(
    job: AnalysisJob,
    document: DocumentRef,
  ): Promise<string | undefined> {
    const result = await this.deps.sideArtifactPolicy.execute(() =>
      this.deps.sideArtifacts.generate({
        jobKey: job.key,
        companyCode: job.companyCode,
        period: job.period,
        documentUri: document.uri,
      }),
    );

    if (result.isErr()) {
      logger.warn(
        { jobKey: job.key, code: result.error.code, reason: result.error.message },
        "Side artifact generation failed; will retry later",
      );
      return undefined;
    }

    return result.value.uri;
  }

  private toClaimEntity(
    job: AnalysisJob,
    claim: ExtractedClaim,
    index: number,
  ): ClaimEntity {
    return {
      id: `${job.key}-c${index + 1}`,
      text: claim.text,
      page: claim.page,
      category: claim.category,
      topic: claim.topic,
      keyword: claim.keyword,
      initialRisk: claim.riskIndicator,
      verdict: "unverified",
      evidenceIds: [],
    };
  }
}
