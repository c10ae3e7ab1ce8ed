import { AnalysisInvoker } from "../services/analysisInvoker";
import { AssessmentStageRunner } from "../services/assessmentStageRunner";
import { ConcurrentFetchCoordinator } from "../services/concurrentFetchCoordinator";
import { EvidenceValidator } from "../services/evidenceValidator";
import { FallbackQueryPlanner } from "../services/fallbackQueryPlanner";
import { StageOrchestratorService } from "../services/stageOrchestratorService";
import { CallPolicy } from "../resilience/callPolicy";
import {
  checkpointStore,
  env,
  missingCredentials,
  oracleProvider,
  reportSource,
  searchProvider,
  sideArtifactProvider,
  verificationProvider,
} from "../../shared/config/env";
import { createDb } from "../../infra/db/client";
import {
  PostgresAssessmentSink,
  PostgresCheckpointStore,
} from "../../infra/db/repositories";
import { InMemoryAssessmentSink } from "../../infra/memory/inMemoryAssessmentSink";
import { InMemoryCheckpointStore } from "../../infra/memory/inMemoryCheckpointStore";
import { MockReportSource } from "../../infra/mocks/mockReportSource";
import { MockScoringOracle } from "../../infra/mocks/mockScoringOracle";
import { MockSearchProvider } from "../../infra/mocks/mockSearchProvider";
import { MockSideArtifactGenerator } from "../../infra/mocks/mockSideArtifactGenerator";
import { MockVerificationOracle } from "../../infra/mocks/mockVerificationOracle";
import { GeminiScoringOracle } from "../../infra/oracle/geminiScoringOracle";
import { HttpReportSource } from "../../infra/report/httpReportSource";
import { PerplexitySearchProvider } from "../../infra/search/perplexitySearchProvider";
import { HttpSideArtifactGenerator } from "../../infra/sideArtifact/httpSideArtifactGenerator";
import { FileArtifactStore } from "../../infra/storage/fileArtifactStore";
import { SystemClock, UuidIdGenerator } from "../../infra/system/systemPorts";
import { HttpVerificationOracle } from "../../infra/verification/httpVerificationOracle";
import type {
  ReportSourcePort,
  ScoringOraclePort,
  SearchProviderPort,
  SideArtifactGeneratorPort,
  VerificationOraclePort,
} from "../../core/ports/inboundPorts";
import type {
  ArtifactStorePort,
  AssessmentSinkPort,
  CheckpointStorePort,
  ClockPort,
} from "../../core/ports/outboundPorts";

const createReportSource = (): ReportSourcePort => {
  if (reportSource() === "http") {
    return new HttpReportSource({
      urlTemplate: env.REPORT_URL_TEMPLATE,
      timeoutMs: env.REPORT_TIMEOUT_MS,
    });
  }

  return new MockReportSource();
};

const createSearchProvider = (): SearchProviderPort => {
  if (searchProvider() === "perplexity") {
    return new PerplexitySearchProvider({
      baseUrl: env.PERPLEXITY_BASE_URL,
      apiKey: env.PERPLEXITY_API_KEY,
      timeoutMs: env.PERPLEXITY_TIMEOUT_MS,
    });
  }

  return new MockSearchProvider();
};

const createScoringOracle = (): ScoringOraclePort => {
  if (oracleProvider() === "gemini") {
    return new GeminiScoringOracle({
      baseUrl: env.GEMINI_BASE_URL,
      apiKey: env.GEMINI_API_KEY,
      model: env.GEMINI_MODEL,
      temperature: env.GEMINI_TEMPERATURE,
      timeoutMs: env.ORACLE_TIMEOUT_MS,
    });
  }

  return new MockScoringOracle();
};

const createVerificationOracle = (): VerificationOraclePort => {
  if (verificationProvider() === "http") {
    return new HttpVerificationOracle({
      perplexityBaseUrl: env.PERPLEXITY_BASE_URL,
      perplexityApiKey: env.PERPLEXITY_API_KEY,
      perplexityModel: env.PERPLEXITY_MODEL,
      timeoutMs: env.VERIFICATION_TIMEOUT_MS,
    });
  }

  return new MockVerificationOracle();
};

const createSideArtifactGenerator = (
  artifactStore: ArtifactStorePort,
): SideArtifactGeneratorPort => {
  if (sideArtifactProvider() === "http") {
    return new HttpSideArtifactGenerator(
      { url: env.SIDE_ARTIFACT_URL, timeoutMs: env.SIDE_ARTIFACT_TIMEOUT_MS },
      artifactStore,
    );
  }

  return new MockSideArtifactGenerator(artifactStore);
};

type Persistence = {
  store: CheckpointStorePort;
  sink: AssessmentSinkPort;
  close: () => Promise<void>;
};

const createPersistence = (): Persistence => {
  if (checkpointStore() === "postgres") {
    const { db, close } = createDb(env.POSTGRES_URL, {
      maxConnections: env.POSTGRES_POOL_MAX,
    });
    return {
      store: new PostgresCheckpointStore(db),
      sink: new PostgresAssessmentSink(db),
      close,
    };
  }

  return {
    store: new InMemoryCheckpointStore(),
    sink: new InMemoryAssessmentSink(),
    close: async () => undefined,
  };
};

/**
 * One policy per dependency; the outer adapter timeout is a little longer than the adapter's own
 * HTTP timeout so the adapter reports its own failure first.
 */
const createPolicies = (clock: ClockPort) => ({
  report: new CallPolicy(
    {
      name: "report",
      source: "report",
      maxAttempts: 3,
      baseDelayMs: 2_000,
      maxDelayMs: 30_000,
      timeoutMs: env.REPORT_TIMEOUT_MS + 5_000,
    },
    clock,
  ),
  search: new CallPolicy(
    {
      name: "search",
      source: "search",
      maxAttempts: env.SEARCH_MAX_ATTEMPTS,
      baseDelayMs: env.SEARCH_BACKOFF_MS,
      maxDelayMs: 30_000,
      timeoutMs: env.PERPLEXITY_TIMEOUT_MS + 5_000,
    },
    clock,
  ),
  oracle: new CallPolicy(
    {
      name: "oracle",
      source: "oracle",
      maxAttempts: env.ORACLE_MAX_ATTEMPTS,
      baseDelayMs: env.ORACLE_BACKOFF_MS,
      maxDelayMs: 60_000,
      timeoutMs: env.ORACLE_TIMEOUT_MS + 5_000,
      breaker: {
        failureThreshold: env.ORACLE_BREAKER_THRESHOLD,
        cooldownMs: env.ORACLE_BREAKER_COOLDOWN_MS,
      },
    },
    clock,
  ),
  verification: new CallPolicy(
    {
      name: "verification",
      source: "verification",
      maxAttempts: env.VERIFICATION_MAX_ATTEMPTS,
      baseDelayMs: env.VERIFICATION_BACKOFF_MS,
      maxDelayMs: 10_000,
      // A repair checks several candidate urls in one call.
      timeoutMs: env.VERIFICATION_TIMEOUT_MS * 4,
    },
    clock,
  ),
  sideArtifact: new CallPolicy(
    {
      name: "side_artifact",
      source: "side_artifact",
      maxAttempts: 1,
      baseDelayMs: 0,
      timeoutMs: env.SIDE_ARTIFACT_TIMEOUT_MS + 5_000,
    },
    clock,
  ),
});

/**
 * Centralizes runtime wiring so CLI and worker entry points share one composition root.
 */
export const createRuntime = async () => {
  const missing = missingCredentials(env);
  if (missing.length > 0) {
    throw new Error(
      `Missing credentials for selected providers: ${missing.join(", ")}.`,
    );
  }

  const clock = new SystemClock();
  const ids = new UuidIdGenerator();
  const persistence = createPersistence();
  const artifactStore = new FileArtifactStore(env.ARTIFACT_DIR);
  const policies = createPolicies(clock);

  const invoker = new AnalysisInvoker(createScoringOracle(), policies.oracle, {
    globalConcurrency: env.ORACLE_GLOBAL_CONCURRENCY,
    abnormalRatio: env.ORACLE_ABNORMAL_RATIO,
  });
  const fetchCoordinator = new ConcurrentFetchCoordinator(
    createSearchProvider(),
    new FallbackQueryPlanner({ phraseMaxChars: env.QUERY_PHRASE_MAX_CHARS }),
    policies.search,
    {
      poolSize: env.FETCH_POOL_SIZE,
      taskTimeoutMs: env.FETCH_TASK_TIMEOUT_MS,
      resultLimit: env.SEARCH_RESULT_LIMIT,
    },
  );
  const evidenceValidator = new EvidenceValidator(
    createVerificationOracle(),
    policies.verification,
  );

  const runner = new AssessmentStageRunner(
    {
      reportSource: createReportSource(),
      reportPolicy: policies.report,
      artifactStore,
      sideArtifacts: createSideArtifactGenerator(artifactStore),
      sideArtifactPolicy: policies.sideArtifact,
      invoker,
      fetchCoordinator,
      evidenceValidator,
      sink: persistence.sink,
      clock,
    },
    { framework: env.ESG_FRAMEWORK },
  );

  const orchestrator = new StageOrchestratorService(
    persistence.store,
    runner,
    clock,
    ids,
    { leaseTtlMs: env.LEASE_TTL_MS },
  );

  return {
    clock,
    store: persistence.store,
    sink: persistence.sink,
    orchestrator,
    close: persistence.close,
  };
};

export type Runtime = Awaited<ReturnType<typeof createRuntime>>;
