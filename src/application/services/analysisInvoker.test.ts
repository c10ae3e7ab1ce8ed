import { err, ok, type Result } from "neverthrow";
import { describe, expect, it } from "vitest";
import type { AppBoundaryError } from "../../core/entities/appError";
import type {
  ClaimExtractionRequest,
  CrossCheckRequest,
  ScoringOraclePort,
} from "../../core/ports/inboundPorts";
import { CallPolicy } from "../resilience/callPolicy";
import { AnalysisInvoker } from "./analysisInvoker";

type Reply = Result<string, AppBoundaryError>;

class ScriptedOracle implements ScoringOraclePort {
  calls = 0;
  inFlight = 0;
  peakInFlight = 0;

  constructor(
    private readonly replies: Reply[],
    private readonly latencyMs = 0,
  ) {}

  async extractClaims(_request: ClaimExtractionRequest): Promise<Reply> {
    return this.next();
  }

  async crossCheck(_request: CrossCheckRequest): Promise<Reply> {
    return this.next();
  }

  private async next(): Promise<Reply> {
    const reply =
      this.replies[Math.min(this.calls, this.replies.length - 1)] ?? ok("[]");
    this.calls += 1;
    this.inFlight += 1;
    this.peakInFlight = Math.max(this.peakInFlight, this.inFlight);
    if (this.latencyMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.latencyMs));
    }
    this.inFlight -= 1;
    return reply;
  }
}

const unavailable: AppBoundaryError = {
  source: "oracle",
  code: "provider_error",
  provider: "fake",
  message: "HTTP request failed with status 503.",
  retryable: true,
  httpStatus: 503,
};

const extractionRequest = (jobKey = "1101-2024"): ClaimExtractionRequest => ({
  jobKey,
  companyCode: "1101",
  companyName: "Acme Cement",
  period: "2024",
  document: {
    bytes: new Uint8Array([37, 80, 68, 70]),
    contentType: "application/pdf",
  },
  framework: "GRI",
});

const claimsJson = JSON.stringify([
  { text: "Cut Scope 1 emissions by 12%", category: "E", topic: "Climate" },
  { text: "Zero bribery incidents", category: "G", topic: "Ethics" },
]);

const invoker = (oracle: ScoringOraclePort, globalConcurrency = 4) =>
  new AnalysisInvoker(
    oracle,
    new CallPolicy(
      {
        name: "oracle",
        source: "oracle",
        maxAttempts: 3,
        baseDelayMs: 0,
        timeoutMs: 1_000,
      },
      undefined,
      async () => {},
    ),
    { globalConcurrency, abnormalRatio: 2 },
  );

describe("AnalysisInvoker", () => {
  it("retries a transient oracle failure and returns validated claims", async () => {
    const oracle = new ScriptedOracle([err(unavailable), ok(claimsJson)]);

    const result = await invoker(oracle).extractClaims(extractionRequest());

    expect(oracle.calls).toBe(2);
    expect(result.isOk() && result.value.map((claim) => claim.topic)).toEqual([
      "Climate",
      "Ethics",
    ]);
  });

  it("maps exhausted retries to oracle_unavailable", async () => {
    const oracle = new ScriptedOracle([err(unavailable)]);

    const result = await invoker(oracle).extractClaims(extractionRequest());

    expect(oracle.calls).toBe(3);
    if (result.isOk()) {
      throw new Error("expected a failure");
    }
    expect(result.error.code).toBe("oracle_unavailable");
    expect(result.error.retryable).toBe(true);
  });

  it("maps a rate limit to rate_limited", async () => {
    const oracle = new ScriptedOracle([
      err({ ...unavailable, code: "rate_limited", retryable: false, httpStatus: 429 }),
    ]);

    const result = await invoker(oracle).extractClaims(extractionRequest());

    expect(result.isErr() && result.error.code).toBe("rate_limited");
  });

  it("recovers fenced and truncated output", async () => {
    const fenced = new ScriptedOracle([ok(`\`\`\`json\n${claimsJson}\n\`\`\``)]);
    const truncated = new ScriptedOracle([
      ok('[{"text":"Solar on every plant","category":"E","topic":"Energy"},{"text":"Half'),
    ]);

    const fromFenced = await invoker(fenced).extractClaims(extractionRequest());
    const fromTruncated = await invoker(truncated).extractClaims(extractionRequest());

    expect(fromFenced.isOk() && fromFenced.value).toHaveLength(2);
    expect(fromTruncated.isOk() && fromTruncated.value).toEqual([
      { text: "Solar on every plant", category: "E", topic: "Energy" },
    ]);
  });

  it("fails with malformed_output when the text is not JSON", async () => {
    const oracle = new ScriptedOracle([ok("I could not read the report.")]);

    const result = await invoker(oracle).extractClaims(extractionRequest());

    expect(oracle.calls).toBe(1);
    if (result.isOk()) {
      throw new Error("expected malformed output");
    }
    expect(result.error.code).toBe("malformed_output");
    expect(result.error.retryable).toBe(false);
  });

  it("fails with malformed_output when claims do not validate", async () => {
    const oracle = new ScriptedOracle([
      ok(JSON.stringify([{ text: "Claim", category: "Q", topic: "Other" }])),
    ]);

    const result = await invoker(oracle).extractClaims(extractionRequest());

    if (result.isOk()) {
      throw new Error("expected malformed output");
    }
    expect(result.error.code).toBe("malformed_output");
    expect(result.error.message).toMatch(
      /^Oracle claim_extraction output failed validation: /,
    );
  });

  it("treats an empty claim list as malformed output", async () => {
    const oracle = new ScriptedOracle([ok("[]")]);

    const result = await invoker(oracle).extractClaims(extractionRequest());

    expect(result.isErr() && result.error).toMatchObject({
      code: "malformed_output",
      message: "Oracle returned no claims for the report.",
      retryable: false,
    });
  });

  it("collapses repeated claims when topics repeat abnormally", async () => {
    const repeated = Array.from({ length: 5 }, () => ({
      text: "We care about water",
      category: "E",
      topic: "Water",
    }));
    const oracle = new ScriptedOracle([
      ok(
        JSON.stringify([
          ...repeated,
          { text: "Board is 40% independent", category: "G", topic: "Board" },
        ]),
      ),
    ]);

    const result = await invoker(oracle).extractClaims(extractionRequest());

    expect(result.isOk() && result.value.map((claim) => claim.text)).toEqual([
      "We care about water",
      "Board is 40% independent",
    ]);
  });

  it("runs oracle calls for one job one at a time", async () => {
    const oracle = new ScriptedOracle([ok(claimsJson)], 5);
    const analysis = invoker(oracle);

    const results = await Promise.all([
      analysis.extractClaims(extractionRequest()),
      analysis.extractClaims(extractionRequest()),
      analysis.extractClaims(extractionRequest()),
    ]);

    expect(results.every((result) => result.isOk())).toBe(true);
    expect(oracle.peakInFlight).toBe(1);
  });

  it("lets different jobs share the global budget", async () => {
    const oracle = new ScriptedOracle([ok(claimsJson)], 5);
    const analysis = invoker(oracle, 2);

    await Promise.all([
      analysis.extractClaims(extractionRequest("1101-2024")),
      analysis.extractClaims(extractionRequest("2330-2024")),
      analysis.extractClaims(extractionRequest("2317-2024")),
    ]);

    expect(oracle.peakInFlight).toBe(2);
  });

  it("validates cross-check output", async () => {
    const oracle = new ScriptedOracle([
      ok(
        JSON.stringify([
          {
            claimId: "1101-2024-c1",
            riskScore: 3,
            verdict: "contradicted",
            rationale: "Fined for emissions breach.",
            evidence: [
              {
                url: "https://news.example.test/fine",
                snippet: "Regulator fined the plant.",
                stance: "contradicts",
              },
            ],
          },
        ]),
      ),
    ]);

    const result = await invoker(oracle).crossCheck({
      jobKey: "1101-2024",
      companyName: "Acme Cement",
      period: "2024",
      framework: "GRI",
      claims: [
        {
          id: "1101-2024-c1",
          text: "Cut Scope 1 emissions by 12%",
          category: "E",
          topic: "Climate",
        },
      ],
      evidence: [],
    });

    expect(result.isOk() && result.value[0]).toMatchObject({
      claimId: "1101-2024-c1",
      riskScore: 3,
      verdict: "contradicted",
    });
  });
});
