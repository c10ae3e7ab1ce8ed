import { afterEach, describe, expect, it, vi } from "vitest";
import { GeminiScoringOracle } from "./geminiScoringOracle";

const originalFetch = globalThis.fetch;

afterEach(() => {
  globalThis.fetch = originalFetch;
});

const config = {
  baseUrl: "https://oracle.example.test/v1beta",
  apiKey: "test-secret",
  model: "gemini-test",
  temperature: 0.1,
  timeoutMs: 500,
};

const extractionRequest = {
  jobKey: "1101-2024",
  companyCode: "1101",
  companyName: "Acme Cement",
  period: "2024",
  document: {
    bytes: new Uint8Array([37, 80, 68, 70]),
    contentType: "application/pdf",
  },
  framework: "GRI",
};

const candidateResponse = (text: string) =>
  new Response(
    JSON.stringify({
      candidates: [
        { content: { parts: [{ text }] }, finishReason: "STOP" },
      ],
    }),
    { status: 200 },
  );

describe("GeminiScoringOracle", () => {
  it("sends the report inline and returns the model text", async () => {
    const fetchMock = vi.fn(
      async (..._args: Parameters<typeof fetch>) =>
        candidateResponse(' [{"topic":"Climate"}] '),
    );
    globalThis.fetch = fetchMock;

    const oracle = new GeminiScoringOracle(config);
    const result = await oracle.extractClaims(extractionRequest);

    expect(result.isOk() && result.value).toBe('[{"topic":"Climate"}]');

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe(
      "https://oracle.example.test/v1beta/models/gemini-test:generateContent",
    );
    expect(init?.headers).toMatchObject({ "x-goog-api-key": "test-secret" });
    const body: unknown =
      typeof init?.body === "string" ? JSON.parse(init.body) : null;
    expect(body).toMatchObject({
      contents: [
        {
          role: "user",
          parts: [
            { inline_data: { mime_type: "application/pdf", data: "JVBERg==" } },
            { text: expect.stringContaining("Acme Cement") },
          ],
        },
      ],
      generationConfig: {
        responseMimeType: "application/json",
        temperature: 0.1,
      },
    });
  });

  it("reports an empty candidate list as a retryable malformed response", async () => {
    globalThis.fetch = vi.fn(
      async (..._args: Parameters<typeof fetch>) =>
        new Response(JSON.stringify({ candidates: [] }), { status: 200 }),
    );

    const oracle = new GeminiScoringOracle(config);
    const result = await oracle.crossCheck({
      jobKey: "1101-2024",
      companyName: "Acme Cement",
      period: "2024",
      framework: "GRI",
      claims: [],
      evidence: [],
    });

    if (result.isOk()) {
      throw new Error("expected malformed response");
    }
    expect(result.error).toMatchObject({
      source: "oracle",
      code: "malformed_response",
      provider: "gemini",
      message: "Gemini returned no text (finishReason: none).",
      retryable: true,
    });
  });

  it("maps server errors to retryable provider errors", async () => {
    globalThis.fetch = vi.fn(
      async (..._args: Parameters<typeof fetch>) =>
        new Response("overloaded", { status: 503 }),
    );

    const oracle = new GeminiScoringOracle(config);
    const result = await oracle.extractClaims(extractionRequest);

    if (result.isOk()) {
      throw new Error("expected provider error");
    }
    expect(result.error.code).toBe("provider_error");
    expect(result.error.httpStatus).toBe(503);
    expect(result.error.retryable).toBe(true);
  });

  it("rejects a blank api key at construction", () => {
    expect(() => new GeminiScoringOracle({ ...config, apiKey: "" })).toThrow(
      "GEMINI_API_KEY is required",
    );
  });
});
