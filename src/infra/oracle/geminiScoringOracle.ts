import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type { AppBoundaryError } from "../../core/entities/appError";
import type {
  ClaimExtractionRequest,
  CrossCheckRequest,
  ScoringOraclePort,
} from "../../core/ports/inboundPorts";
import { HttpClient, toBoundaryError } from "../http/httpClient";
import { buildCrossCheckPrompt, buildExtractionPrompt } from "./prompts";

export type GeminiOracleConfig = {
  baseUrl: string;
  apiKey: string;
  model: string;
  temperature: number;
  timeoutMs: number;
};

type GeminiPart =
  | { text: string }
  | { inline_data: { mime_type: string; data: string } };

const generateContentResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).default([]),
          })
          .optional(),
        finishReason: z.string().optional(),
      }),
    )
    .default([]),
});

/**
 * Gemini generateContent adapter. Returns the model's raw JSON text; the report is sent inline.
 */
export class GeminiScoringOracle implements ScoringOraclePort {
  constructor(
    private readonly config: GeminiOracleConfig,
    private readonly httpClient = new HttpClient(),
  ) {
    if (!this.config.apiKey.trim()) {
      throw new Error(
        "GEMINI_API_KEY is required when ORACLE_PROVIDER is set to gemini.",
      );
    }
  }

  async extractClaims(
    request: ClaimExtractionRequest,
  ): Promise<Result<string, AppBoundaryError>> {
    return this.generate([
      {
        inline_data: {
          mime_type: request.document.contentType || "application/pdf",
          data: Buffer.from(request.document.bytes).toString("base64"),
        },
      },
      { text: buildExtractionPrompt(request) },
    ]);
  }

  async crossCheck(
    request: CrossCheckRequest,
  ): Promise<Result<string, AppBoundaryError>> {
    return this.generate([{ text: buildCrossCheckPrompt(request) }]);
  }

  private async generate(
    parts: GeminiPart[],
  ): Promise<Result<string, AppBoundaryError>> {
    const response = await this.httpClient.requestJson({
      url: `${this.config.baseUrl}/models/${this.config.model}:generateContent`,
      method: "POST",
      headers: {
        "content-type": "application/json",
        "x-goog-api-key": this.config.apiKey,
      },
      body: {
        contents: [{ role: "user", parts }],
        generationConfig: {
          responseMimeType: "application/json",
          temperature: this.config.temperature,
        },
      },
      timeoutMs: this.config.timeoutMs,
      retries: 0,
      retryDelayMs: 0,
    });

    if (response.isErr()) {
      return err(toBoundaryError("oracle", "gemini", response.error));
    }

    const parsed = generateContentResponseSchema.safeParse(response.value);
    if (!parsed.success) {
      return err({
        source: "oracle",
        code: "malformed_response",
        provider: "gemini",
        message: "Gemini response did not match the generateContent shape.",
        retryable: false,
        cause: parsed.error.issues,
      });
    }

    const candidate = parsed.data.candidates[0];
    const text = (candidate?.content?.parts ?? [])
      .map((part) => part.text ?? "")
      .join("")
      .trim();

    if (!text) {
      return err({
        source: "oracle",
        code: "malformed_response",
        provider: "gemini",
        message: `Gemini returned no text (finishReason: ${candidate?.finishReason ?? "none"}).`,
        retryable: true,
      });
    }

    return ok(text);
  }
}
