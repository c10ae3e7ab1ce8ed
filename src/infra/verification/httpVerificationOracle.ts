import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type { AppBoundaryError } from "../../core/entities/appError";
import { isOwnDomain } from "../../core/entities/companyDomain";
import type {
  VerificationOraclePort,
  VerificationRequest,
  VerificationResponse,
} from "../../core/ports/inboundPorts";
import { HttpClient, toBoundaryError } from "../http/httpClient";
import { buildRepairPrompt } from "../oracle/prompts";

export type HttpVerificationConfig = {
  perplexityBaseUrl: string;
  perplexityApiKey: string;
  perplexityModel: string;
  timeoutMs: number;
};

const BROWSER_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

// Many publishers answer bots with 403 while the page exists.
const LIVE_STATUSES = [403];

const chatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullish() }).optional(),
      }),
    )
    .default([]),
});

const urlListSchema = z.object({
  urls: z.array(z.string()).default([]),
});

export const extractPageTitle = (html: string): string | undefined => {
  const match = /<title[^>]*>([\s\S]*?)<\/title>/i.exec(html);
  const title = match?.[1]?.replace(/\s+/g, " ").trim();
  return title ? title : undefined;
};

/**
 * Checks evidence URLs directly and asks Perplexity for a third-party replacement when one is dead.
 */
export class HttpVerificationOracle implements VerificationOraclePort {
  constructor(
    private readonly config: HttpVerificationConfig,
    private readonly httpClient = new HttpClient(),
  ) {
    if (!this.config.perplexityApiKey.trim()) {
      throw new Error(
        "PERPLEXITY_API_KEY is required when VERIFICATION_PROVIDER is set to http.",
      );
    }
  }

  async verify(
    request: VerificationRequest,
  ): Promise<Result<VerificationResponse, AppBoundaryError>> {
    if (request.kind === "liveness") {
      return this.checkLiveness(request.url);
    }

    return this.findReplacement(request);
  }

  private async checkLiveness(
    url: string,
  ): Promise<Result<VerificationResponse, AppBoundaryError>> {
    const response = await this.httpClient.requestText({
      url,
      method: "GET",
      headers: { "user-agent": BROWSER_USER_AGENT },
      timeoutMs: this.config.timeoutMs,
      retries: 0,
      retryDelayMs: 0,
      acceptStatuses: LIVE_STATUSES,
    });

    if (response.isErr()) {
      if (response.error.code === "non_success_status") {
        return ok({ liveness: "dead" });
      }
      return err(toBoundaryError("verification", "http", response.error));
    }

    return ok({
      liveness: "live",
      pageTitle: extractPageTitle(response.value.text),
    });
  }

  private async findReplacement(
    request: Extract<VerificationRequest, { kind: "repair" }>,
  ): Promise<Result<VerificationResponse, AppBoundaryError>> {
    const query = `${request.companyName} ${request.period} ESG ${request.claimText.slice(0, 50)}`;
    const candidates = await this.askForUrls(query, request.companyName);
    if (candidates.isErr()) {
      return err(candidates.error);
    }

    const company = {
      companyName: request.companyName,
      domains: request.excludeDomains,
    };
    for (const candidate of candidates.value) {
      if (isOwnDomain(candidate, company)) {
        continue;
      }

      const liveness = await this.checkLiveness(candidate);
      if (liveness.isOk() && liveness.value.liveness === "live") {
        return ok({
          liveness: "dead",
          replacementUrl: candidate,
          pageTitle: liveness.value.pageTitle,
        });
      }
    }

    return ok({ liveness: "dead" });
  }

  private async askForUrls(
    query: string,
    companyName: string,
  ): Promise<Result<string[], AppBoundaryError>> {
    const response = await this.httpClient.requestJson({
      url: `${this.config.perplexityBaseUrl}/chat/completions`,
      method: "POST",
      headers: {
        "content-type": "application/json",
        authorization: `Bearer ${this.config.perplexityApiKey}`,
      },
      body: {
        model: this.config.perplexityModel,
        messages: [
          { role: "user", content: buildRepairPrompt(query, companyName) },
        ],
      },
      timeoutMs: this.config.timeoutMs,
      retries: 0,
      retryDelayMs: 0,
    });

    if (response.isErr()) {
      return err(toBoundaryError("verification", "perplexity", response.error));
    }

    const chat = chatResponseSchema.safeParse(response.value);
    const content = chat.success
      ? chat.data.choices[0]?.message?.content?.trim()
      : undefined;
    if (!content) {
      return err({
        source: "verification",
        code: "malformed_response",
        provider: "perplexity",
        message: "Perplexity chat payload did not contain message content.",
        retryable: false,
      });
    }

    const unfenced = content
      .replace(/^```(?:json)?/i, "")
      .replace(/```$/, "")
      .trim();

    let payload: unknown;
    try {
      payload = JSON.parse(unfenced);
    } catch (parseError) {
      return err({
        source: "verification",
        code: "invalid_json",
        provider: "perplexity",
        message: "Perplexity repair answer was not JSON.",
        retryable: false,
        cause: parseError,
      });
    }

    const parsed = urlListSchema.safeParse(payload);
    if (!parsed.success) {
      return err({
        source: "verification",
        code: "malformed_response",
        provider: "perplexity",
        message: "Perplexity repair answer did not contain a urls array.",
        retryable: false,
        cause: parsed.error.issues,
      });
    }

    return ok(
      parsed.data.urls
        .map((url) => url.trim().replace(/^["']|["']$/g, ""))
        .filter((url) => url.startsWith("http")),
    );
  }
}
