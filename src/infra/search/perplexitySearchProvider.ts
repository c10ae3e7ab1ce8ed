import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { SearchHit } from "../../core/entities/assessment";
import type {
  SearchProviderPort,
  SearchRequest,
} from "../../core/ports/inboundPorts";
import { HttpClient, toBoundaryError } from "../http/httpClient";

export type PerplexitySearchConfig = {
  baseUrl: string;
  apiKey: string;
  timeoutMs: number;
};

const searchResponseSchema = z.object({
  results: z
    .array(
      z.object({
        title: z.string().nullish(),
        url: z.string().nullish(),
        snippet: z.string().nullish(),
        date: z.string().nullish(),
      }),
    )
    .default([]),
});

/**
 * Translates Perplexity search results into news hits. Results without a URL are dropped.
 */
export class PerplexitySearchProvider implements SearchProviderPort {
  constructor(
    private readonly config: PerplexitySearchConfig,
    private readonly httpClient = new HttpClient(),
  ) {
    if (!this.config.apiKey.trim()) {
      throw new Error(
        "PERPLEXITY_API_KEY is required when SEARCH_PROVIDER is set to perplexity.",
      );
    }
  }

  async search(
    request: SearchRequest,
  ): Promise<Result<SearchHit[], AppBoundaryError>> {
    const response = await this.httpClient.requestJson({
      url: `${this.config.baseUrl}/search`,
      method: "POST",
      headers: {
        "content-type": "application/json",
        authorization: `Bearer ${this.config.apiKey}`,
      },
      body: { query: request.query, max_results: request.limit },
      timeoutMs: this.config.timeoutMs,
      retries: 0,
      retryDelayMs: 0,
      signal: request.signal,
    });

    if (response.isErr()) {
      return err(toBoundaryError("search", "perplexity", response.error));
    }

    const parsed = searchResponseSchema.safeParse(response.value);
    if (!parsed.success) {
      return err({
        source: "search",
        code: "malformed_response",
        provider: "perplexity",
        message: "Perplexity search response did not contain a results array.",
        retryable: false,
        cause: parsed.error.issues,
      });
    }

    return ok(
      parsed.data.results
        .filter((item) => Boolean(item.url?.trim()))
        .slice(0, request.limit)
        .map((item) => ({
          title: item.title?.trim() || item.url?.trim() || "",
          url: item.url?.trim() ?? "",
          snippet: item.snippet?.trim() ?? "",
          publishedAt: item.date ?? undefined,
        })),
    );
  }
}
