import { ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { SearchHit } from "../../core/entities/assessment";
import type {
  SearchProviderPort,
  SearchRequest,
} from "../../core/ports/inboundPorts";

const slug = (value: string): string =>
  value
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, "-")
    .replace(/^-|-$/g, "")
    .slice(0, 40);

/**
 * Returns one repeatable news hit per query.
 */
export class MockSearchProvider implements SearchProviderPort {
  async search(
    request: SearchRequest,
  ): Promise<Result<SearchHit[], AppBoundaryError>> {
    const id = slug(request.query) || "query";
    return ok(
      [
        {
          title: `Coverage: ${request.query.replace(/"/g, "")}`,
          url: `https://news.example.local/${id}`,
          snippet: `Simulated reporting related to ${request.query.replace(/"/g, "")}.`,
          publishedAt: "2024-06-01",
        },
      ].slice(0, request.limit),
    );
  }
}
