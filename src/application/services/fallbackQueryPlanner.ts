import type {
  FallbackQueryTier,
  QueryTierKind,
  SearchTopic,
} from "../../core/entities/assessment";

export type FallbackQueryPlannerOptions = {
  phraseMaxChars: number;
};

const collapseWhitespace = (value: string): string =>
  value.replace(/\s+/g, " ").trim();

/**
 * Cuts at a word boundary so the quoted phrase stays an exact substring of the claim.
 */
const truncatePhrase = (phrase: string, maxChars: number): string => {
  if (phrase.length <= maxChars) {
    return phrase;
  }

  const cut = phrase.slice(0, maxChars);
  const lastSpace = cut.lastIndexOf(" ");
  return lastSpace > 0 ? cut.slice(0, lastSpace) : cut;
};

/**
 * Derives ordered search tiers per topic, narrowest first: exact phrase (tier 1), industry with
 * keyword (tier 2), bare company name (tier 3). A tier without inputs, or repeating an earlier
 * query, is left out; tier numbers keep their meaning either way.
 */
export class FallbackQueryPlanner {
  constructor(private readonly options: FallbackQueryPlannerOptions) {}

  plan(topic: SearchTopic): FallbackQueryTier[] {
    const phrase = truncatePhrase(
      collapseWhitespace(topic.phrase).replace(/"/g, ""),
      this.options.phraseMaxChars,
    );
    const industryKeyword = [topic.industry, topic.keyword]
      .map((part) => collapseWhitespace(part ?? ""))
      .filter(Boolean)
      .join(" ");
    const companyName = collapseWhitespace(topic.companyName);

    const candidates: Array<{ kind: QueryTierKind; query: string }> = [
      { kind: "exact_phrase", query: phrase ? `"${phrase}"` : "" },
      {
        kind: "industry_keyword",
        query: topic.keyword?.trim() ? industryKeyword : "",
      },
      { kind: "company_name", query: companyName },
    ];

    const seen = new Set<string>();
    const tiers: FallbackQueryTier[] = [];

    candidates.forEach((candidate, index) => {
      const normalized = candidate.query.toLowerCase();
      if (!normalized || seen.has(normalized)) {
        return;
      }

      seen.add(normalized);
      tiers.push({
        tier: index + 1,
        kind: candidate.kind,
        query: candidate.query,
      });
    });

    return tiers;
  }
}
