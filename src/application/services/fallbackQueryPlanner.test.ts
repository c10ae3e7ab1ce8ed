import { describe, expect, it } from "vitest";
import { FallbackQueryPlanner } from "./fallbackQueryPlanner";

describe("FallbackQueryPlanner", () => {
  const planner = new FallbackQueryPlanner({ phraseMaxChars: 80 });

  it("plans exact phrase, industry keyword and company name tiers in order", () => {
    const tiers = planner.plan({
      id: "c1",
      phrase: '  Scope 1 "emissions" fell   12% ',
      keyword: "emissions",
      industry: "Cement",
      companyName: "Taiwan Cement",
    });

    expect(tiers).toEqual([
      { tier: 1, kind: "exact_phrase", query: '"Scope 1 emissions fell 12%"' },
      { tier: 2, kind: "industry_keyword", query: "Cement emissions" },
      { tier: 3, kind: "company_name", query: "Taiwan Cement" },
    ]);
  });

  it("truncates long phrases at a word boundary", () => {
    const short = new FallbackQueryPlanner({ phraseMaxChars: 20 });

    const [first] = short.plan({
      id: "c1",
      phrase: "Water recycling rate reached ninety percent",
      companyName: "Acme",
    });

    expect(first).toEqual({
      tier: 1,
      kind: "exact_phrase",
      query: '"Water recycling"',
    });
  });

  it("skips the keyword tier without a keyword but keeps tier numbers", () => {
    const tiers = planner.plan({
      id: "c1",
      phrase: "Zero bribery incidents",
      industry: "Cement",
      companyName: "Acme",
    });

    expect(tiers.map((tier) => tier.tier)).toEqual([1, 3]);
  });

  it("drops a tier that repeats an earlier query", () => {
    const tiers = planner.plan({
      id: "c1",
      phrase: "Zero bribery incidents",
      keyword: "ACME",
      companyName: "Acme",
    });

    expect(tiers).toEqual([
      { tier: 1, kind: "exact_phrase", query: '"Zero bribery incidents"' },
      { tier: 2, kind: "industry_keyword", query: "ACME" },
    ]);
  });
});
