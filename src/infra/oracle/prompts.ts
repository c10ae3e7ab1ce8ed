import type {
  ClaimExtractionRequest,
  CrossCheckRequest,
} from "../../core/ports/inboundPorts";

/**
 * Disclosure scoring scale shared by both prompts, after Clarkson et al. (2008).
 */
const disclosureScale = [
  "0: not disclosed.",
  "1: soft disclosure; vision, slogans or vague commitments only.",
  "2: qualitative; concrete management measures without data.",
  "3: quantitative; specific figures or historical trends.",
  "4: excellent; third-party assurance (ISAE 3000 or AA1000), or a quantified target together with a breakdown or a stated methodology.",
].join("\n");

export const buildExtractionPrompt = (
  request: ClaimExtractionRequest,
): string => `You are a professional ESG auditor. Analyse the attached sustainability report.

Company: ${request.companyName} (${request.companyCode})
Reporting period: ${request.period}
Industry: ${request.industry ?? "unspecified"}
Framework: ${request.framework}

Tasks:
1. Identify the ${request.framework} topics that are material for this industry and, for each, the single most data-rich claim the report makes about it.
2. Score each claim with this scale:
${disclosureScale}
3. If the report contradicts itself on a topic, lower the score by one (minimum 0).
4. Each topic appears at most once.

Return a JSON array only, no Markdown. Each item has:
- "text": the claim quoted verbatim from the report
- "page": page number of the claim
- "category": one of "E", "S", "G"
- "topic": the ${request.framework} topic name
- "keyword": 3 to 5 space-separated news search keywords, company name first
- "riskIndicator": the score from 0 to 4`;

export const buildCrossCheckPrompt = (
  request: CrossCheckRequest,
): string => {
  const claims = request.claims.map((claim) => ({
    claimId: claim.id,
    category: claim.category,
    topic: claim.topic,
    text: claim.text,
  }));
  const evidence = request.evidence.map((item) => ({
    claimId: item.claimId,
    url: item.url,
    title: item.title ?? "",
    snippet: item.snippet,
  }));

  return `You are a professional ESG auditor checking corporate claims against external news.

Company: ${request.companyName}
Reporting period: ${request.period}
Framework: ${request.framework}

Claims:
${JSON.stringify(claims, null, 2)}

News evidence collected for the claims:
${JSON.stringify(evidence, null, 2)}

For every claim, decide whether the evidence supports it, contradicts it, or is inconclusive, and give an adjusted greenwashing risk score using:
${disclosureScale}
Contradicting news, such as fines, pollution incidents or lawsuits, lowers the score.
You may cite additional third-party sources you are confident exist; never cite the company's own website.

Return a JSON array only, no Markdown. Each item has:
- "claimId": the claim id from the input
- "riskScore": 0 to 4
- "verdict": "supported", "contradicted" or "inconclusive"
- "rationale": one or two sentences
- "evidence": array of { "url", "title", "snippet", "stance" } where stance is "supports", "contradicts" or "neutral"`;
};

export const buildRepairPrompt = (
  query: string,
  companyName: string,
): string =>
  `Provide one reliable third-party source URL about "${query}". Exclude any website or domain owned by ${companyName}. Respond with JSON only: {"urls": ["url1"]}`;
