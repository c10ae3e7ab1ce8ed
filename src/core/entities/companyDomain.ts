export type CompanyIdentity = {
  companyName: string;
  domains: string[];
};

const latinSuffixes = [
  "corporation",
  "company",
  "limited",
  "corp",
  "inc",
  "ltd",
  "co",
  "plc",
];

const cjkSuffixes = ["股份有限公司", "有限公司"];

// Legal forms count only as whole trailing words, so "Lincoln" keeps its "inc".
const trailingLegalForm = new RegExp(
  `(?:[\\s,]+(?:${latinSuffixes.join("|")})[.,]*|${cjkSuffixes.join("|")})$`,
  "u",
);

export const hostnameOf = (url: string): string | null => {
  try {
    const parsed = new URL(url);
    if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
      return null;
    }
    return parsed.hostname.toLowerCase();
  } catch {
    return null;
  }
};

export const cleanCompanyName = (companyName: string): string => {
  let cleaned = companyName.toLowerCase().trim();
  let previous = "";
  while (cleaned !== previous) {
    previous = cleaned;
    cleaned = cleaned.replace(trailingLegalForm, "").trim();
  }
  return cleaned.replace(/[^\p{L}\p{N}]/gu, "");
};

/**
 * True when the URL points at the company's own web presence: a configured domain
 * (or a subdomain of one), or a host that contains the company's cleaned name.
 */
export const isOwnDomain = (url: string, company: CompanyIdentity): boolean => {
  const host = hostnameOf(url);
  if (!host) {
    return false;
  }

  const matchesConfigured = company.domains.some((domain) => {
    const normalized = domain.trim().toLowerCase().replace(/^www\./, "");
    return (
      normalized.length > 0 &&
      (host === normalized || host.endsWith(`.${normalized}`))
    );
  });
  if (matchesConfigured) {
    return true;
  }

  const cleanedName = cleanCompanyName(company.companyName);
  return cleanedName.length >= 3 && host.replace(/[.-]/g, "").includes(cleanedName);
};
