import { err, ok, type Result } from "neverthrow";
import { z } from "zod";

const tryParse = (text: string): Result<unknown, string> => {
  try {
    return ok(JSON.parse(text));
  } catch (error) {
    return err(error instanceof Error ? error.message : String(error));
  }
};

const stripCodeFences = (text: string): string =>
  text
    .trim()
    .replace(/^```(?:json)?/i, "")
    .replace(/```$/, "")
    .trim();

/**
 * Closes a JSON array that was cut off mid-object by keeping every complete object before the cut.
 */
export const repairTruncatedArray = (text: string): string | null => {
  const trimmed = text.trim();
  if (!trimmed.startsWith("[")) {
    return null;
  }

  const lastSeparator = trimmed.lastIndexOf("},");
  if (lastSeparator !== -1) {
    return `${trimmed.slice(0, lastSeparator + 1)}]`;
  }

  const lastClose = trimmed.lastIndexOf("}");
  if (lastClose === -1) {
    return null;
  }

  return `${trimmed.slice(0, lastClose + 1)}]`;
};

/**
 * Parses model output as JSON, then without Markdown fences, then as a repaired truncated array.
 */
export const parseOracleJson = (raw: string): Result<unknown, string> => {
  const direct = tryParse(raw);
  if (direct.isOk()) {
    return direct;
  }

  const unfenced = stripCodeFences(raw);
  const fenced = tryParse(unfenced);
  if (fenced.isOk()) {
    return fenced;
  }

  const repaired = repairTruncatedArray(unfenced);
  if (repaired) {
    const recovered = tryParse(repaired);
    if (recovered.isOk()) {
      return recovered;
    }
  }

  return err(`Oracle output is not JSON (length ${raw.length}): ${direct.error}`);
};

const esgCategorySchema = z.preprocess(
  (value) =>
    typeof value === "string" ? value.trim().charAt(0).toUpperCase() : value,
  z.enum(["E", "S", "G"]),
);

const dropNull = (value: unknown): unknown =>
  value === null ? undefined : value;

const optionalText = z.preprocess(
  dropNull,
  z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : undefined)),
);

const optionalNumber = (min: number, max: number) =>
  z.preprocess(dropNull, z.coerce.number().min(min).max(max).optional());

const extractedClaimSchema = z.object({
  text: z.string().trim().min(1),
  page: z.preprocess(dropNull, z.coerce.number().int().positive().optional()),
  category: esgCategorySchema,
  topic: z.string().trim().min(1),
  keyword: optionalText,
  riskIndicator: optionalNumber(0, 4),
});

const claimListSchema = z.array(extractedClaimSchema);

/**
 * Accepts either a bare array or an object wrapping it under `claims`.
 */
export const extractionOutputSchema = z.union([
  claimListSchema,
  z.object({ claims: claimListSchema }).transform((value) => value.claims),
]);

const crossCheckEvidenceSchema = z.object({
  url: z.string().trim().url(),
  title: optionalText,
  snippet: z.string().default(""),
  stance: z.enum(["supports", "contradicts", "neutral"]).default("neutral"),
});

const crossCheckItemSchema = z.object({
  claimId: z.string().trim().min(1),
  riskScore: z.coerce.number().min(0).max(4),
  verdict: z.enum(["supported", "contradicted", "inconclusive"]),
  rationale: optionalText,
  evidence: z.array(crossCheckEvidenceSchema).default([]),
});

const crossCheckListSchema = z.array(crossCheckItemSchema);

export const crossCheckOutputSchema = z.union([
  crossCheckListSchema,
  z
    .object({ results: crossCheckListSchema })
    .transform((value) => value.results),
]);

export type CrossCheckItem = z.infer<typeof crossCheckItemSchema>;

export const summarizeIssues = (error: z.ZodError): string =>
  error.issues
    .slice(0, 3)
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
