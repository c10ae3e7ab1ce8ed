import type { EvidenceEntity } from "../../core/entities/assessment";
import {
  hostnameOf,
  isOwnDomain,
  type CompanyIdentity,
} from "../../core/entities/companyDomain";
import type { VerificationOraclePort } from "../../core/ports/inboundPorts";
import { logger } from "../../shared/logger/logger";
import type { CallPolicy } from "../resilience/callPolicy";

export type CompanyContext = CompanyIdentity & {
  period: string;
};

export type EvidenceValidationStats = {
  checked: number;
  live: number;
  repaired: number;
  dropped: number;
};

export type EvidenceValidationResult = {
  evidence: EvidenceEntity[];
  stats: EvidenceValidationStats;
};

/**
 * Resolves evidence liveness, repairs dead links through one third-party search each,
 * and drops what cannot be repaired. Items already live are left alone.
 */
export class EvidenceValidator {
  constructor(
    private readonly verifier: VerificationOraclePort,
    private readonly policy: CallPolicy,
  ) {}

  async validate(
    evidence: EvidenceEntity[],
    company: CompanyContext,
  ): Promise<EvidenceValidationResult> {
    const stats: EvidenceValidationStats = {
      checked: 0,
      live: 0,
      repaired: 0,
      dropped: 0,
    };
    const validated: EvidenceEntity[] = [];

    for (const item of evidence) {
      if (!hostnameOf(item.url)) {
        stats.dropped += 1;
        continue;
      }

      if (item.liveness === "live") {
        stats.live += 1;
        validated.push(item);
        continue;
      }

      const current =
        item.liveness === "unchecked" ? await this.checkLiveness(item) : item;
      if (item.liveness === "unchecked") {
        stats.checked += 1;
      }

      if (current.liveness === "live") {
        stats.live += 1;
        validated.push(current);
        continue;
      }

      const repaired = await this.repair(current, company);
      if (repaired) {
        stats.repaired += 1;
        validated.push(repaired);
        continue;
      }

      stats.dropped += 1;
      logger.info(
        { evidenceId: item.id, claimId: item.claimId, url: item.url },
        "Dead evidence could not be repaired; dropping",
      );
    }

    logger.debug({ ...stats, total: evidence.length }, "Evidence validated");
    return { evidence: validated, stats };
  }

  private async checkLiveness(item: EvidenceEntity): Promise<EvidenceEntity> {
    const result = await this.policy.execute(() =>
      this.verifier.verify({ kind: "liveness", url: item.url }),
    );

    if (result.isErr()) {
      logger.warn(
        { evidenceId: item.id, code: result.error.code },
        "Liveness check failed; treating evidence as dead",
      );
      return { ...item, liveness: "dead" };
    }

    return {
      ...item,
      liveness: result.value.liveness,
      title: item.title ?? result.value.pageTitle,
    };
  }

  private async repair(
    item: EvidenceEntity,
    company: CompanyContext,
  ): Promise<EvidenceEntity | null> {
    const claimText = [item.title, item.snippet]
      .filter((part): part is string => Boolean(part?.trim()))
      .join(" ")
      .slice(0, 120);

    const result = await this.policy.execute(() =>
      this.verifier.verify({
        kind: "repair",
        claimText,
        companyName: company.companyName,
        period: company.period,
        excludeDomains: company.domains,
      }),
    );

    if (result.isErr()) {
      logger.warn(
        { evidenceId: item.id, code: result.error.code },
        "Evidence repair search failed",
      );
      return null;
    }

    const replacement = result.value.replacementUrl?.trim();
    if (!replacement || !hostnameOf(replacement)) {
      return null;
    }

    if (isOwnDomain(replacement, company)) {
      logger.info(
        { evidenceId: item.id, replacement },
        "Repair candidate is the company's own site; rejecting",
      );
      return null;
    }

    return {
      ...item,
      url: replacement,
      title: result.value.pageTitle ?? item.title,
      origin: "repair",
      liveness: "live",
      repairedFrom: item.url,
    };
  }
}
