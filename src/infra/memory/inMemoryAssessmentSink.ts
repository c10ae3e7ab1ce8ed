import type { AssessmentBundle } from "../../core/entities/assessment";
import type { AssessmentSinkPort } from "../../core/ports/outboundPorts";

/**
 * Keeps the latest bundle per job key; used by local runs and tests.
 */
export class InMemoryAssessmentSink implements AssessmentSinkPort {
  private readonly bundles = new Map<string, AssessmentBundle>();
  private commitCount = 0;

  async commit(bundle: AssessmentBundle): Promise<void> {
    this.commitCount += 1;
    this.bundles.set(bundle.jobKey, structuredClone(bundle));
  }

  get commits(): number {
    return this.commitCount;
  }

  get(jobKey: string): AssessmentBundle | undefined {
    const bundle = this.bundles.get(jobKey);
    return bundle ? structuredClone(bundle) : undefined;
  }
}
