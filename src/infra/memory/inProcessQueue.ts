import type { QueuePort, RunPayload } from "../../core/ports/outboundPorts";
import type {
  RunOutcome,
  StageOrchestratorService,
} from "../../application/services/stageOrchestratorService";

type Settled =
  | { ok: true; outcome: RunOutcome }
  | { ok: false; error: unknown };

/**
 * Runs enqueued jobs immediately in this process. `drain` waits for everything enqueued so far.
 */
export class InProcessQueue implements QueuePort {
  private pending: Promise<Settled>[] = [];

  constructor(private readonly orchestrator: StageOrchestratorService) {}

  async enqueue(payload: RunPayload): Promise<void> {
    this.pending.push(
      this.orchestrator.run(payload.jobKey).then(
        (outcome): Settled => ({ ok: true, outcome }),
        (error: unknown): Settled => ({ ok: false, error }),
      ),
    );
  }

  async drain(): Promise<RunOutcome[]> {
    const settled = await Promise.all(this.pending);
    this.pending = [];

    const outcomes: RunOutcome[] = [];
    for (const item of settled) {
      if (!item.ok) {
        throw item.error;
      }
      outcomes.push(item.outcome);
    }
    return outcomes;
  }
}
