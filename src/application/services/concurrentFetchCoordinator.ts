import pLimit from "p-limit";
import type {
  SearchHit,
  SearchTopic,
  TopicOutcome,
} from "../../core/entities/assessment";
import type { SearchProviderPort } from "../../core/ports/inboundPorts";
import { logger } from "../../shared/logger/logger";
import type { CallPolicy } from "../resilience/callPolicy";
import type { FallbackQueryPlanner } from "./fallbackQueryPlanner";

type Limit = ReturnType<typeof pLimit>;

export type ConcurrentFetchCoordinatorOptions = {
  poolSize: number;
  taskTimeoutMs: number;
  resultLimit: number;
};

type TaskProgress = {
  queriesTried: string[];
};

/**
 * Runs one fallback-search task per topic on a bounded pool. Tasks queue for a free slot
 * instead of opening more connections, and one topic failing never fails the batch.
 */
export class ConcurrentFetchCoordinator {
  private readonly limit: Limit;

  constructor(
    private readonly searchProvider: SearchProviderPort,
    private readonly planner: FallbackQueryPlanner,
    private readonly searchPolicy: CallPolicy,
    private readonly options: ConcurrentFetchCoordinatorOptions,
  ) {
    this.limit = pLimit(Math.max(1, Math.floor(options.poolSize)));
  }

  /**
   * Resolves once every topic has an outcome. Outcomes are merged only after all tasks report.
   */
  async fetchAll(topics: SearchTopic[]): Promise<Map<string, TopicOutcome>> {
    const settled = await Promise.allSettled(
      topics.map((topic) => this.limit(() => this.runWithTimeout(topic))),
    );

    const outcomes = new Map<string, TopicOutcome>();
    settled.forEach((result, index) => {
      const topic = topics[index];
      if (!topic) {
        return;
      }

      if (result.status === "fulfilled") {
        outcomes.set(topic.id, result.value);
        return;
      }

      outcomes.set(topic.id, {
        status: "fetch_error",
        topicId: topic.id,
        reason:
          result.reason instanceof Error
            ? result.reason.message
            : String(result.reason),
        queriesTried: [],
      });
    });

    logger.debug(
      {
        topicCount: topics.length,
        resolved: [...outcomes.values()].filter((o) => o.status === "resolved")
          .length,
        pending: this.limit.pendingCount,
      },
      "Fetch batch collected",
    );

    return outcomes;
  }

  /**
   * Holds its pool slot until the search chain has settled. The timeout only cancels
   * further work and picks the outcome, so a late search never runs outside the pool.
   */
  private async runWithTimeout(topic: SearchTopic): Promise<TopicOutcome> {
    const progress: TaskProgress = { queriesTried: [] };
    const controller = new AbortController();
    const timer = setTimeout(
      () => controller.abort(),
      this.options.taskTimeoutMs,
    );

    try {
      const outcome = await this.runTiers(topic, progress, controller.signal);
      if (!controller.signal.aborted) {
        return outcome;
      }

      return {
        status: "fetch_error",
        topicId: topic.id,
        reason: `Topic search exceeded ${this.options.taskTimeoutMs}ms.`,
        queriesTried: [...progress.queriesTried],
      };
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Consumes tiers strictly in order and stops at the first one with results.
   */
  private async runTiers(
    topic: SearchTopic,
    progress: TaskProgress,
    signal: AbortSignal,
  ): Promise<TopicOutcome> {
    const tiers = this.planner.plan(topic);

    for (const tier of tiers) {
      if (signal.aborted) {
        break;
      }

      progress.queriesTried.push(tier.query);
      const result = await this.searchPolicy.execute(
        () =>
          this.searchProvider.search({
            query: tier.query,
            limit: this.options.resultLimit,
            signal,
          }),
        signal,
      );

      if (result.isErr()) {
        logger.warn(
          {
            topicId: topic.id,
            tier: tier.tier,
            code: result.error.code,
            provider: result.error.provider,
          },
          "Topic search failed",
        );
        return {
          status: "fetch_error",
          topicId: topic.id,
          reason: result.error.message,
          queriesTried: [...progress.queriesTried],
        };
      }

      const hits = result.value.filter(
        (hit: SearchHit) => hit.url.trim().length > 0,
      );
      if (hits.length > 0) {
        return {
          status: "resolved",
          topicId: topic.id,
          tier: tier.tier,
          query: tier.query,
          hits,
        };
      }
    }

    return {
      status: "no_evidence",
      topicId: topic.id,
      queriesTried: [...progress.queriesTried],
    };
  }
}
