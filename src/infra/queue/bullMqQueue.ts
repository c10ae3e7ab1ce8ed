import { Queue, type WorkerOptions, Worker } from "bullmq";
import type { RedisOptions } from "ioredis";
import type { QueuePort, RunPayload } from "../../core/ports/outboundPorts";
import { queueNames } from "./queues";

export type QueueCounts = {
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
  paused: number;
};

const QUEUE_RETRIES = 4;

export const defaultJobOptions = {
  attempts: QUEUE_RETRIES + 1,
  removeOnComplete: 250,
  removeOnFail: 1_000,
  backoff: {
    type: "exponential",
    delay: 30_000,
  },
} as const;

/**
 * BullMQ custom job ids cannot contain colons; job keys and ISO timestamps are reduced to
 * hyphenated forms.
 */
export const runJobId = (payload: RunPayload): string => {
  const requestedAtMs = Date.parse(payload.requestedAt);
  return `${payload.jobKey}-${Number.isFinite(requestedAtMs) ? requestedAtMs : 0}`;
};

/**
 * Wraps BullMQ so application code depends on queue intent rather than queue vendor details.
 */
export class BullMqQueue implements QueuePort {
  private readonly queue: Queue<RunPayload>;

  constructor(private readonly connection: RedisOptions) {
    this.queue = new Queue<RunPayload>(queueNames.run, {
      connection: this.connection,
      defaultJobOptions,
    });
  }

  async enqueue(payload: RunPayload): Promise<void> {
    const jobId = runJobId(payload);
    await this.queue.add(jobId, payload, { jobId });
  }

  async close(): Promise<void> {
    await this.queue.close();
  }

  async getQueueCounts(): Promise<QueueCounts> {
    const counts = await this.queue.getJobCounts(
      "waiting",
      "active",
      "completed",
      "failed",
      "delayed",
      "paused",
    );

    return {
      waiting: counts.waiting ?? 0,
      active: counts.active ?? 0,
      completed: counts.completed ?? 0,
      failed: counts.failed ?? 0,
      delayed: counts.delayed ?? 0,
      paused: counts.paused ?? 0,
    };
  }
}

/**
 * Standardizes worker creation so run consumers share retry and concurrency conventions.
 */
export const createRunWorker = (
  connection: RedisOptions,
  concurrency: number,
  processor: (payload: RunPayload) => Promise<void>,
) => {
  const options: WorkerOptions = {
    connection,
    concurrency,
  };

  return new Worker<RunPayload>(
    queueNames.run,
    async (job) => {
      await processor(job.data);
    },
    options,
  );
};
