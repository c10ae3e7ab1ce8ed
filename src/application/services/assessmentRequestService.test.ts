import { describe, expect, it } from "vitest";
import type {
  AnalysisJob,
  StageFailureRecord,
} from "../../core/entities/assessment";
import type {
  ClockPort,
  QueuePort,
  RunPayload,
} from "../../core/ports/outboundPorts";
import { InMemoryCheckpointStore } from "../../infra/memory/inMemoryCheckpointStore";
import {
  AssessmentRequestService,
  describeJob,
} from "./assessmentRequestService";

const now = new Date("2024-07-01T08:00:00.000Z");
const clock: ClockPort = { now: () => now };

class RecordingQueue implements QueuePort {
  readonly payloads: RunPayload[] = [];

  async enqueue(payload: RunPayload): Promise<void> {
    this.payloads.push(payload);
  }
}

const storedJob = (overrides: Partial<AnalysisJob> = {}): AnalysisJob => ({
  key: "1101-2024",
  companyCode: "1101",
  companyName: "Acme Cement",
  companyDomains: [],
  period: "2024",
  stage: "claim_extraction",
  artifacts: {},
  createdAt: new Date("2024-06-30T00:00:00.000Z"),
  updatedAt: new Date("2024-06-30T00:00:00.000Z"),
  stageEnteredAt: new Date("2024-06-30T00:00:00.000Z"),
  ...overrides,
});

const failure = (code: string, message: string): StageFailureRecord => ({
  stage: "claim_extraction",
  code,
  message,
  retryable: code !== "malformed_output",
  at: "2024-06-30T00:00:00.000Z",
});

const setup = async (existing?: AnalysisJob) => {
  const store = new InMemoryCheckpointStore();
  if (existing) {
    await store.createIfAbsent(existing);
  }
  const queue = new RecordingQueue();
  return { store, queue, service: new AssessmentRequestService(store, queue, clock) };
};

const request = {
  companyCode: "1101",
  companyName: "Acme Cement",
  period: "2024",
};

describe("AssessmentRequestService", () => {
  it("creates a normalized job at the first stage and enqueues it", async () => {
    const { store, queue, service } = await setup();

    const outcome = await service.request({
      companyCode: " 1101 ",
      companyName: " Acme Cement ",
      period: "2024 ",
      industry: "  ",
      companyDomains: [" ACME.example ", ""],
    });

    expect(outcome.status).toBe("created");
    expect(await store.load("1101-2024")).toEqual({
      key: "1101-2024",
      companyCode: "1101",
      companyName: "Acme Cement",
      industry: undefined,
      companyDomains: ["acme.example"],
      period: "2024",
      stage: "fetching",
      artifacts: {},
      createdAt: now,
      updatedAt: now,
      stageEnteredAt: now,
    });
    expect(queue.payloads).toEqual([
      { jobKey: "1101-2024", requestedAt: "2024-07-01T08:00:00.000Z" },
    ]);
  });

  it("resumes a stored job from its checkpoint", async () => {
    const { queue, service } = await setup(storedJob());

    const outcome = await service.request(request);

    expect(outcome.status).toBe("resumed");
    expect(outcome.job.stage).toBe("claim_extraction");
    expect(queue.payloads).toHaveLength(1);
  });

  it("resumes a job whose lease has expired", async () => {
    const { queue, service } = await setup(
      storedJob({
        leaseOwner: "worker-1",
        leaseExpiresAt: new Date("2024-07-01T07:59:00.000Z"),
      }),
    );

    const outcome = await service.request(request);

    expect(outcome.status).toBe("resumed");
    expect(queue.payloads).toHaveLength(1);
  });

  it("reports a leased job as in progress without enqueueing", async () => {
    const { queue, service } = await setup(
      storedJob({
        leaseOwner: "worker-1",
        leaseExpiresAt: new Date("2024-07-01T08:05:00.000Z"),
      }),
    );

    const outcome = await service.request(request);

    expect(outcome.status).toBe("in_progress");
    expect(queue.payloads).toEqual([]);
  });

  it("returns a persisted job as completed without enqueueing", async () => {
    const { queue, service } = await setup(storedJob({ stage: "persisted" }));

    const outcome = await service.request(request);

    expect(outcome.status).toBe("completed");
    expect(queue.payloads).toEqual([]);
  });

  it("describes an unknown job as not found", async () => {
    const { service } = await setup();

    expect(await service.describe("2330", "2024")).toEqual({
      state: "not_found",
      key: "2330-2024",
      message: "No assessment on record.",
    });
  });
});

describe("describeJob", () => {
  it("reports a persisted job as completed", () => {
    expect(describeJob(storedJob({ stage: "persisted" }), now)).toMatchObject({
      state: "completed",
      stageLabel: "Persisted",
      message: "Assessment completed.",
    });
  });

  it("reports oracle outages as temporarily unavailable", () => {
    const view = describeJob(
      storedJob({ lastFailure: failure("oracle_unavailable", "circuit open") }),
      now,
    );

    expect(view).toMatchObject({
      state: "temporarily_unavailable",
      message: "Analysis service temporarily unavailable, retry later.",
    });
  });

  it("reports malformed output as needing attention", () => {
    const view = describeJob(
      storedJob({
        lastFailure: failure(
          "malformed_output",
          "Oracle returned no claims for the report.",
        ),
      }),
      now,
    );

    expect(view).toMatchObject({
      state: "needs_attention",
      message: "Stopped at Claim extraction: Oracle returned no claims for the report.",
    });
  });

  it("reports a leased job as in progress even after an earlier failure", () => {
    const view = describeJob(
      storedJob({
        lastFailure: failure("rate_limited", "slow down"),
        leaseOwner: "worker-1",
        leaseExpiresAt: new Date("2024-07-01T08:05:00.000Z"),
      }),
      now,
    );

    expect(view).toMatchObject({
      state: "in_progress",
      stage: "claim_extraction",
      message: "In progress: Claim extraction.",
    });
  });
});
