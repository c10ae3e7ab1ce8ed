import { err, ok, type Result } from "neverthrow";
import { describe, expect, it } from "vitest";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { ClockPort } from "../../core/ports/outboundPorts";
import { CallPolicy, type CallPolicyOptions } from "./callPolicy";

const unavailable: AppBoundaryError = {
  source: "oracle",
  code: "provider_error",
  provider: "fake",
  message: "HTTP request failed with status 503.",
  retryable: true,
  httpStatus: 503,
};

const badKey: AppBoundaryError = {
  source: "oracle",
  code: "auth_invalid",
  provider: "fake",
  message: "HTTP request failed with status 401.",
  retryable: false,
  httpStatus: 401,
};

class ManualClock implements ClockPort {
  constructor(private current: number) {}

  now(): Date {
    return new Date(this.current);
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

const baseOptions: CallPolicyOptions = {
  name: "oracle",
  source: "oracle",
  maxAttempts: 3,
  baseDelayMs: 100,
  timeoutMs: 1_000,
};

const sequence = (
  results: Array<Result<string, AppBoundaryError>>,
): { calls: () => number; operation: () => Promise<Result<string, AppBoundaryError>> } => {
  let index = 0;
  return {
    calls: () => index,
    operation: async () => {
      const result = results[Math.min(index, results.length - 1)] ?? ok("done");
      index += 1;
      return result;
    },
  };
};

describe("CallPolicy", () => {
  it("retries retryable failures with exponential backoff", async () => {
    const sleeps: number[] = [];
    const policy = new CallPolicy(
      baseOptions,
      new ManualClock(0),
      async (ms) => {
        sleeps.push(ms);
      },
    );
    const calls = sequence([err(unavailable), err(unavailable), ok("answer")]);

    const result = await policy.execute(calls.operation);

    expect(result.isOk()).toBe(true);
    expect(calls.calls()).toBe(3);
    expect(sleeps).toEqual([100, 200]);
  });

  it("caps backoff at maxDelayMs", async () => {
    const sleeps: number[] = [];
    const policy = new CallPolicy(
      { ...baseOptions, maxAttempts: 4, maxDelayMs: 250 },
      new ManualClock(0),
      async (ms) => {
        sleeps.push(ms);
      },
    );
    const calls = sequence([err(unavailable)]);

    const result = await policy.execute(calls.operation);

    expect(result.isErr()).toBe(true);
    expect(calls.calls()).toBe(4);
    expect(sleeps).toEqual([100, 200, 250]);
  });

  it("returns non-retryable failures after one attempt", async () => {
    const policy = new CallPolicy(baseOptions, new ManualClock(0), async () => {});
    const calls = sequence([err(badKey), ok("never")]);

    const result = await policy.execute(calls.operation);

    expect(calls.calls()).toBe(1);
    expect(result.isErr() && result.error.code).toBe("auth_invalid");
  });

  it("turns a slow call into a retryable timeout", async () => {
    const policy = new CallPolicy(
      { ...baseOptions, maxAttempts: 1, timeoutMs: 10 },
      new ManualClock(0),
      async () => {},
    );

    const result = await policy.execute(
      () => new Promise<Result<string, AppBoundaryError>>(() => {}),
    );

    if (result.isOk()) {
      throw new Error("expected timeout");
    }
    expect(result.error.code).toBe("timeout");
    expect(result.error.retryable).toBe(true);
  });

  it("starts no further attempt once the signal aborts", async () => {
    const controller = new AbortController();
    const policy = new CallPolicy(baseOptions, new ManualClock(0), async () => {
      controller.abort();
    });
    const calls = sequence([err(unavailable), ok("late")]);

    const result = await policy.execute(calls.operation, controller.signal);

    expect(calls.calls()).toBe(1);
    expect(result.isErr() && result.error).toEqual(unavailable);
  });

  it("skips the call entirely when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const policy = new CallPolicy(baseOptions, new ManualClock(0), async () => {});
    const calls = sequence([ok("never")]);

    const result = await policy.execute(calls.operation, controller.signal);

    expect(calls.calls()).toBe(0);
    expect(result.isErr() && result.error).toEqual({
      source: "oracle",
      code: "timeout",
      provider: "oracle",
      message: "oracle call cancelled before it started.",
      retryable: false,
    });
  });

  it("maps a thrown operation to a transport error", async () => {
    const policy = new CallPolicy(
      { ...baseOptions, maxAttempts: 1 },
      new ManualClock(0),
      async () => {},
    );

    const result = await policy.execute(async () => {
      throw new Error("socket hang up");
    });

    if (result.isOk()) {
      throw new Error("expected transport error");
    }
    expect(result.error).toMatchObject({
      code: "transport_error",
      message: "socket hang up",
      retryable: true,
    });
  });

  describe("with a circuit breaker", () => {
    const breakerOptions: CallPolicyOptions = {
      ...baseOptions,
      maxAttempts: 1,
      breaker: { failureThreshold: 3, cooldownMs: 60_000 },
    };

    it("opens after the threshold and fails fast inside the cool-down", async () => {
      const clock = new ManualClock(0);
      const policy = new CallPolicy(breakerOptions, clock, async () => {});
      const calls = sequence([err(unavailable)]);

      for (let i = 0; i < 3; i += 1) {
        await policy.execute(calls.operation);
      }
      expect(policy.circuitState()).toBe("open");

      clock.advance(30_000);
      const blocked = await policy.execute(calls.operation);

      expect(calls.calls()).toBe(3);
      if (blocked.isOk()) {
        throw new Error("expected circuit_open");
      }
      expect(blocked.error.code).toBe("circuit_open");
      expect(blocked.error.message).toBe(
        "oracle is unavailable; retry after 30000ms.",
      );
    });

    it("lets one trial through after the cool-down and closes on success", async () => {
      const clock = new ManualClock(0);
      const policy = new CallPolicy(breakerOptions, clock, async () => {});
      const calls = sequence([
        err(unavailable),
        err(unavailable),
        err(unavailable),
        ok("recovered"),
      ]);

      for (let i = 0; i < 3; i += 1) {
        await policy.execute(calls.operation);
      }

      clock.advance(60_000);
      expect(policy.circuitState()).toBe("half_open");

      const trial = await policy.execute(calls.operation);

      expect(trial.isOk() && trial.value).toBe("recovered");
      expect(calls.calls()).toBe(4);
      expect(policy.circuitState()).toBe("closed");
    });

    it("re-opens when the trial call fails", async () => {
      const clock = new ManualClock(0);
      const policy = new CallPolicy(breakerOptions, clock, async () => {});
      const calls = sequence([err(unavailable)]);

      for (let i = 0; i < 3; i += 1) {
        await policy.execute(calls.operation);
      }

      clock.advance(60_000);
      await policy.execute(calls.operation);

      expect(calls.calls()).toBe(4);
      expect(policy.circuitState()).toBe("open");
    });

    it("does not count non-retryable failures toward the threshold", async () => {
      const policy = new CallPolicy(breakerOptions, new ManualClock(0), async () => {});
      const calls = sequence([err(badKey)]);

      for (let i = 0; i < 5; i += 1) {
        await policy.execute(calls.operation);
      }

      expect(calls.calls()).toBe(5);
      expect(policy.circuitState()).toBe("closed");
    });
  });
});
