import { err, type Result } from "neverthrow";
import type {
  AppBoundaryError,
  AppBoundarySource,
} from "../../core/entities/appError";
import type { ClockPort } from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";
import { CircuitBreaker, type CircuitBreakerOptions } from "./circuitBreaker";

export type CallPolicyOptions = {
  name: string;
  source: AppBoundarySource;
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  timeoutMs: number;
  breaker?: CircuitBreakerOptions;
};

export type Sleep = (ms: number) => Promise<void>;

export const delay: Sleep = async (ms) => {
  await new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
};

const systemClock: ClockPort = { now: () => new Date() };

/**
 * One retry/backoff/timeout/circuit-breaker policy shared by every external dependency.
 * Each dependency gets its own instance so breaker state is never shared between them.
 */
export class CallPolicy {
  private readonly breaker: CircuitBreaker | null;

  constructor(
    private readonly options: CallPolicyOptions,
    clock: ClockPort = systemClock,
    private readonly sleep: Sleep = delay,
  ) {
    this.breaker = options.breaker
      ? new CircuitBreaker(options.breaker, clock)
      : null;
  }

  get name(): string {
    return this.options.name;
  }

  circuitState() {
    return this.breaker?.state() ?? "closed";
  }

  /**
   * Runs the operation with bounded retries for retryable failures. Timed-out calls are
   * abandoned by the policy but never aborted, so quota already spent is not wasted twice.
   * Once `signal` aborts no further attempt starts.
   */
  async execute<T>(
    operation: () => Promise<Result<T, AppBoundaryError>>,
    signal?: AbortSignal,
  ): Promise<Result<T, AppBoundaryError>> {
    const maxAttempts = Math.max(1, this.options.maxAttempts);
    let lastFailure: AppBoundaryError | null = null;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      if (signal?.aborted) {
        return err(lastFailure ?? this.cancelledError());
      }

      if (this.breaker && !this.breaker.tryAcquire()) {
        return err(this.circuitOpenError());
      }

      const result = await this.withTimeout(operation);
      if (result.isOk()) {
        this.breaker?.recordSuccess();
        return result;
      }

      const failure = result.error;
      lastFailure = failure;
      if (failure.retryable) {
        this.breaker?.recordFailure();
      } else {
        this.breaker?.release();
      }

      if (!failure.retryable || attempt === maxAttempts) {
        return result;
      }

      const backoffMs = this.backoffFor(attempt);
      logger.debug(
        {
          policy: this.options.name,
          attempt,
          backoffMs,
          code: failure.code,
          httpStatus: failure.httpStatus,
        },
        "Retrying external call",
      );
      await this.sleep(backoffMs);
    }

    return err(
      lastFailure ?? {
        source: this.options.source,
        code: "transport_error",
        provider: this.options.name,
        message: "External call exhausted retry attempts.",
        retryable: false,
      },
    );
  }

  private backoffFor(attempt: number): number {
    const exponential = this.options.baseDelayMs * 2 ** (attempt - 1);
    return this.options.maxDelayMs === undefined
      ? exponential
      : Math.min(this.options.maxDelayMs, exponential);
  }

  private cancelledError(): AppBoundaryError {
    return {
      source: this.options.source,
      code: "timeout",
      provider: this.options.name,
      message: `${this.options.name} call cancelled before it started.`,
      retryable: false,
    };
  }

  private circuitOpenError(): AppBoundaryError {
    const retryAfterMs = this.breaker?.retryAfterMs() ?? 0;
    return {
      source: this.options.source,
      code: "circuit_open",
      provider: this.options.name,
      message: `${this.options.name} is unavailable; retry after ${retryAfterMs}ms.`,
      retryable: true,
    };
  }

  private async withTimeout<T>(
    operation: () => Promise<Result<T, AppBoundaryError>>,
  ): Promise<Result<T, AppBoundaryError>> {
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timeout = new Promise<Result<T, AppBoundaryError>>((resolve) => {
      timer = setTimeout(() => {
        resolve(
          err({
            source: this.options.source,
            code: "timeout",
            provider: this.options.name,
            message: `${this.options.name} call exceeded ${this.options.timeoutMs}ms.`,
            retryable: true,
          }),
        );
      }, this.options.timeoutMs);
    });

    const guarded = operation().catch((error: unknown) =>
      err<T, AppBoundaryError>({
        source: this.options.source,
        code: "transport_error",
        provider: this.options.name,
        message:
          error instanceof Error ? error.message : "External call failed.",
        retryable: true,
        cause: error,
      }),
    );

    try {
      return await Promise.race([guarded, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
