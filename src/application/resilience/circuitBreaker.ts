import type { ClockPort } from "../../core/ports/outboundPorts";

export type CircuitState = "closed" | "open" | "half_open";

export type CircuitBreakerOptions = {
  failureThreshold: number;
  cooldownMs: number;
};

/**
 * Counts consecutive transient failures and short-circuits calls for a cool-down window.
 * After the window a single trial call is let through; its outcome closes or re-opens the circuit.
 */
export class CircuitBreaker {
  private consecutiveFailures = 0;
  private openedAt: number | null = null;
  private trialInFlight = false;

  constructor(
    private readonly options: CircuitBreakerOptions,
    private readonly clock: ClockPort,
  ) {}

  state(): CircuitState {
    if (this.openedAt === null) {
      return "closed";
    }

    return this.cooldownElapsed() ? "half_open" : "open";
  }

  /**
   * Reserves the right to call the dependency. Returns false while open.
   */
  tryAcquire(): boolean {
    const state = this.state();
    if (state === "closed") {
      return true;
    }

    if (state === "open" || this.trialInFlight) {
      return false;
    }

    this.trialInFlight = true;
    return true;
  }

  recordSuccess(): void {
    this.consecutiveFailures = 0;
    this.openedAt = null;
    this.trialInFlight = false;
  }

  recordFailure(): void {
    const wasTrial = this.trialInFlight;
    this.trialInFlight = false;
    this.consecutiveFailures += 1;

    if (wasTrial || this.consecutiveFailures >= this.options.failureThreshold) {
      this.openedAt = this.clock.now().getTime();
    }
  }

  /**
   * Non-transient outcomes (bad credentials, bad request) say nothing about availability.
   */
  release(): void {
    this.trialInFlight = false;
  }

  retryAfterMs(): number {
    if (this.openedAt === null) {
      return 0;
    }

    return Math.max(
      0,
      this.openedAt + this.options.cooldownMs - this.clock.now().getTime(),
    );
  }

  private cooldownElapsed(): boolean {
    return this.retryAfterMs() === 0;
  }
}
