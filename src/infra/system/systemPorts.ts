import { randomUUID } from "node:crypto";
import type {
  ClockPort,
  IdGeneratorPort,
} from "../../core/ports/outboundPorts";

/**
 * Adapts wall-clock access so time-sensitive logic remains deterministic in tests.
 */
export class SystemClock implements ClockPort {
  now(): Date {
    return new Date();
  }
}

/**
 * Lease owners and other opaque ids.
 */
export class UuidIdGenerator implements IdGeneratorPort {
  next(): string {
    return randomUUID();
  }
}
