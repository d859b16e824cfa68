import { randomUUID } from "node:crypto";
import type {
  ClockPort,
  RunIdGeneratorPort,
} from "../../core/ports/outboundPorts";

/**
 * Wall-clock boundary; tests pass a fixed clock instead.
 */
export class SystemClock implements ClockPort {
  now(): Date {
    return new Date();
  }
}

/**
 * Issues process-run ids.
 */
export class UuidRunIdGenerator implements RunIdGeneratorPort {
  next(): string {
    return randomUUID();
  }
}
