import type { ClockPort } from "../../core/ports/outboundPorts";

/**
 * Adapts wall-clock access so snapshot dates and extraction timestamps stay deterministic in tests.
 */
export class SystemClock implements ClockPort {
  now(): Date {
    return new Date();
  }
}
