import { performance } from "perf_hooks";
import type { ClockPort } from "../../ports/sys/ClockPort";

/**
 * Reads `performance.now()`, which is monotonic and cheaper than hrtime on
 * some platforms but only microsecond-accurate.
 */
export class PerformanceClock implements ClockPort {
  now(): bigint {
    return BigInt(Math.round(performance.now() * 1e6));
  }
}
