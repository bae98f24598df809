import type { ClockPort } from "../../ports/sys/ClockPort";

export class HrtimeClock implements ClockPort {
  now(): bigint {
    return process.hrtime.bigint();
  }
}
