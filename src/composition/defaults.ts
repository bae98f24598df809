import type { ClockPort } from "../ports/sys/ClockPort";
import type { EventSinkPort } from "../ports/sys/EventSinkPort";
import { HrtimeClock } from "../adapters/sys/HrtimeClock";
import { PerformanceClock } from "../adapters/sys/PerformanceClock";
import { ConsoleLogger } from "../adapters/sys/ConsoleLogger";
import { LoggerEventSink } from "../adapters/sys/LoggerEventSink";
import type { Level } from "../domain/timeReport/Level";
import { TimeReporter, type TimeReporterOptions } from "../domain/timeReport/TimeReporter";
import { TimeReporterBuilder } from "../domain/timeReport/TimeReporterBuilder";

export const ClockKind = {
  Hrtime: "hrtime",
  Performance: "performance",
} as const;

export type ClockKind = (typeof ClockKind)[keyof typeof ClockKind];

export function isClockKind(value: unknown): value is ClockKind {
  return value === ClockKind.Hrtime || value === ClockKind.Performance;
}

export function createClock(kind: ClockKind = ClockKind.Hrtime): ClockPort {
  return kind === ClockKind.Performance ? new PerformanceClock() : new HrtimeClock();
}

let sharedClock: ClockPort | null = null;
let sharedSink: EventSinkPort | null = null;

export function defaultClock(): ClockPort {
  if (!sharedClock) sharedClock = new HrtimeClock();
  return sharedClock;
}

/** Sink used by reporters built without one: console output at info and above. */
export function defaultSink(): EventSinkPort {
  if (!sharedSink) sharedSink = new LoggerEventSink(new ConsoleLogger());
  return sharedSink;
}

/** Replaces the sink handed to reporters built without one. Pass null to restore the console sink. */
export function setDefaultSink(sink: EventSinkPort | null): void {
  sharedSink = sink;
}

export type DefaultedReporterOptions = Omit<TimeReporterOptions, "clock" | "sink"> & Partial<Pick<TimeReporterOptions, "clock" | "sink">>;

/** A reporter on the shared clock and the default sink unless `options` names others. */
export function createTimeReporter(name: string, options: DefaultedReporterOptions = {}): TimeReporter {
  return new TimeReporter(name, {
    ...options,
    clock: options.clock ?? defaultClock(),
    sink: options.sink ?? defaultSink(),
  });
}

export function createTimeReporterWithLevel(
  name: string,
  level: Level,
  options: Omit<DefaultedReporterOptions, "level"> = {}
): TimeReporter {
  return createTimeReporter(name, { ...options, level });
}

export function timeReporterBuilder(name: string): TimeReporterBuilder {
  return new TimeReporterBuilder(name, { clock: defaultClock(), sink: defaultSink() });
}
