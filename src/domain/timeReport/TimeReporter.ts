import type { ClockPort } from "../../ports/sys/ClockPort";
import type { EventSinkPort } from "../../ports/sys/EventSinkPort";
import { Level } from "./Level";
import { DEFAULT_PRINT_ORDER, type PrintOrder } from "./PrintOrder";
import { MAX_PRECISION, MAX_WIDTH, normalizeCount, renderReport } from "./formatReport";

export const TIME_REPORT_SCOPE = "time-report";
export const TIME_REPORT_TARGET = "tracing-perf";

export const DEFAULT_WIDTH = 11;
export const DEFAULT_PRECISION = 9;

export interface TimeReporterDeps {
  clock: ClockPort;
  sink: EventSinkPort;
}

export interface TimeReporterOptions extends TimeReporterDeps {
  level?: Level;
  printOrder?: PrintOrder;
  width?: number;
  precision?: number;
}

interface OpenInterval {
  key: string;
  startedAt: bigint;
}

/**
 * Collects the total time spent on a set of activities and reports it once.
 *
 * `start(key)` switches the running activity; the time since the previous
 * `start` is added to the previous key. `finish()` folds whatever is still
 * running and emits a single report through the sink. Wrap the unit of work
 * in `withTimeReport` to get the report on every exit path.
 */
export class TimeReporter {
  readonly name: string;
  readonly level: Level;
  readonly printOrder: PrintOrder;
  readonly width: number;
  readonly precision: number;

  private readonly times = new Map<string, bigint>();
  private current: OpenInterval | null = null;
  private finished = false;
  private readonly clock: ClockPort;
  private readonly sink: EventSinkPort;

  constructor(name: string, options: TimeReporterOptions) {
    this.name = name;
    this.level = options.level ?? Level.INFO;
    this.printOrder = options.printOrder ?? DEFAULT_PRINT_ORDER;
    this.width = normalizeCount(options.width ?? DEFAULT_WIDTH, MAX_WIDTH);
    this.precision = normalizeCount(options.precision ?? DEFAULT_PRECISION, MAX_PRECISION);
    this.clock = options.clock;
    this.sink = options.sink;
  }

  static withLevel(name: string, level: Level, options: Omit<TimeReporterOptions, "level">): TimeReporter {
    return new TimeReporter(name, { ...options, level });
  }

  get isFinished(): boolean {
    return this.finished;
  }

  /**
   * Start counting time for `key`, ending the interval of the activity that
   * was running before, if any.
   */
  start(key: string): void {
    if (this.finished) return;
    const now = this.clock.now();
    this.saveCurrent(now);
    this.current = { key, startedAt: now };
  }

  /** `start(key)` followed by `work()`, for use inside expressions. */
  startWith<R>(key: string, work: () => R): R {
    this.start(key);
    return work();
  }

  stop(): void {
    if (this.finished) return;
    this.saveCurrent(this.clock.now());
  }

  /** Folds the running interval and emits the report. Only the first call has any effect. */
  finish(): void {
    if (this.finished) return;
    this.stop();
    this.finished = true;
    try {
      this.sink.emit(TIME_REPORT_SCOPE, TIME_REPORT_TARGET, this.level, this.render());
    } catch (err) {
      console.warn(`Time report sink failed for ${this.name}:`, err);
    }
  }

  totals(): Map<string, bigint> {
    return new Map(this.times);
  }

  toString(): string {
    return renderReport(this.name, this.times, {
      printOrder: this.printOrder,
      width: this.width,
      precision: this.precision,
    });
  }

  private render(): string {
    try {
      return this.toString();
    } catch (err) {
      console.warn(`Time report for ${this.name} rendered without padding:`, err);
      return renderReport(this.name, this.times, { printOrder: this.printOrder, width: 0, precision: this.precision });
    }
  }

  private saveCurrent(now: bigint) {
    const open = this.current;
    if (!open) return;
    this.current = null;
    const elapsed = now > open.startedAt ? now - open.startedAt : 0n;
    this.times.set(open.key, (this.times.get(open.key) ?? 0n) + elapsed);
  }
}
