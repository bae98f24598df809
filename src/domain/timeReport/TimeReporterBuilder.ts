import type { ClockPort } from "../../ports/sys/ClockPort";
import type { EventSinkPort } from "../../ports/sys/EventSinkPort";
import { Level } from "./Level";
import { DEFAULT_PRINT_ORDER, type PrintOrder } from "./PrintOrder";
import { DEFAULT_PRECISION, DEFAULT_WIDTH, TimeReporter, type TimeReporterDeps } from "./TimeReporter";

export class TimeReporterBuilder {
  private levelValue: Level = Level.INFO;
  private printOrderValue: PrintOrder = DEFAULT_PRINT_ORDER;
  private widthValue = DEFAULT_WIDTH;
  private precisionValue = DEFAULT_PRECISION;
  private clockValue: ClockPort;
  private sinkValue: EventSinkPort;

  constructor(
    readonly name: string,
    deps: TimeReporterDeps
  ) {
    this.clockValue = deps.clock;
    this.sinkValue = deps.sink;
  }

  /** Each call returns a new reporter with no recorded time. */
  build(): TimeReporter {
    return new TimeReporter(this.name, {
      level: this.levelValue,
      printOrder: this.printOrderValue,
      width: this.widthValue,
      precision: this.precisionValue,
      clock: this.clockValue,
      sink: this.sinkValue,
    });
  }

  level(level: Level): this {
    this.levelValue = level;
    return this;
  }

  printOrder(printOrder: PrintOrder): this {
    this.printOrderValue = printOrder;
    return this;
  }

  /**
   * Minimum width of each rendered total. Totals are left-aligned and padded
   * with spaces; anything below `precision + 2` has no effect.
   */
  width(width: number): this {
    this.widthValue = width;
    return this;
  }

  /** Digits after the decimal point of each rendered total, in seconds. */
  precision(precision: number): this {
    this.precisionValue = precision;
    return this;
  }

  clock(clock: ClockPort): this {
    this.clockValue = clock;
    return this;
  }

  sink(sink: EventSinkPort): this {
    this.sinkValue = sink;
    return this;
  }
}
