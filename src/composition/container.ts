import { loadConfig, resolveReporterDefaults, type ReporterDefaults } from '../config';
import {
  LOG_FILE,
  LOG_LEVEL,
  TIME_REPORT_CLOCK,
  TIME_REPORT_CONFIG,
  TIME_REPORT_LEVEL,
  TIME_REPORT_PRINT_ORDER,
} from '../env';
import { SimpleEventBus } from '../adapters/sys/SimpleEventBus';
import { ConsoleLogger } from '../adapters/sys/ConsoleLogger';
import { EventBusSink } from '../adapters/sys/EventBusSink';
import { LoggerEventSink } from '../adapters/sys/LoggerEventSink';
import { Topics, type EventBus } from '../domain/events/EventBus';
import type { TimeReportEvent } from '../domain/timeReport/TimeReportEvent';
import type { Level } from '../domain/timeReport/Level';
import { TimeReporter } from '../domain/timeReport/TimeReporter';
import { TimeReporterBuilder } from '../domain/timeReport/TimeReporterBuilder';
import type { ClockPort } from '../ports/sys/ClockPort';
import type { EventSinkPort } from '../ports/sys/EventSinkPort';
import type { LoggerPort } from '../ports/sys/LoggerPort';
import { initializeLogging } from '../runtime/logging';
import { createClock } from './defaults';

export interface TimeReportingOptions {
  configPath?: string;
  logFile?: string;
  /** Least severe report level that reaches the logger. */
  minLevel?: Level;
  logger?: LoggerPort;
  clock?: ClockPort;
}

export interface TimeReporting {
  readonly bus: EventBus;
  readonly sink: EventSinkPort;
  readonly clock: ClockPort;
  readonly defaults: ReporterDefaults;
  readonly logPath?: string;
  builder(name: string): TimeReporterBuilder;
  reporter(name: string): TimeReporter;
  shutdown(): Promise<void>;
}

export function buildTimeReporting(options: TimeReportingOptions = {}): TimeReporting {
  const { config, path: configPath } = loadConfig(options.configPath ?? TIME_REPORT_CONFIG);
  const loggingHandle = initializeLogging(options.logFile ?? LOG_FILE);
  if (loggingHandle.logPath) {
    console.log(`Logging output to ${loggingHandle.logPath}`);
  }
  if (configPath) {
    console.log(`Loaded time report config from ${configPath}`);
  }

  const defaults = resolveReporterDefaults(config, {
    level: TIME_REPORT_LEVEL,
    printOrder: TIME_REPORT_PRINT_ORDER,
    clock: TIME_REPORT_CLOCK,
  });

  const bus = new SimpleEventBus();
  const clock = options.clock ?? createClock(defaults.clock);
  const sink = new EventBusSink(bus);
  const loggerSink = new LoggerEventSink(options.logger ?? new ConsoleLogger(), {
    minLevel: options.minLevel ?? LOG_LEVEL,
  });

  const subscription = bus.subscribe<TimeReportEvent>(Topics.TimeReportEmitted, (event) => {
    loggerSink.emit(event.scope, event.target, event.level, event.message);
  });

  const builder = (name: string) =>
    new TimeReporterBuilder(name, { clock, sink })
      .level(defaults.level)
      .printOrder(defaults.printOrder)
      .width(defaults.width)
      .precision(defaults.precision);

  return {
    bus,
    sink,
    clock,
    defaults,
    logPath: loggingHandle.logPath,
    builder,
    reporter: (name: string) => builder(name).build(),
    shutdown: () => {
      subscription.unsubscribe();
      return loggingHandle.shutdown();
    },
  };
}
