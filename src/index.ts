export { TimeReporter, TIME_REPORT_SCOPE, TIME_REPORT_TARGET, DEFAULT_WIDTH, DEFAULT_PRECISION } from "./domain/timeReport/TimeReporter";
export type { TimeReporterDeps, TimeReporterOptions } from "./domain/timeReport/TimeReporter";
export { TimeReporterBuilder } from "./domain/timeReport/TimeReporterBuilder";
export { withTimeReport, withTimeReportAsync } from "./domain/timeReport/scope";
export type { ReporterSource } from "./domain/timeReport/scope";
export { Level, isEnabled, parseLevel } from "./domain/timeReport/Level";
export { PrintOrder, parsePrintOrder } from "./domain/timeReport/PrintOrder";
export { orderEntries, formatSeconds, renderReport, toFixedHalfEven, MAX_PRECISION, MAX_WIDTH } from "./domain/timeReport/formatReport";
export type { ReportEntry, RenderOptions } from "./domain/timeReport/formatReport";
export type { TimeReportEvent } from "./domain/timeReport/TimeReportEvent";
export { Topics } from "./domain/events/EventBus";
export type { EventBus, Subscription } from "./domain/events/EventBus";
export type { ClockPort } from "./ports/sys/ClockPort";
export type { EventSinkPort } from "./ports/sys/EventSinkPort";
export type { LoggerPort } from "./ports/sys/LoggerPort";
export { HrtimeClock } from "./adapters/sys/HrtimeClock";
export { PerformanceClock } from "./adapters/sys/PerformanceClock";
export { ConsoleLogger } from "./adapters/sys/ConsoleLogger";
export { LoggerEventSink } from "./adapters/sys/LoggerEventSink";
export { EventBusSink } from "./adapters/sys/EventBusSink";
export { SimpleEventBus } from "./adapters/sys/SimpleEventBus";
export {
  ClockKind,
  createClock,
  createTimeReporter,
  createTimeReporterWithLevel,
  timeReporterBuilder,
  setDefaultSink,
} from "./composition/defaults";
export type { DefaultedReporterOptions } from "./composition/defaults";
export { buildTimeReporting } from "./composition/container";
export type { TimeReporting, TimeReportingOptions } from "./composition/container";
export { loadConfig, resolveReporterDefaults } from "./config";
export type { ReporterConfig, ReporterDefaults } from "./config";
export { initializeLogging } from "./runtime/logging";
