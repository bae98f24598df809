import type { EventSinkPort } from "../../ports/sys/EventSinkPort";
import type { LoggerPort } from "../../ports/sys/LoggerPort";
import { isEnabled, Level } from "../../domain/timeReport/Level";

export interface LoggerEventSinkOptions {
  /** Least severe level that is written. Defaults to info. */
  minLevel?: Level;
}

export class LoggerEventSink implements EventSinkPort {
  private readonly minLevel: Level;

  constructor(
    private readonly logger: LoggerPort,
    options: LoggerEventSinkOptions = {}
  ) {
    this.minLevel = options.minLevel ?? Level.INFO;
  }

  emit(scope: string, target: string, level: Level, message: string): void {
    if (!isEnabled(level, this.minLevel)) return;
    this.logger[level](message, { scope, target });
  }
}
