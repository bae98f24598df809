import type { EventSinkPort } from "../../ports/sys/EventSinkPort";
import type { EventBus } from "../../domain/events/EventBus";
import { Topics } from "../../domain/events/EventBus";
import type { TimeReportEvent } from "../../domain/timeReport/TimeReportEvent";
import type { Level } from "../../domain/timeReport/Level";

export class EventBusSink implements EventSinkPort {
  constructor(private readonly bus: EventBus) {}

  emit(scope: string, target: string, level: Level, message: string): void {
    this.bus.publish<TimeReportEvent>(Topics.TimeReportEmitted, { scope, target, level, message });
  }
}
