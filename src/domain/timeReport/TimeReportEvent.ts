import type { Level } from "./Level";

export interface TimeReportEvent {
  scope: string;
  target: string;
  level: Level;
  message: string;
}
