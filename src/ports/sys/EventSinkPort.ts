import type { Level } from "../../domain/timeReport/Level";

export interface EventSinkPort {
  emit(scope: string, target: string, level: Level, message: string): void;
}
