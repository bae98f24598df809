import { config } from 'dotenv';
import { Level, parseLevel } from './domain/timeReport/Level';
import { parsePrintOrder } from './domain/timeReport/PrintOrder';
import { isClockKind, type ClockKind } from './composition/defaults';

config();

function parseClock(value: string | undefined): ClockKind | undefined {
  const normalized = value?.trim().toLowerCase();
  return isClockKind(normalized) ? normalized : undefined;
}

export const LOG_LEVEL: Level = parseLevel(process.env.LOG_LEVEL) ?? Level.INFO;
export const LOG_FILE = process.env.LOG_FILE || undefined;
export const TIME_REPORT_CONFIG = process.env.TIME_REPORT_CONFIG || undefined;
export const TIME_REPORT_LEVEL = parseLevel(process.env.TIME_REPORT_LEVEL);
export const TIME_REPORT_PRINT_ORDER = parsePrintOrder(process.env.TIME_REPORT_PRINT_ORDER);
export const TIME_REPORT_CLOCK = parseClock(process.env.TIME_REPORT_CLOCK);
