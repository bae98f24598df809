import fs from "fs";
import path from "path";
import { isLevel, Level } from "./domain/timeReport/Level";
import { DEFAULT_PRINT_ORDER, isPrintOrder, type PrintOrder } from "./domain/timeReport/PrintOrder";
import { DEFAULT_PRECISION, DEFAULT_WIDTH } from "./domain/timeReport/TimeReporter";
import { MAX_PRECISION, MAX_WIDTH, normalizeCount } from "./domain/timeReport/formatReport";
import { ClockKind, isClockKind } from "./composition/defaults";

export interface ReporterConfig {
  level?: Level;
  printOrder?: PrintOrder;
  width?: number;
  precision?: number;
  clock?: ClockKind;
}

export type ReporterDefaults = Required<ReporterConfig>;

export interface EnvOverrides {
  level?: Level;
  printOrder?: PrintOrder;
  clock?: ClockKind;
}

const DEFAULT_CONFIG_FILENAMES = ["timereport.config.json", "time-report.config.json"];

export interface LoadedConfig {
  config: ReporterConfig;
  path?: string;
}

export function loadConfig(configPath?: string): LoadedConfig {
  const searchPaths = configPath
    ? [configPath]
    : DEFAULT_CONFIG_FILENAMES.map((name) => path.resolve(process.cwd(), name));

  for (const candidate of searchPaths) {
    try {
      const resolved = path.resolve(candidate);
      if (!fs.existsSync(resolved)) continue;
      const raw = fs.readFileSync(resolved, "utf8");
      const parsed: unknown = JSON.parse(raw);
      return { config: normalizeConfig(parsed), path: resolved };
    } catch (err) {
      console.warn(`Failed to load config from ${candidate}:`, err);
    }
  }

  return { config: {} };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readCount(input: Record<string, unknown>, field: "width" | "precision"): number | undefined {
  const value = input[field];
  if (value === undefined) return undefined;
  if (typeof value === "number" && Number.isFinite(value) && value >= 0) {
    return normalizeCount(value, field === "width" ? MAX_WIDTH : MAX_PRECISION);
  }
  console.warn(`Invalid ${field} in time report config; expected a non-negative number.`);
  return undefined;
}

export function normalizeConfig(input: unknown): ReporterConfig {
  if (!isRecord(input)) {
    console.warn("Invalid time report config; expected a JSON object.");
    return {};
  }

  const out: ReporterConfig = {};

  if (input.level !== undefined) {
    if (isLevel(input.level)) out.level = input.level;
    else console.warn(`Invalid level "${String(input.level)}" in time report config.`);
  }

  if (input.printOrder !== undefined) {
    if (isPrintOrder(input.printOrder)) out.printOrder = input.printOrder;
    else console.warn(`Invalid printOrder "${String(input.printOrder)}" in time report config.`);
  }

  if (input.clock !== undefined) {
    if (isClockKind(input.clock)) out.clock = input.clock;
    else console.warn(`Invalid clock "${String(input.clock)}" in time report config.`);
  }

  const width = readCount(input, "width");
  if (width !== undefined) out.width = width;
  const precision = readCount(input, "precision");
  if (precision !== undefined) out.precision = precision;

  return out;
}

/** Built-in defaults, then the config file, then environment overrides. */
export function resolveReporterDefaults(config: ReporterConfig, env: EnvOverrides = {}): ReporterDefaults {
  return {
    level: env.level ?? config.level ?? Level.INFO,
    printOrder: env.printOrder ?? config.printOrder ?? DEFAULT_PRINT_ORDER,
    width: config.width ?? DEFAULT_WIDTH,
    precision: config.precision ?? DEFAULT_PRECISION,
    clock: env.clock ?? config.clock ?? ClockKind.Hrtime,
  };
}
