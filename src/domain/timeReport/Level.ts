export const Level = {
  ERROR: "error",
  WARN: "warn",
  INFO: "info",
  DEBUG: "debug",
  TRACE: "trace",
} as const;

export type Level = (typeof Level)[keyof typeof Level];

// Higher is more severe.
const SEVERITY: Record<Level, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

export function isLevel(value: unknown): value is Level {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(SEVERITY, value);
}

export function parseLevel(value: string | undefined): Level | undefined {
  const normalized = value?.trim().toLowerCase();
  return isLevel(normalized) ? normalized : undefined;
}

/** True when `level` is at least as severe as `threshold`. */
export function isEnabled(level: Level, threshold: Level): boolean {
  return SEVERITY[level] >= SEVERITY[threshold];
}
