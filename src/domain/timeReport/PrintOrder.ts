export const PrintOrder = {
  /** First-started order. */
  Start: "start",
  RevStart: "rev-start",
  Key: "key",
  RevKey: "rev-key",
  IncDuration: "inc-duration",
  DecDuration: "dec-duration",
} as const;

export type PrintOrder = (typeof PrintOrder)[keyof typeof PrintOrder];

export const DEFAULT_PRINT_ORDER: PrintOrder = PrintOrder.DecDuration;

const ALL: readonly string[] = Object.values(PrintOrder);

export function isPrintOrder(value: unknown): value is PrintOrder {
  return typeof value === "string" && ALL.includes(value);
}

export function parsePrintOrder(value: string | undefined): PrintOrder | undefined {
  const normalized = value?.trim().toLowerCase().replace(/_/g, "-");
  return isPrintOrder(normalized) ? normalized : undefined;
}
