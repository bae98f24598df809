import { PrintOrder } from "./PrintOrder";

export type ReportEntry = [key: string, nanos: bigint];

export interface RenderOptions {
  printOrder: PrintOrder;
  width: number;
  precision: number;
}

const NANOS_PER_SECOND = 1_000_000_000n;

/** Upper bounds on rendered digits and field width; larger values are clamped. */
export const MAX_PRECISION = 100;
export const MAX_WIDTH = 1024;

function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function compareNanos(a: bigint, b: bigint): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Orders accumulated totals for rendering. Map iteration order is the order
 * keys were first folded in, which is what `Start` and `RevStart` print.
 * Duration ties keep that order because `Array.prototype.sort` is stable.
 */
export function orderEntries(times: ReadonlyMap<string, bigint>, printOrder: PrintOrder): ReportEntry[] {
  const entries: ReportEntry[] = Array.from(times.entries());
  switch (printOrder) {
    case PrintOrder.Start:
      return entries;
    case PrintOrder.RevStart:
      return entries.reverse();
    case PrintOrder.Key:
      return entries.sort((a, b) => compareKeys(a[0], b[0]));
    case PrintOrder.RevKey:
      return entries.sort((a, b) => compareKeys(b[0], a[0]));
    case PrintOrder.IncDuration:
      return entries.sort((a, b) => compareNanos(a[1], b[1]));
    case PrintOrder.DecDuration:
      return entries.sort((a, b) => compareNanos(b[1], a[1]));
  }
}

export function nanosToSeconds(nanos: bigint): number {
  const whole = nanos / NANOS_PER_SECOND;
  const fraction = nanos % NANOS_PER_SECOND;
  return Number(whole) + Number(fraction) / 1e9;
}

// Exact decimal value of a finite, non-negative double as digits / 10^scale.
function exactDecimal(value: number): { digits: bigint; scale: number } {
  if (value === 0) return { digits: 0n, scale: 0 };
  const view = new DataView(new ArrayBuffer(8));
  view.setFloat64(0, value);
  const bits = view.getBigUint64(0);
  const biased = Number((bits >> 52n) & 0x7ffn);
  let mantissa = bits & 0xf_ffff_ffff_ffffn;
  let exponent = -1074;
  if (biased !== 0) {
    mantissa |= 1n << 52n;
    exponent = biased - 1075;
  }
  if (exponent >= 0) {
    return { digits: mantissa << BigInt(exponent), scale: 0 };
  }
  return { digits: mantissa * 5n ** BigInt(-exponent), scale: -exponent };
}

/**
 * Fixed-point rendering of `value` with `precision` digits. Exact ties round
 * half to even, unlike `Number.prototype.toFixed`.
 */
export function toFixedHalfEven(value: number, precision: number): string {
  const { digits, scale } = exactDecimal(value);
  let scaled: bigint;
  if (precision >= scale) {
    scaled = digits * 10n ** BigInt(precision - scale);
  } else {
    const divisor = 10n ** BigInt(scale - precision);
    scaled = digits / divisor;
    const twice = (digits % divisor) * 2n;
    if (twice > divisor || (twice === divisor && scaled % 2n === 1n)) scaled += 1n;
  }
  const text = scaled.toString().padStart(precision + 1, "0");
  if (precision === 0) return text;
  return `${text.slice(0, -precision)}.${text.slice(-precision)}`;
}

/**
 * Fixed-point seconds, left-aligned and space-padded to `width`.
 * A width below `precision + 2` never pads anything.
 */
export function formatSeconds(nanos: bigint, width: number, precision: number): string {
  const digits = normalizeCount(precision, MAX_PRECISION);
  return toFixedHalfEven(nanosToSeconds(nanos), digits).padEnd(normalizeCount(width, MAX_WIDTH), " ");
}

/** Floors to a non-negative integer no larger than `max`. */
export function normalizeCount(value: number, max: number): number {
  if (!Number.isFinite(value) || value < 0) return 0;
  return Math.min(Math.floor(value), max);
}

export function renderReport(name: string, times: ReadonlyMap<string, bigint>, options: RenderOptions): string {
  let out = `name: ${name}`;
  for (const [key, nanos] of orderEntries(times, options.printOrder)) {
    out += `, ${key}: ${formatSeconds(nanos, options.width, options.precision)}`;
  }
  return out;
}
