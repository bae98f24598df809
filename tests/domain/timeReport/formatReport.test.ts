import {
  formatSeconds,
  MAX_WIDTH,
  nanosToSeconds,
  normalizeCount,
  orderEntries,
  renderReport,
  toFixedHalfEven,
} from '../../../src/domain/timeReport/formatReport';
import { PrintOrder } from '../../../src/domain/timeReport/PrintOrder';
import { MS, SECOND } from '../../helpers/fakes';

describe('formatReport', () => {
  const times = new Map<string, bigint>([
    ['a', 2n * SECOND],
    ['b', 5n * SECOND],
    ['c', 1n * SECOND],
  ]);

  const keys = (order: PrintOrder) => orderEntries(times, order).map(([key]) => key);

  test('orders by decreasing duration by default mode', () => {
    expect(keys(PrintOrder.DecDuration)).toEqual(['b', 'a', 'c']);
  });

  test('orders by key and reverse key', () => {
    expect(keys(PrintOrder.Key)).toEqual(['a', 'b', 'c']);
    expect(keys(PrintOrder.RevKey)).toEqual(['c', 'b', 'a']);
  });

  test('orders by increasing duration', () => {
    expect(keys(PrintOrder.IncDuration)).toEqual(['c', 'a', 'b']);
  });

  test('start order follows insertion and can be reversed', () => {
    expect(keys(PrintOrder.Start)).toEqual(['a', 'b', 'c']);
    expect(keys(PrintOrder.RevStart)).toEqual(['c', 'b', 'a']);
  });

  test('ordering does not mutate the source map', () => {
    orderEntries(times, PrintOrder.RevKey);
    expect(Array.from(times.keys())).toEqual(['a', 'b', 'c']);
  });

  test('formatSeconds renders fixed-point seconds', () => {
    expect(formatSeconds(1_500n * MS, 0, 3)).toBe('1.500');
    expect(formatSeconds(1_500n * MS, 11, 3)).toBe('1.500      ');
    expect(formatSeconds(4n * MS, 11, 9)).toBe('0.004000000');
  });

  test('width below the rendered length has no effect', () => {
    expect(formatSeconds(2n * SECOND, 3, 9)).toBe('2.000000000');
  });

  test('precision is clamped to MAX_PRECISION digits', () => {
    const rendered = formatSeconds(1n, 0, 150);
    expect(rendered).toHaveLength(102);
    expect(rendered.startsWith('0.000000001')).toBe(true);
  });

  test('width is capped so padding cannot exceed the string limit', () => {
    expect(formatSeconds(1n * SECOND, 1e9, 1)).toBe('1.0'.padEnd(MAX_WIDTH, ' '));
    expect(formatSeconds(1n * SECOND, Infinity, 1)).toBe('1.0');
  });

  test('exact ties round half to even', () => {
    expect(formatSeconds(250n * MS, 0, 1)).toBe('0.2');
    expect(formatSeconds(500n * MS, 0, 0)).toBe('0');
    expect(formatSeconds(1_500n * MS, 0, 0)).toBe('2');
    expect(formatSeconds(2_500n * MS, 0, 0)).toBe('2');
    expect(formatSeconds(125n * MS, 0, 2)).toBe('0.12');
    expect(formatSeconds(375n * MS, 0, 2)).toBe('0.38');
  });

  test('values just below a tie round down', () => {
    // 0.35 is stored as 0.34999999999999997779...
    expect(formatSeconds(350n * MS, 0, 1)).toBe('0.3');
  });

  test('toFixedHalfEven renders zero and whole numbers', () => {
    expect(toFixedHalfEven(0, 3)).toBe('0.000');
    expect(toFixedHalfEven(0, 0)).toBe('0');
    expect(toFixedHalfEven(42, 2)).toBe('42.00');
    expect(toFixedHalfEven(0.004, 9)).toBe('0.004000000');
  });

  test('normalizeCount floors and clamps', () => {
    expect(normalizeCount(7.9, 100)).toBe(7);
    expect(normalizeCount(500, 100)).toBe(100);
    expect(normalizeCount(-2, 100)).toBe(0);
    expect(normalizeCount(Number.NaN, 100)).toBe(0);
  });

  test('negative width and precision render without padding or fraction', () => {
    expect(formatSeconds(3n * SECOND, -4, -1)).toBe('3');
  });

  test('nanosToSeconds keeps whole seconds and the fractional part', () => {
    expect(nanosToSeconds(12n * SECOND + 250n * MS)).toBe(12.25);
  });

  test('renderReport prefixes the name and joins entries', () => {
    expect(renderReport('t', times, { printOrder: PrintOrder.DecDuration, width: 11, precision: 9 })).toBe(
      'name: t, b: 5.000000000, a: 2.000000000, c: 1.000000000'
    );
    expect(renderReport('empty', new Map(), { printOrder: PrintOrder.Key, width: 11, precision: 9 })).toBe(
      'name: empty'
    );
  });
});
