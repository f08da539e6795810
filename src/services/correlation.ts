// ═══════════════════════════════════════════════════════
// correlation.ts — Rolling correlation against the reference window
//
// The last 12 months are the reference window. Every historical 12-month
// window ending on the same calendar month is scored by its Pearson r
// against the reference, per station.
// ═══════════════════════════════════════════════════════
import { ExtensionError } from './errors.ts';
import { assertMonthlySeries, column, lastPeriod, periodAt } from './series.ts';
import type { CorrelationRow, CorrelationTable, MonthlySeries } from '../types.ts';

export const WINDOW_MONTHS = 12;
export const MIN_HISTORY_MONTHS = 24;

/**
 * Pearson correlation coefficient.
 * NaN when lengths differ, any value is missing, or either side has zero variance.
 */
export function pearson(x: readonly number[], y: readonly number[]): number {
  const n = x.length;
  if (n < 2 || n !== y.length) return NaN;

  let sumX = 0, sumY = 0;
  for (let i = 0; i < n; i++) {
    const xi = x[i] ?? NaN, yi = y[i] ?? NaN;
    if (!Number.isFinite(xi) || !Number.isFinite(yi)) return NaN;
    sumX += xi; sumY += yi;
  }
  const mx = sumX / n, my = sumY / n;

  let sxx = 0, syy = 0, sxy = 0;
  for (let i = 0; i < n; i++) {
    const dx = (x[i] ?? NaN) - mx;
    const dy = (y[i] ?? NaN) - my;
    sxx += dx * dx; syy += dy * dy; sxy += dx * dy;
  }

  // sqrt(sxx * sxx) === sxx, so identical windows give exactly 1
  const den = Math.sqrt(sxx * syy);
  if (den === 0) return NaN;
  return Math.max(-1, Math.min(1, sxy / den));
}

/** r over each window ending at i; NaN while the window is incomplete */
export function rollingCorrelation(x: readonly number[], y: readonly number[], window: number): number[] {
  return x.map((_, i) => i + 1 < window
    ? NaN
    : pearson(x.slice(i + 1 - window, i + 1), y.slice(i + 1 - window, i + 1)));
}

/**
 * Same shape as the series, every row replaced by the reference-window row
 * of the same calendar month.
 */
export function broadcastReference(series: MonthlySeries): MonthlySeries {
  const n = series.rows.length;
  const byMonth = new Map<number, readonly number[]>();
  for (let i = Math.max(0, n - WINDOW_MONTHS); i < n; i++) {
    const row = series.rows[i];
    if (row) byMonth.set(periodAt(series, i).month, row);
  }

  return {
    start: { ...series.start },
    columns: [...series.columns],
    rows: series.rows.map((_, i) => {
      const ref = byMonth.get(periodAt(series, i).month);
      return ref ? [...ref] : series.columns.map(() => NaN);
    }),
  };
}

/**
 * Correlation of every complete 12-month window ending on the final calendar
 * month with the reference window, in chronological order. The last row is the
 * reference window itself.
 */
export function computeCorrelationTable(series: MonthlySeries): CorrelationTable {
  assertMonthlySeries(series);
  const n = series.rows.length;
  if (n < MIN_HISTORY_MONTHS) {
    throw new ExtensionError(`Series has ${n} months, at least ${MIN_HISTORY_MONTHS} are required`, 'INSUFFICIENT_HISTORY');
  }

  const broadcast = broadcastReference(series);
  const rolling = series.columns.map((_, j) =>
    rollingCorrelation(column(series, j), column(broadcast, j), WINDOW_MONTHS));

  const finalMonth = lastPeriod(series).month;
  const table: CorrelationRow[] = [];
  for (let i = WINDOW_MONTHS - 1; i < n; i++) {
    const windowEnd = periodAt(series, i);
    if (windowEnd.month !== finalMonth) continue;
    const values: Record<string, number> = {};
    series.columns.forEach((c, j) => { values[c] = rolling[j]?.[i] ?? NaN; });
    table.push({ windowEnd, values });
  }
  return table;
}
