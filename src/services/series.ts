// ═══════════════════════════════════════════════════════
// series.ts — Monthly series construction and access
// Series are plain readonly values; every helper returns a copy.
// ═══════════════════════════════════════════════════════
import { ExtensionError } from './errors.ts';
import { addMonths, formatPeriod, isValidPeriod, monthsBetween, toOrdinal } from './period.ts';
import type { MonthPeriod, MonthlySeries, SeriesEntry } from '../types.ts';

/** Build a series from a start period and rows, validating its shape. */
export function createSeries(start: MonthPeriod, columns: readonly string[], rows: ReadonlyArray<readonly number[]>): MonthlySeries {
  const series: MonthlySeries = {
    start: { ...start },
    columns: [...columns],
    rows: rows.map(r => [...r]),
  };
  assertMonthlySeries(series);
  return series;
}

/**
 * Build a series from explicitly dated rows.
 * Each period must follow the previous one by exactly one month.
 */
export function seriesFromEntries(columns: readonly string[], entries: readonly SeriesEntry[]): MonthlySeries {
  const first = entries[0];
  if (!first) throw new ExtensionError('Series has no rows', 'INSUFFICIENT_HISTORY');

  for (let i = 1; i < entries.length; i++) {
    const prev = entries[i - 1];
    const cur = entries[i];
    if (!prev || !cur) continue;
    if (monthsBetween(prev.period, cur.period) !== 1) {
      throw new ExtensionError(
        `Index is not monthly/contiguous: ${formatPeriod(cur.period)} follows ${formatPeriod(prev.period)}`,
        'INVALID_INDEX_KIND',
      );
    }
  }
  return createSeries(first.period, columns, entries.map(e => e.values));
}

/** Throws INVALID_INDEX_KIND unless the series is a well-formed monthly table. */
export function assertMonthlySeries(series: MonthlySeries): void {
  if (!isValidPeriod(series.start)) {
    throw new ExtensionError(`Invalid start period ${series.start.year}-${series.start.month}`, 'INVALID_INDEX_KIND');
  }
  if (series.columns.length === 0) {
    throw new ExtensionError('Series has no columns', 'INVALID_INDEX_KIND');
  }
  if (new Set(series.columns).size !== series.columns.length) {
    throw new ExtensionError('Series has duplicate column names', 'INVALID_INDEX_KIND');
  }
  series.rows.forEach((row, i) => {
    if (row.length !== series.columns.length) {
      throw new ExtensionError(
        `Row ${formatPeriod(periodAt(series, i))} has ${row.length} values, expected ${series.columns.length}`,
        'INVALID_INDEX_KIND',
      );
    }
  });
}

export const periodAt = (series: MonthlySeries, i: number): MonthPeriod => addMonths(series.start, i);

export function lastPeriod(series: MonthlySeries): MonthPeriod {
  return periodAt(series, series.rows.length - 1);
}

/** Row position of a period, or -1 when outside the series */
export function indexOf(series: MonthlySeries, p: MonthPeriod): number {
  const i = toOrdinal(p) - toOrdinal(series.start);
  return i >= 0 && i < series.rows.length ? i : -1;
}

export function columnIndex(series: MonthlySeries, station: string): number {
  const j = series.columns.indexOf(station);
  if (j < 0) throw new ExtensionError(`Station "${station}" is not a column of the series`, 'UNKNOWN_STATION');
  return j;
}

/** Values of one column in row order */
export function column(series: MonthlySeries, j: number): number[] {
  return series.rows.map(r => r[j] ?? NaN);
}

/** Row i as a station → value record */
export function rowRecord(series: MonthlySeries, i: number): Record<string, number> {
  const row = series.rows[i];
  const out: Record<string, number> = {};
  series.columns.forEach((c, j) => { out[c] = row?.[j] ?? NaN; });
  return out;
}

/** Up to `count` rows starting at position `from` */
export function sliceRows(series: MonthlySeries, from: number, count: number): MonthlySeries {
  return {
    start: periodAt(series, from),
    columns: [...series.columns],
    rows: series.rows.slice(from, from + count).map(r => [...r]),
  };
}

/** Same rows and columns under a new start period */
export function reindex(series: MonthlySeries, start: MonthPeriod): MonthlySeries {
  return { start: { ...start }, columns: [...series.columns], rows: series.rows.map(r => [...r]) };
}
