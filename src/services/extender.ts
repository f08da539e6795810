// ═══════════════════════════════════════════════════════
// extender.ts — Splice the analog continuation onto a series
// Values are copied verbatim; only the index changes.
// ═══════════════════════════════════════════════════════
import { ExtensionError } from './errors.ts';
import { addMonths, formatPeriod, monthsBetween } from './period.ts';
import { indexOf, lastPeriod, reindex, sliceRows } from './series.ts';
import type { MonthPeriod, MonthlySeries, SelectionResult } from '../types.ts';

/** Months left in the calendar year of `start`, `start` included */
export const monthsToYearEnd = (start: MonthPeriod): number => 13 - start.month;

/**
 * Copy `horizon` rows from the selected forecast start and re-index them onto
 * the month after the series' last month. Without a horizon the copy runs to
 * the end of the forecast start's calendar year.
 */
export function extend(
  series: MonthlySeries,
  selection: Pick<SelectionResult, 'forecastStart'>,
  horizon?: number,
): MonthlySeries {
  const months = horizon ?? monthsToYearEnd(selection.forecastStart);
  if (!Number.isInteger(months) || months < 1) {
    throw new ExtensionError(`Horizon must be a positive integer, got ${months}`, 'HORIZON_EXCEEDS_HISTORY');
  }

  const from = indexOf(series, selection.forecastStart);
  if (from < 0) {
    throw new ExtensionError(`Forecast start ${formatPeriod(selection.forecastStart)} is outside the series`, 'HORIZON_EXCEEDS_HISTORY');
  }
  const available = series.rows.length - from;
  if (months > available) {
    throw new ExtensionError(
      `Horizon of ${months} months from ${formatPeriod(selection.forecastStart)} exceeds the ${available} months of history`,
      'HORIZON_EXCEEDS_HISTORY',
    );
  }

  return reindex(sliceRows(series, from, months), addMonths(lastPeriod(series), 1));
}

/** Series followed by its extension, as one new series. */
export function appendSeries(series: MonthlySeries, extension: MonthlySeries): MonthlySeries {
  if (extension.columns.length !== series.columns.length || extension.columns.some((c, j) => c !== series.columns[j])) {
    throw new ExtensionError('Extension columns do not match the series', 'INVALID_INDEX_KIND');
  }
  if (monthsBetween(lastPeriod(series), extension.start) !== 1) {
    throw new ExtensionError(
      `Extension starts at ${formatPeriod(extension.start)}, expected ${formatPeriod(addMonths(lastPeriod(series), 1))}`,
      'INVALID_INDEX_KIND',
    );
  }
  return {
    start: { ...series.start },
    columns: [...series.columns],
    rows: [...series.rows, ...extension.rows].map(r => [...r]),
  };
}
