// ═══════════════════════════════════════════════════════
// amplitude.ts — Historical month-over-month ratio bounds
// ═══════════════════════════════════════════════════════
import { ExtensionError } from './errors.ts';
import { lastPeriod, periodAt } from './series.ts';
import type { AmplitudeBound, AmplitudeBounds, MonthlySeries } from '../types.ts';

const isValidRatio = (r: number): boolean => r > 0 && Number.isFinite(r);

/**
 * Ratios value[t] / value[t+1] for every row t falling on the series' final
 * calendar month, per station. Non-positive and non-finite ratios are dropped.
 */
export function boundaryRatios(series: MonthlySeries): Record<string, number[]> {
  const finalMonth = lastPeriod(series).month;
  const ratios: Record<string, number[]> = {};
  for (const c of series.columns) ratios[c] = [];

  for (let t = 0; t + 1 < series.rows.length; t++) {
    if (periodAt(series, t).month !== finalMonth) continue;
    const cur = series.rows[t];
    const next = series.rows[t + 1];
    series.columns.forEach((c, j) => {
      const r = (cur?.[j] ?? NaN) / (next?.[j] ?? NaN);
      if (isValidRatio(r)) ratios[c]?.push(r);
    });
  }
  return ratios;
}

/** Per-station (min, max) of the boundary ratios */
export function computeAmplitudeBounds(series: MonthlySeries): AmplitudeBounds {
  const bounds: Record<string, AmplitudeBound> = {};
  for (const [station, rs] of Object.entries(boundaryRatios(series))) {
    if (rs.length === 0) {
      throw new ExtensionError(`Station "${station}" has no valid month-over-month ratio`, 'INSUFFICIENT_HISTORY');
    }
    bounds[station] = { min: Math.min(...rs), max: Math.max(...rs) };
  }
  return bounds;
}
