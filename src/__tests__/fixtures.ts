import { createSeries } from '../services/series.ts';
import type { MonthlySeries } from '../types.ts';

// Year shapes for station s1; s2 is always 3 × s1.
export const YEAR_A = [60, 50, 40, 30, 20, 10, 15, 20, 30, 40, 50, 20];
export const YEAR_B = [10, 20, 30, 40, 50, 60, 50, 40, 30, 20, 15, 10];
// YEAR_B with a January jump
export const YEAR_B_JUMP = [25, ...YEAR_B.slice(1)];

export function seriesOfYears(startYear: number, years: number[][]): MonthlySeries {
  const s1 = years.flat();
  return createSeries({ year: startYear, month: 1 }, ['s1', 's2'], s1.map(v => [v, v * 3]));
}

/** 2000 = A, 2001 = B, 2002 = B: the 2001 window matches the reference exactly */
export const analogSeries = (): MonthlySeries => seriesOfYears(2000, [YEAR_A, YEAR_B, YEAR_B]);

/** 2000 = A, 2001 = B, 2002 = B with a January jump */
export const jumpSeries = (): MonthlySeries => seriesOfYears(2000, [YEAR_A, YEAR_B, YEAR_B_JUMP]);

export const ANALOG_CSV = [
  'period,s1,s2',
  ...[YEAR_A, YEAR_B, YEAR_B].flatMap((year, y) =>
    year.map((v, m) => `${2000 + y}-${String(m + 1).padStart(2, '0')},${v},${v * 3}`)),
].join('\n') + '\n';
