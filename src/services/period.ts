// ═══════════════════════════════════════════════════════
// period.ts — Month period arithmetic (zero dependencies)
// ═══════════════════════════════════════════════════════
import type { MonthPeriod } from '../types.ts';

/** Months since year 0 (January of year 0 = 0) */
export const toOrdinal = (p: MonthPeriod): number => p.year * 12 + (p.month - 1);

export function fromOrdinal(n: number): MonthPeriod {
  const year = Math.floor(n / 12);
  return { year, month: n - year * 12 + 1 };
}

export const addMonths = (p: MonthPeriod, months: number): MonthPeriod => fromOrdinal(toOrdinal(p) + months);

/** Signed month distance b - a */
export const monthsBetween = (a: MonthPeriod, b: MonthPeriod): number => toOrdinal(b) - toOrdinal(a);

export const samePeriod = (a: MonthPeriod, b: MonthPeriod): boolean => toOrdinal(a) === toOrdinal(b);

export function isValidPeriod(p: MonthPeriod): boolean {
  return Number.isInteger(p.year) && Number.isInteger(p.month) && p.month >= 1 && p.month <= 12;
}

/** { year: 2024, month: 3 } → "2024-03" */
export function formatPeriod(p: MonthPeriod): string {
  return `${String(p.year).padStart(4, '0')}-${String(p.month).padStart(2, '0')}`;
}

/** Parse "YYYY-MM" (also "YYYY/MM") → period, null when malformed */
export function parsePeriod(s: string | null | undefined): MonthPeriod | null {
  if (!s) return null;
  const m = /^(\d{4})[-/](\d{1,2})$/.exec(s.trim());
  if (!m) return null;
  const year = parseInt(m[1] ?? '', 10);
  const month = parseInt(m[2] ?? '', 10);
  if (month < 1 || month > 12) return null;
  return { year, month };
}
