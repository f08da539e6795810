// ═══════════════════════════════════════════════════════
// ranker.ts — Candidate windows ordered by correlation
// ═══════════════════════════════════════════════════════
import { ExtensionError } from './errors.ts';
import type { CorrelationTable, RankedCandidate } from '../types.ts';

/** Descending by r, NaN last; Array.prototype.sort is stable so ties stay chronological. */
function byCorrelationDesc(a: number, b: number): number {
  if (Number.isNaN(a)) return Number.isNaN(b) ? 0 : 1;
  if (Number.isNaN(b)) return -1;
  return b - a;
}

/**
 * Rank the table's windows for one station.
 * Rank 0 is always the reference window (the table's last row), even when an
 * earlier window ties it at r = 1.
 */
export function rankCandidates(table: CorrelationTable, station: string): RankedCandidate[] {
  const last = table[table.length - 1];
  if (!last) return [];
  if (!(station in last.values)) {
    throw new ExtensionError(`Station "${station}" is not in the correlation table`, 'UNKNOWN_STATION');
  }

  const corrOf = (i: number): number => table[i]?.values[station] ?? NaN;
  const history = table.slice(0, -1)
    .map((_, i) => i)
    .sort((a, b) => byCorrelationDesc(corrOf(a), corrOf(b)));

  return [table.length - 1, ...history].map((i, rank) => ({
    rank,
    windowEnd: { ...(table[i] ?? last).windowEnd },
    correlation: corrOf(i),
  }));
}
