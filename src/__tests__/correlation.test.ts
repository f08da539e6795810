import { describe, it, expect } from 'vitest';
import { broadcastReference, computeCorrelationTable, pearson, rollingCorrelation } from '../services/correlation.ts';
import { boundaryRatios, computeAmplitudeBounds } from '../services/amplitude.ts';
import { rankCandidates } from '../services/ranker.ts';
import { createSeries } from '../services/series.ts';
import { analogSeries, YEAR_B } from './fixtures.ts';
import type { CorrelationTable } from '../types.ts';

describe('pearson', () => {
  it('scores perfect and inverse linear relations', () => {
    expect(pearson([1, 2, 3], [2, 4, 6])).toBe(1);
    expect(pearson([1, 2, 3], [3, 2, 1])).toBe(-1);
  });

  it('is NaN for constant, missing or mismatched input', () => {
    expect(pearson([1, 1, 1], [1, 2, 3])).toBeNaN();
    expect(pearson([1, NaN, 3], [1, 2, 3])).toBeNaN();
    expect(pearson([1, 2], [1, 2, 3])).toBeNaN();
  });

  it('rolls a fixed window and leaves incomplete windows empty', () => {
    const r = rollingCorrelation([1, 2, 3, 4], [1, 2, 3, 5], 3);
    expect(r[0]).toBeNaN();
    expect(r[1]).toBeNaN();
    expect(r[2]).toBe(1);
    expect(r[3]).toBeCloseTo(0.98198, 4);
  });
});

describe('computeCorrelationTable', () => {
  it('spreads the reference window over every year by calendar month', () => {
    const b = broadcastReference(analogSeries());
    expect(b.rows[0]).toEqual([10, 30]);
    expect(b.rows[5]).toEqual([60, 180]);
    expect(b.rows[17]).toEqual([60, 180]);
    expect(b.rows.map(r => r[0]).slice(0, 12)).toEqual(YEAR_B);
  });

  it('keeps one window per year ending on the final calendar month', () => {
    const table = computeCorrelationTable(analogSeries());
    expect(table.map(r => r.windowEnd)).toEqual([
      { year: 2000, month: 12 },
      { year: 2001, month: 12 },
      { year: 2002, month: 12 },
    ]);
    expect(table[0]?.values.s1).toBeCloseTo(-0.76026, 5);
    expect(table[0]?.values.s2).toBeCloseTo(-0.76026, 5);
    expect(table[1]?.values).toEqual({ s1: 1, s2: 1 });
  });

  it('scores the reference window at exactly 1 on every station', () => {
    const table = computeCorrelationTable(analogSeries());
    expect(table[table.length - 1]?.values).toEqual({ s1: 1, s2: 1 });
  });

  it('drops windows that are not complete 12-month blocks', () => {
    // 2000-03 .. 2002-08: the 2000-08 window would start before the series
    const rows = Array.from({ length: 30 }, (_, i) => [((i * 7) % 11) + 1]);
    const table = computeCorrelationTable(createSeries({ year: 2000, month: 3 }, ['a'], rows));
    expect(table.map(r => r.windowEnd)).toEqual([{ year: 2001, month: 8 }, { year: 2002, month: 8 }]);
    expect(table[1]?.values.a).toBe(1);
  });

  it('requires 24 months of history', () => {
    const rows = Array.from({ length: 23 }, (_, i) => [i + 1]);
    expect(() => computeCorrelationTable(createSeries({ year: 2000, month: 1 }, ['a'], rows)))
      .toThrow(expect.objectContaining({ code: 'INSUFFICIENT_HISTORY' }));
  });
});

describe('computeAmplitudeBounds', () => {
  it('takes min/max of final-month over following-month ratios', () => {
    const s = analogSeries();
    expect(boundaryRatios(s)).toEqual({ s1: [2, 1], s2: [2, 1] });
    expect(computeAmplitudeBounds(s)).toEqual({ s1: { min: 1, max: 2 }, s2: { min: 1, max: 2 } });
  });

  it('discards non-positive ratios', () => {
    // December values: 2000 → -4, 2001 → 6; January values all 2
    const rows = Array.from({ length: 36 }, (_, i) => {
      if (i === 11) return [-4];
      if (i === 23) return [6];
      return [2];
    });
    expect(computeAmplitudeBounds(createSeries({ year: 2000, month: 1 }, ['a'], rows)))
      .toEqual({ a: { min: 3, max: 3 } });
  });

  it('fails for a station without a single valid ratio', () => {
    const rows = Array.from({ length: 36 }, (_, i) => [i + 1, 0]);
    expect(() => computeAmplitudeBounds(createSeries({ year: 2000, month: 1 }, ['a', 'dry'], rows)))
      .toThrow(expect.objectContaining({ code: 'INSUFFICIENT_HISTORY' }));
  });
});

describe('rankCandidates', () => {
  const row = (year: number, s: number) => ({ windowEnd: { year, month: 12 }, values: { s } });
  const table: CorrelationTable = [row(2000, 0.5), row(2001, 0.8), row(2002, 0.5), row(2003, NaN), row(2004, 1)];

  it('puts the reference window first, then descending r with chronological ties and NaN last', () => {
    expect(rankCandidates(table, 's').map(c => [c.rank, c.windowEnd.year])).toEqual([
      [0, 2004], [1, 2001], [2, 2000], [3, 2002], [4, 2003],
    ]);
  });

  it('keeps the reference window at rank 0 when an earlier window ties it', () => {
    const ranked = rankCandidates(computeCorrelationTable(analogSeries()), 's1');
    expect(ranked.map(c => c.windowEnd.year)).toEqual([2002, 2001, 2000]);
    expect(ranked[0]?.correlation).toBe(1);
    expect(ranked[1]?.correlation).toBe(1);
  });

  it('orders historical candidates strictly by descending correlation', () => {
    const rest = rankCandidates(table, 's').slice(1).map(c => c.correlation).filter(c => !Number.isNaN(c));
    expect(rest).toEqual([...rest].sort((a, b) => b - a));
  });

  it('rejects an unknown station', () => {
    expect(() => rankCandidates(table, 'x')).toThrow(expect.objectContaining({ code: 'UNKNOWN_STATION' }));
  });
});
