import { describe, it, expect } from 'vitest';
import { addMonths, formatPeriod, monthsBetween, parsePeriod } from '../services/period.ts';
import {
  columnIndex, createSeries, indexOf, lastPeriod, periodAt, reindex, seriesFromEntries, sliceRows,
} from '../services/series.ts';
import { ExtensionError } from '../services/errors.ts';

describe('period arithmetic', () => {
  it('rolls over year boundaries', () => {
    expect(addMonths({ year: 2000, month: 12 }, 1)).toEqual({ year: 2001, month: 1 });
    expect(addMonths({ year: 2001, month: 1 }, -1)).toEqual({ year: 2000, month: 12 });
    expect(addMonths({ year: 2000, month: 3 }, 29)).toEqual({ year: 2002, month: 8 });
    expect(monthsBetween({ year: 1999, month: 11 }, { year: 2001, month: 2 })).toBe(15);
  });

  it('formats and parses YYYY-MM', () => {
    expect(formatPeriod({ year: 1931, month: 1 })).toBe('1931-01');
    expect(parsePeriod('2024-3')).toEqual({ year: 2024, month: 3 });
    expect(parsePeriod(' 2024/11 ')).toEqual({ year: 2024, month: 11 });
    expect(parsePeriod('2024-13')).toBeNull();
    expect(parsePeriod('march')).toBeNull();
    expect(parsePeriod('')).toBeNull();
  });
});

describe('monthly series', () => {
  const s = createSeries({ year: 2000, month: 11 }, ['a', 'b'], [[1, 10], [2, 20], [3, 30], [4, 40]]);

  it('derives periods from the start month', () => {
    expect(periodAt(s, 2)).toEqual({ year: 2001, month: 1 });
    expect(lastPeriod(s)).toEqual({ year: 2001, month: 2 });
    expect(indexOf(s, { year: 2001, month: 1 })).toBe(2);
    expect(indexOf(s, { year: 2001, month: 3 })).toBe(-1);
  });

  it('copies instead of sharing rows', () => {
    const rows = [[1], [2]];
    const copy = createSeries({ year: 2000, month: 1 }, ['a'], rows);
    rows[0][0] = 99;
    expect(copy.rows[0]).toEqual([1]);
  });

  it('slices and re-indexes without touching the source', () => {
    const part = reindex(sliceRows(s, 1, 2), { year: 2010, month: 6 });
    expect(part).toEqual({ start: { year: 2010, month: 6 }, columns: ['a', 'b'], rows: [[2, 20], [3, 30]] });
    expect(s.rows).toHaveLength(4);
  });

  it('rejects gaps in dated entries', () => {
    const entries = [
      { period: { year: 2000, month: 1 }, values: [1] },
      { period: { year: 2000, month: 3 }, values: [2] },
    ];
    expect(() => seriesFromEntries(['a'], entries)).toThrow(ExtensionError);
    expect(() => seriesFromEntries(['a'], entries)).toThrow(expect.objectContaining({ code: 'INVALID_INDEX_KIND' }));
  });

  it('rejects ragged rows and invalid months', () => {
    expect(() => createSeries({ year: 2000, month: 1 }, ['a', 'b'], [[1, 2], [3]]))
      .toThrow(expect.objectContaining({ code: 'INVALID_INDEX_KIND' }));
    expect(() => createSeries({ year: 2000, month: 13 }, ['a'], [[1]]))
      .toThrow(expect.objectContaining({ code: 'INVALID_INDEX_KIND' }));
  });

  it('reports unknown stations', () => {
    expect(columnIndex(s, 'b')).toBe(1);
    expect(() => columnIndex(s, 'z')).toThrow(expect.objectContaining({ code: 'UNKNOWN_STATION' }));
  });
});
