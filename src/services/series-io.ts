/**
 * services/series-io.ts — CSV series source and writer
 *
 * Layout:
 *   period,6,74,169
 *   2001-01,812.5,301,2210
 *   2001-02,,298.4,2075      ← blank cell = missing value (NaN)
 */
import { readFile, writeFile } from 'fs/promises';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { z } from 'zod';
import { ExtensionError } from './errors.ts';
import { formatPeriod, parsePeriod } from './period.ts';
import { periodAt, seriesFromEntries } from './series.ts';
import type { MonthlySeries, SeriesEntry } from '../types.ts';

const RecordsSchema = z.array(z.array(z.string()));

// plain decimal, optional exponent; no hex, no Infinity
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function parseCell(cell: string, where: string): number {
  if (cell === '') return NaN;
  const v = DECIMAL.test(cell) ? Number(cell) : NaN;
  if (!Number.isFinite(v)) throw new ExtensionError(`Non-numeric value "${cell}" at ${where}`, 'INVALID_SERIES_FILE');
  return v;
}

/** Parse CSV text into a validated monthly series. `source` names the input in errors. */
export function parseSeriesCsv(text: string, source = 'input'): MonthlySeries {
  let records: string[][];
  try {
    records = RecordsSchema.parse(parse(text, { skip_empty_lines: true, trim: true, relax_column_count: true }));
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ExtensionError(`${source}: unreadable CSV (${msg})`, 'INVALID_SERIES_FILE');
  }

  const [header, ...body] = records;
  if (!header || header.length < 2) {
    throw new ExtensionError(`${source}: header must be "period,<station>,..."`, 'INVALID_SERIES_FILE');
  }
  const columns = header.slice(1);

  const entries: SeriesEntry[] = body.map((cells, i) => {
    const line = i + 2;
    const period = parsePeriod(cells[0]);
    if (!period) throw new ExtensionError(`${source}:${line}: invalid period "${cells[0] ?? ''}"`, 'INVALID_SERIES_FILE');
    if (cells.length !== header.length) {
      throw new ExtensionError(`${source}:${line}: expected ${header.length} cells, got ${cells.length}`, 'INVALID_SERIES_FILE');
    }
    return { period, values: cells.slice(1).map((c, j) => parseCell(c, `${source}:${line} column ${columns[j]}`)) };
  });

  return seriesFromEntries(columns, entries);
}

/** Series → CSV text; NaN becomes an empty cell */
export function formatSeriesCsv(series: MonthlySeries): string {
  const rows = series.rows.map((row, i) => [
    formatPeriod(periodAt(series, i)),
    ...row.map(v => (Number.isNaN(v) ? '' : String(v))),
  ]);
  return stringify([['period', ...series.columns], ...rows]);
}

export async function readSeriesFile(path: string): Promise<MonthlySeries> {
  return parseSeriesCsv(await readFile(path, 'utf8'), path);
}

export async function writeSeriesFile(path: string, series: MonthlySeries): Promise<void> {
  await writeFile(path, formatSeriesCsv(series), 'utf8');
}
