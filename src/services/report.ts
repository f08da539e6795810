// ═══════════════════════════════════════════════════════
// report.ts — Run report as a fixed-width text table
// ═══════════════════════════════════════════════════════
import type { BatchReport } from '../types.ts';

type Align = 'left' | 'right';

function table(headers: string[], rows: string[][], align: Align[]): string {
  const widths = headers.map((h, j) => Math.max(h.length, ...rows.map(r => (r[j] ?? '').length)));
  const line = (cells: string[]) => cells
    .map((c, j) => (align[j] === 'right' ? c.padStart(widths[j] ?? 0) : c.padEnd(widths[j] ?? 0)))
    .join('  ')
    .trimEnd();
  return [line(headers), ...rows.map(line)].join('\n');
}

export function formatReport(report: BatchReport): string {
  const parts: string[] = [];

  if (report.extended.length > 0) {
    parts.push(table(
      ['file', 'rank', 'correlation', 'below_min', 'above_max'],
      report.extended.map(r => [r.file, String(r.rank), r.correlation.toFixed(4), String(r.belowCount), String(r.aboveCount)]),
      ['left', 'right', 'right', 'right', 'right'],
    ));
  } else {
    parts.push('no series extended');
  }

  if (report.failures.length > 0) {
    parts.push(table(
      ['failed', 'station', 'code', 'message'],
      report.failures.map(f => [f.file, f.station, f.code, f.message]),
      ['left', 'left', 'left', 'left'],
    ));
  }

  return parts.join('\n\n') + '\n';
}
