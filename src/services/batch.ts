/**
 * services/batch.ts — Folder batch driver
 *
 * For every *.csv in the input folder and every configured reference station:
 *   select an analog year → extend to year end → write
 *   <stem>-<STATION>-<year>.csv into the output folder.
 *
 * Years chosen earlier in the run are excluded from later selections.
 * Per-series ExtensionErrors are logged and reported; the batch continues.
 */
import { mkdir, readdir, unlink, writeFile } from 'fs/promises';
import { basename, extname, join } from 'path';
import { childLogger, logger } from '../shared/logger.ts';
import { fitDuration, fitsTotal, rejectionsTotal, seriesExtended, writeMetricsFile } from '../shared/metrics.ts';
import { isExtensionError, NoAcceptableAnalogError } from './errors.ts';
import { appendSeries, extend } from './extender.ts';
import { formatReport } from './report.ts';
import { selectAnalog } from './selector.ts';
import { readSeriesFile, writeSeriesFile } from './series-io.ts';
import type { BatchReport, MonthlySeries, RejectionRecord, StationRef } from '../types.ts';

/** Years already used in this run. Only grows; fits get a snapshot. */
export class UsedYearsLedger {
  private readonly years: number[] = [];

  record(year: number): void {
    if (!this.years.includes(year)) this.years.push(year);
  }

  snapshot(): number[] {
    return [...this.years];
  }
}

export interface BatchOptions {
  inputDir: string;
  stations: readonly StationRef[];   // processed in this order
  maxAboveMax: number;
  maxBelowMin: number;
  outputDirName?: string;
  reportFileName?: string;
  metricsFile?: string;
}

export interface BatchResult extends BatchReport {
  outputDir: string;
  reportPath: string;
  usedYears: number[];
}

/** Create the output folder, or clear the CSV files a previous run left in it. */
async function prepareOutputDir(dir: string): Promise<void> {
  await mkdir(dir, { recursive: true });
  const stale = (await readdir(dir, { withFileTypes: true }))
    .filter(e => e.isFile() && extname(e.name).toLowerCase() === '.csv');
  for (const e of stale) await unlink(join(dir, e.name));
}

async function listSeriesFiles(dir: string): Promise<string[]> {
  return (await readdir(dir, { withFileTypes: true }))
    .filter(e => e.isFile() && extname(e.name).toLowerCase() === '.csv')
    .map(e => e.name)
    .sort();
}

function countRejections(rejections: readonly RejectionRecord[]): void {
  for (const r of rejections) rejectionsTotal.inc({ reason: r.reason });
}

export async function runBatch(opts: BatchOptions): Promise<BatchResult> {
  const start = Date.now();
  const outputDir = join(opts.inputDir, opts.outputDirName ?? 'extended');
  const reportPath = join(opts.inputDir, opts.reportFileName ?? 'extension-report.txt');
  const ledger = new UsedYearsLedger();
  const report: BatchReport = { extended: [], failures: [], durationMs: 0 };

  await prepareOutputDir(outputDir);
  const files = await listSeriesFiles(opts.inputDir);
  logger.info({ inputDir: opts.inputDir, files: files.length, stations: opts.stations.length }, 'Batch started');

  for (const file of files) {
    const stem = basename(file, extname(file));

    let series: MonthlySeries;
    try {
      series = await readSeriesFile(join(opts.inputDir, file));
    } catch (err) {
      if (!isExtensionError(err)) throw err;
      logger.warn({ file, code: err.code, err }, `Skipping ${file}: ${err.message}`);
      report.failures.push({ file, station: '*', code: err.code, message: err.message });
      continue;
    }

    for (const { id: station, name } of opts.stations) {
      const log = childLogger({ file, station, stationName: name });
      const endTimer = fitDuration.startTimer();
      try {
        const selection = selectAnalog(series, {
          station,
          maxAboveMax: opts.maxAboveMax,
          maxBelowMin: opts.maxBelowMin,
          excludedYears: ledger.snapshot(),
        });
        const extended = appendSeries(series, extend(series, selection));

        const outName = `${stem}-${name}-${selection.year}.csv`;
        await writeSeriesFile(join(outputDir, outName), extended);
        ledger.record(selection.year);
        if (Number.isNaN(selection.correlation)) {
          // reference window has gaps: ranking fell back to chronological order
          logger.warn(
            { file, station, year: selection.year, rank: selection.rank },
            `Accepted ${outName} without a usable correlation`,
          );
        }

        report.extended.push({
          file: outName,
          rank: selection.rank,
          correlation: selection.correlation,
          belowCount: selection.belowCount,
          aboveCount: selection.aboveCount,
        });
        countRejections(selection.rejections);
        fitsTotal.inc({ outcome: 'accepted' });
        seriesExtended.inc();
        endTimer({ outcome: 'accepted' });
        log.debug({ year: selection.year, rank: selection.rank, rejected: selection.rejections.length }, `Wrote ${outName}`);
      } catch (err) {
        endTimer({ outcome: 'failed' });
        if (!isExtensionError(err)) throw err;
        if (err instanceof NoAcceptableAnalogError) countRejections(err.rejections);
        fitsTotal.inc({ outcome: err.code });
        log.warn({ code: err.code }, `Could not extend ${stem}-${name}: ${err.message}`);
        report.failures.push({ file, station: name, code: err.code, message: err.message });
      }
    }
  }

  report.durationMs = Date.now() - start;
  await writeFile(reportPath, formatReport(report), 'utf8');
  if (opts.metricsFile) await writeMetricsFile(opts.metricsFile);

  logger.info(
    { extended: report.extended.length, failed: report.failures.length, durationMs: report.durationMs, reportPath },
    'Batch complete',
  );
  return { ...report, outputDir, reportPath, usedYears: ledger.snapshot() };
}
