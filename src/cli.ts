#!/usr/bin/env tsx
/**
 * cli.ts — Command-line entry point
 *
 *   analog-extend <folder> [--max N] [--max-above N] [--max-below N]
 *
 * --max sets both amplitude thresholds; --max-above / --max-below override it.
 * Reference stations and defaults come from the environment (see config/env.ts).
 */
import 'dotenv/config';
import { env } from './config/env.ts';
import { parseCliArgs, resolveThresholds, USAGE } from './cli-args.ts';
import type { CliArgs } from './schemas.ts';
import { runBatch } from './services/batch.ts';
import { formatReport } from './services/report.ts';
import { logger } from './shared/logger.ts';

async function main(argv: string[]): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    console.error(USAGE);
    return 2;
  }

  const result = await runBatch({
    inputDir: args.folder,
    stations: env.REFERENCE_STATIONS,
    ...resolveThresholds(args, { maxAboveMax: env.MAX_ABOVE_MAX, maxBelowMin: env.MAX_BELOW_MIN }),
    outputDirName: env.OUTPUT_DIR_NAME,
    reportFileName: env.REPORT_FILE_NAME,
    metricsFile: env.METRICS_FILE,
  });

  process.stdout.write(formatReport(result));
  return result.extended.length > 0 || result.failures.length === 0 ? 0 : 1;
}

main(process.argv.slice(2))
  .then(code => { process.exitCode = code; })
  .catch((err: unknown) => {
    logger.fatal({ err }, 'Batch aborted');
    process.exitCode = 1;
  });
