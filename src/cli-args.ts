// ═══════════════════════════════════════════════════════
// cli-args.ts — argv → validated CLI arguments
// ═══════════════════════════════════════════════════════
import { parseArgs } from 'util';
import { CliArgsSchema, type CliArgs } from './schemas.ts';

export const USAGE = 'Usage: analog-extend <folder> [--max N] [--max-above N] [--max-below N]';

export function parseCliArgs(argv: string[]): CliArgs {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      max: { type: 'string' },
      'max-above': { type: 'string' },
      'max-below': { type: 'string' },
    },
  });
  return CliArgsSchema.parse({
    folder: positionals[0] ?? '',
    max: values.max,
    maxAbove: values['max-above'],
    maxBelow: values['max-below'],
  });
}

/** Thresholds after applying --max and the specific overrides over the defaults */
export function resolveThresholds(
  args: CliArgs,
  defaults: { maxAboveMax: number; maxBelowMin: number },
): { maxAboveMax: number; maxBelowMin: number } {
  return {
    maxAboveMax: args.maxAbove ?? args.max ?? defaults.maxAboveMax,
    maxBelowMin: args.maxBelow ?? args.max ?? defaults.maxBelowMin,
  };
}
